import {
  cfAbsoluteTimeEpochMicroseconds,
  cfAbsoluteTimeEpochMilliseconds,
  cfAbsoluteTimeEpochSeconds,
  maxISOUnixSeconds,
  maxUnixSeconds,
  minISOUnixSeconds,
} from "../constants/epoch";
import { ConstructionError } from "../errors/construction-error";

const isoPattern = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z$/;

const microsecondsPerSecond = 1_000_000n;
const maxUnixMicroseconds = BigInt(maxUnixSeconds) * microsecondsPerSecond;

/**
 * `value * scale` as a bigint, rounding only the fractional part so that
 * large whole values stay exact.
 */
function scaleToBigInt(value: number, scale: number) {
  const whole = Math.trunc(value);
  return BigInt(whole) * BigInt(scale) + BigInt(Math.round((value - whole) * scale));
}

/** floor division, where bigint `/` truncates */
function floorDiv(a: bigint, b: bigint) {
  const quotient = a / b;
  return a % b < 0n ? quotient - 1n : quotient;
}

/**
 * A plist date: whole microseconds relative to 2001-01-01T00:00:00Z, anywhere in the
 * range of a JavaScript `Date`.
 *
 * Binary plists store a float64 count of seconds and XML plists an ISO-8601 string;
 * keeping an integer count of microseconds makes both conversions exact.
 */
export class PlistDate {
  private constructor(readonly microseconds: bigint) { }

  static fromReferenceMicroseconds(microseconds: number | bigint) {
    if (typeof microseconds === 'number' && !Number.isInteger(microseconds)) {
      throw new ConstructionError(`Date offset must be a whole number of microseconds, got ${microseconds}`, microseconds);
    }

    const value = BigInt(microseconds);
    const unix = value + cfAbsoluteTimeEpochMicroseconds;
    if (unix < -maxUnixMicroseconds || unix > maxUnixMicroseconds) {
      throw new ConstructionError(`Date offset out of range: ${value} µs`, microseconds);
    }
    return new PlistDate(value);
  }

  /** Seconds since the reference date, rounded to the microsecond. */
  static fromReferenceSeconds(seconds: number) {
    if (!this.isRepresentableSeconds(seconds)) {
      throw new ConstructionError(`Date offset out of range: ${seconds}`, seconds);
    }
    return new PlistDate(scaleToBigInt(seconds, 1e6));
  }

  static isRepresentableSeconds(seconds: number) {
    return Number.isFinite(seconds) && Math.abs(seconds + cfAbsoluteTimeEpochSeconds) <= maxUnixSeconds;
  }

  static fromUnixMilliseconds(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new ConstructionError(`Date offset out of range: ${milliseconds} ms`, milliseconds);
    }
    return this.fromReferenceMicroseconds(scaleToBigInt(milliseconds - cfAbsoluteTimeEpochMilliseconds, 1e3));
  }

  static fromUnixMicroseconds(microseconds: number | bigint) {
    if (typeof microseconds === 'number' && !Number.isInteger(microseconds)) {
      throw new ConstructionError(`Date offset must be a whole number of microseconds, got ${microseconds}`, microseconds);
    }
    return this.fromReferenceMicroseconds(BigInt(microseconds) - cfAbsoluteTimeEpochMicroseconds);
  }

  static fromDate(date: Date) {
    const time = date.getTime();
    if (Number.isNaN(time)) {
      throw new ConstructionError('Cannot build a plist date from an invalid Date', date);
    }
    return this.fromUnixMilliseconds(time);
  }

  /**
   * Parses `YYYY-MM-DDTHH:MM:SS[.fraction]Z`. Returns undefined for anything else,
   * including calendar-invalid dates such as February 30th.
   */
  static parseISO(text: string): PlistDate | undefined {
    const match = isoPattern.exec(text);
    if (!match) {
      return undefined;
    }
    const [, year, month, day, hour, minute, second, fraction] = match;

    const date = new Date(0);
    date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
    date.setUTCHours(Number(hour), Number(minute), Number(second), 0);

    if (
      date.getUTCFullYear() !== Number(year)
      || date.getUTCMonth() !== Number(month) - 1
      || date.getUTCDate() !== Number(day)
      || date.getUTCHours() !== Number(hour)
      || date.getUTCMinutes() !== Number(minute)
      || date.getUTCSeconds() !== Number(second)
    ) {
      return undefined;
    }

    const fractionMicroseconds = fraction === undefined ? 0 : Math.round(Number(`0.${fraction}`) * 1e6);
    const wholeMilliseconds = BigInt(date.getTime() - cfAbsoluteTimeEpochMilliseconds);
    return new PlistDate(wholeMilliseconds * 1_000n + BigInt(fractionMicroseconds));
  }

  static now() {
    return this.fromUnixMilliseconds(Date.now());
  }

  /** exact for whole seconds, nearest double otherwise */
  get referenceSeconds() {
    return Number(this.microseconds / microsecondsPerSecond) + Number(this.microseconds % microsecondsPerSecond) / 1e6;
  }

  get unixMilliseconds() {
    return Number(this.microseconds + cfAbsoluteTimeEpochMicroseconds) / 1e3;
  }

  /** whether the date falls in years 0000 to 9999, which XML plists can spell */
  get hasISOForm() {
    const unixSeconds = Number(floorDiv(this.microseconds, microsecondsPerSecond)) + cfAbsoluteTimeEpochSeconds;
    return unixSeconds >= minISOUnixSeconds && unixSeconds <= maxISOUnixSeconds;
  }

  toDate() {
    return new Date(Math.floor(this.unixMilliseconds));
  }

  /**
   * ISO-8601 in UTC with as many fractional digits as needed (none for whole seconds).
   * Years outside 0000-9999 take the signed six-digit form of `Date#toISOString`.
   */
  toISOString() {
    const wholeSeconds = floorDiv(this.microseconds, microsecondsPerSecond);
    const fractionMicroseconds = this.microseconds - wholeSeconds * microsecondsPerSecond;

    // "YYYY-MM-DDTHH:MM:SS.000Z" minus the milliseconds
    const base = new Date((Number(wholeSeconds) + cfAbsoluteTimeEpochSeconds) * 1e3).toISOString().slice(0, -5);
    if (fractionMicroseconds === 0n) {
      return `${base}Z`;
    }
    const digits = fractionMicroseconds.toString().padStart(6, '0').replace(/0+$/, '');
    return `${base}.${digits}Z`;
  }

  equals(other: PlistDate) {
    return this.microseconds === other.microseconds;
  }

  toString() {
    return this.toISOString();
  }
}
