/** 2001-01-01T00:00:00Z, the Core Foundation absolute-time reference date, as a Unix timestamp. */
export const cfAbsoluteTimeEpochSeconds = 978_307_200;
export const cfAbsoluteTimeEpochMilliseconds = cfAbsoluteTimeEpochSeconds * 1e3;
export const cfAbsoluteTimeEpochMicroseconds = BigInt(cfAbsoluteTimeEpochSeconds) * 1_000_000n;

/** The span of a JavaScript `Date`: 8.64e15 ms either side of 1970. */
export const maxUnixSeconds = 8.64e12;

/** 0000-01-01T00:00:00Z and 9999-12-31T23:59:59Z, the years a four-digit ISO-8601 date can spell. */
export const minISOUnixSeconds = -62_167_219_200;
export const maxISOUnixSeconds = 253_402_300_799;
