import { describe, expect, it, vi } from "vitest";
import { ILogger, LogLevel, buildLeveledLogger } from "./logger";

function recordingLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  };
}

describe('buildLeveledLogger', () => {
  it('drops messages below the configured level', () => {
    const logger = recordingLogger();
    const leveled = buildLeveledLogger({ logger, level: LogLevel.warn });

    leveled.debug('debug');
    leveled.info('info');
    leveled.warn('warn');
    leveled.error('error');
    leveled.group('group');

    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.group).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('warn');
    expect(logger.error).toHaveBeenCalledWith('error');
  });

  it('passes everything through at debug', () => {
    const logger = recordingLogger();
    const leveled = buildLeveledLogger({ logger, level: LogLevel.debug });

    leveled.group('reading');
    leveled.debug('DBG: %d', 1);
    leveled.groupEnd();

    expect(logger.group).toHaveBeenCalledWith('reading');
    expect(logger.debug).toHaveBeenCalledWith('DBG: %d', 1);
    expect(logger.groupEnd).toHaveBeenCalledTimes(1);
  });

  it('stays quiet when silent', () => {
    const logger = recordingLogger();
    buildLeveledLogger({ logger, level: LogLevel.silent }).error('error');
    expect(logger.error).not.toHaveBeenCalled();
  });
});
