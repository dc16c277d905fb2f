import fs from 'fs';
import os from 'os';
import path from 'path';
import { LogLevel, Logger, formatLogEntry, isLogLevel } from '../../src/system/logger';

describe('formatLogEntry', () => {
  const timestamp = new Date('2024-07-01T12:00:00Z');

  it('should format level, module and operation', () => {
    expect(
      formatLogEntry({ level: LogLevel.INFO, message: 'hello', module: 'weather-alert.cli', operation: 'start', timestamp })
    ).toBe('2024-07-01T12:00:00.000Z INFO  [weather-alert.cli] [start] hello');
  });

  it('should append data as JSON', () => {
    expect(formatLogEntry({ level: LogLevel.WARN, message: 'slow', module: 'm', timestamp, data: { ms: 1200 } })).toBe(
      '2024-07-01T12:00:00.000Z WARN  [m] slow\nData: {\n  "ms": 1200\n}'
    );
  });

  it('should append the error message', () => {
    const error = new Error('boom');
    error.stack = undefined;

    expect(formatLogEntry({ level: LogLevel.ERROR, message: 'failed', module: 'm', timestamp, error })).toBe(
      '2024-07-01T12:00:00.000Z ERROR [m] failed\nError: boom'
    );
  });
});

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should skip entries below the minimum level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('test', { minLevel: LogLevel.WARN });

    logger.info('quiet');
    logger.warn('loud');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('WARN  [test] loud');
  });

  it('should write errors to stderr', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('test');

    logger.fatal('Failed to start');

    expect(error.mock.calls[0][0]).toContain('FATAL [test] Failed to start');
  });

  it('should append to the log file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'weather-alert-log-'));
    const filePath = path.join(dir, 'logs', 'weather_alert.log');
    const logger = new Logger('test', { consoleOutput: false, fileOutput: true, filePath });

    try {
      logger.info('first');
      logger.info('second');

      const lines = fs.readFileSync(filePath, 'utf8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toMatch(/ INFO {2}\[test\] second$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should share options with sub-loggers', () => {
    const root = new Logger('weather-alert', { consoleOutput: false });
    const child = root.createSubLogger('scheduler');

    root.setOptions({ minLevel: LogLevel.ERROR });
    expect(child.getOptions().minLevel).toBe(LogLevel.ERROR);

    child.setOptions({ minLevel: LogLevel.DEBUG });
    expect(root.getOptions().minLevel).toBe(LogLevel.DEBUG);
    expect(child.getModuleName()).toBe('weather-alert.scheduler');
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
