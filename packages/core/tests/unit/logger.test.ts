import { LogLevel, LoggingService, getLogger, initializeLogger, parseLogLevel } from '../../src/utils/logger.js';

function capture(level: LogLevel): { logger: LoggingService; lines: string[] } {
  const lines: string[] = [];
  return { logger: new LoggingService('docfill', level, line => lines.push(line)), lines };
}

describe('LoggingService', () => {
  it('should prefix lines with timestamp, level and name', () => {
    const { logger, lines } = capture(LogLevel.INFO);

    logger.info('Filled template');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[docfill\] Filled template$/);
  });

  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture(LogLevel.WARN);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN]');
  });

  it('should format object arguments as JSON', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);

    logger.debug('report', { values: 2 });

    expect(lines[1]).toBe('  {\n  "values": 2\n}');
  });

  it('should log the error message and stack', () => {
    const { logger, lines } = capture(LogLevel.ERROR);

    logger.error('Store failed', new Error('disk full'));

    expect(lines[0]).toContain('[ERROR] [docfill] Store failed');
    expect(lines[1]).toBe('  disk full');
    expect(lines[2]).toMatch(/^ {2}Stack: Error: disk full/);
  });

  it('should change level at runtime', () => {
    const { logger, lines } = capture(LogLevel.ERROR);

    logger.setLevel(LogLevel.DEBUG);
    logger.debug('now visible');

    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
    expect(lines).toHaveLength(1);
  });
});

describe('parseLogLevel', () => {
  it('should parse level names case-insensitively and default to INFO', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARNING')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' error ')).toBe(LogLevel.ERROR);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});

describe('global logger', () => {
  it('should return the initialized instance', () => {
    const logger = initializeLogger('docfill-test', LogLevel.ERROR, () => undefined);
    expect(getLogger()).toBe(logger);
  });
});
