import {
  InMemoryLogEntry,
  getDefaultLogger,
  getDisabledLogger,
  getInMemoryLogger,
} from './logger';

describe('logger', () => {
  it('getDefaultLogger should create a pino logger with the given name', () => {
    const logger = getDefaultLogger('unit-test');
    expect(logger.info).toBeInstanceOf(Function);
    expect(typeof logger.level).toBe('string');
  });

  it('getInMemoryLogger should write all logs to an array', () => {
    const context = 'test';
    const [logger, logs] = getInMemoryLogger(context);
    const message = 'test message';
    logger.fatal(message);
    logger.error(message);
    logger.warn(message);
    logger.info(message);
    logger.debug(message);
    logger.trace(message);
    logger.silent(message);
    expect(logs).toEqual([
      { context, type: 'fatal', date: expect.any(String), args: [message] },
      { context, type: 'error', date: expect.any(String), args: [message] },
      { context, type: 'warn', date: expect.any(String), args: [message] },
      { context, type: 'info', date: expect.any(String), args: [message] },
      { context, type: 'debug', date: expect.any(String), args: [message] },
      { context, type: 'trace', date: expect.any(String), args: [message] },
      { context, type: 'silent', date: expect.any(String), args: [message] },
    ] as InMemoryLogEntry[]);
  });

  it('should create a new logger instance that does not log anything', () => {
    // Arrange
    const logger = getDisabledLogger();

    // Assert
    expect(logger.level).toBe('silent');
    expect(logger.fatal('test')).toBeUndefined();
    expect(logger.error('test')).toBeUndefined();
    expect(logger.warn('test')).toBeUndefined();
    expect(logger.info('test')).toBeUndefined();
    expect(logger.debug('test')).toBeUndefined();
    expect(logger.trace('test')).toBeUndefined();
    expect(logger.silent('test')).toBeUndefined();
  });
});
