import { createConsoleLogger } from '../src/utils/logger';

describe('createConsoleLogger', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  test('debug is silent unless verbose', () => {
    createConsoleLogger().debug('hidden');
    expect(logSpy).not.toHaveBeenCalled();

    createConsoleLogger({ verbose: true }).debug('shown');
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0][0])).toContain('shown');
  });

  test('warnings and errors go to stderr', () => {
    const logger = createConsoleLogger();
    logger.warn('careful');
    logger.error('broken');
    logger.info('fine');

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  test('metadata is appended as key=value pairs', () => {
    createConsoleLogger({ prefix: '[test]' }).info('scan done', { files: 3, mode: 'quick', skipped: undefined });

    const line = String(logSpy.mock.calls[0][0]);
    expect(line).toContain('[test]');
    expect(line).toContain('scan done');
    expect(line).toContain('files=3 mode=quick');
    expect(line).not.toContain('skipped');
  });
});
