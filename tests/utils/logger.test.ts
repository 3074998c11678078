import { CrawlErrors } from '../../core/errors';
import {
  configureLogging,
  createEnhancedLogger,
  createModuleLogger,
  describeError,
  EnhancedLogger,
  LOG_LEVELS,
  logger,
  setLogLevel,
} from '../../utils/logger';

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    setLogLevel(LOG_LEVELS.INFO);
  });

  describe('createModuleLogger', () => {
    it('should tag entries with the module name', () => {
      const info = jest.spyOn(logger, 'info');

      createModuleLogger('TestModule').info('Test message', { page: 2 });

      expect(info).toHaveBeenCalledWith('Test message', { module: 'TestModule', page: 2 });
    });

    it('should flatten errors into the entry', () => {
      const error = jest.spyOn(logger, 'error');

      createModuleLogger('TestModule').error('Request failed', new Error('boom'), { uri: '/a' });

      expect(error).toHaveBeenCalledWith('Request failed', {
        module: 'TestModule',
        uri: '/a',
        errorName: 'Error',
        errorMessage: 'boom',
      });
    });
  });

  describe('describeError', () => {
    it('should describe crawl errors by code', () => {
      const cause = new TypeError('inner');
      const error = CrawlErrors.dataFetchFailed('outer', { uri: '/x' }, cause);

      expect(describeError(error)).toEqual({
        errorCode: 'DATA_FETCH_FAILED',
        errorMessage: 'outer',
        retryable: false,
        errorContext: { uri: '/x' },
        originalError: { name: 'TypeError', message: 'inner' },
      });
    });

    it('should describe non-errors', () => {
      expect(describeError(undefined)).toEqual({});
      expect(describeError(42)).toEqual({ errorMessage: '42' });
    });
  });

  describe('EnhancedLogger', () => {
    it('should merge sticky context into every entry', () => {
      const info = jest.spyOn(logger, 'info');
      const enhanced = createEnhancedLogger('TestModule');
      expect(enhanced).toBeInstanceOf(EnhancedLogger);

      enhanced.setContext({ baseUrl: 'https://api.test' });
      enhanced.info('Bound', { credential: 'a' });

      expect(info).toHaveBeenCalledWith('Bound', {
        module: 'TestModule',
        baseUrl: 'https://api.test',
        credential: 'a',
      });
    });

    it('should return the value of a tracked operation', async () => {
      const result = await createEnhancedLogger('TestModule').trackAsync('async-op', async () => 'result');

      expect(result).toBe('result');
    });

    it('should log and rethrow a failed tracked operation', async () => {
      const error = jest.spyOn(logger, 'error');

      await expect(
        createEnhancedLogger('TestModule').trackAsync('async-op', async () => {
          throw new Error('walk failed');
        }),
      ).rejects.toThrow('walk failed');
      expect(error).toHaveBeenCalledWith(
        '[FAILED] async-op',
        expect.objectContaining({ module: 'TestModule', errorMessage: 'walk failed' }),
      );
    });
  });

  describe('levels', () => {
    it('should set the level directly', () => {
      setLogLevel(LOG_LEVELS.DEBUG);
      expect(logger.level).toBe('debug');
    });

    it('should apply the logging section of the config', () => {
      configureLogging({ level: 'warn', enableFileLogging: false, logDir: './logs' });
      expect(logger.level).toBe('warn');
    });
  });
});
