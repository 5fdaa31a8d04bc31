// Unit tests for LoggerService
import { parseEnvironment } from '../../../src/config/environment';
import { LoggerService } from '../../../src/infrastructure/monitoring/logger.service';

describe('LoggerService', () => {
  const originalLogLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
  });

  describe('create', () => {
    it('should use the configured LOG_LEVEL', () => {
      const logger = LoggerService.create(parseEnvironment({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }));

      expect(logger.level).toBe('warn');
    });

    it('should be silent under tests by default', () => {
      expect(LoggerService.create(parseEnvironment({ NODE_ENV: 'test' })).level).toBe('silent');
    });

    it('should log at info in production by default', () => {
      expect(LoggerService.create(parseEnvironment({ NODE_ENV: 'production' })).level).toBe('info');
    });

    it('should keep the level on child loggers', () => {
      const logger = LoggerService.create(parseEnvironment({ NODE_ENV: 'production', LOG_LEVEL: 'error' }));

      expect(logger.child({ component: 'RateProvider' }).level).toBe('error');
    });
  });

  describe('getInstance', () => {
    it('should reject an invalid LOG_LEVEL with a ValidationException', () => {
      expect.assertions(2);
      process.env.LOG_LEVEL = 'verbose';

      jest.isolateModules(() => {
        try {
          require('../../../src/infrastructure/monitoring/logger.service');
        } catch (error) {
          expect(error).toMatchObject({ name: 'ValidationException', code: 'VALIDATION_ERROR' });
          expect(error).toMatchObject({ validationErrors: [{ field: 'LOG_LEVEL' }] });
        }
      });
    });

    it('should apply a valid LOG_LEVEL from the environment', () => {
      process.env.LOG_LEVEL = 'error';

      jest.isolateModules(() => {
        const loaded: typeof import('../../../src/infrastructure/monitoring/logger.service') =
          require('../../../src/infrastructure/monitoring/logger.service');

        expect(loaded.logger.level).toBe('error');
      });
    });
  });
});
