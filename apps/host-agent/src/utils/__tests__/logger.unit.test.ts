import winston from 'winston';
import { logger } from '../logger';

describe('logger utility', () => {
  describe('logger instance', () => {
    it('should be a winston logger instance', () => {
      expect(logger).toBeInstanceOf(winston.Logger);
    });

    it('should expose every configured level as a method', () => {
      expect(typeof logger.error).toBe('function');
      expect(typeof logger.warn).toBe('function');
      expect(typeof logger.info).toBe('function');
      expect(typeof logger.http).toBe('function');
      expect(typeof logger.debug).toBe('function');
    });
  });

  describe('levels', () => {
    it('should order level priorities from error to debug', () => {
      const { levels } = logger;
      expect(levels.error).toBeLessThan(levels.warn);
      expect(levels.warn).toBeLessThan(levels.info);
      expect(levels.info).toBeLessThan(levels.http);
      expect(levels.http).toBeLessThan(levels.debug);
    });

    it('should default to the info level', () => {
      expect(logger.level).toBe(process.env.LOG_LEVEL || 'info');
    });
  });

  describe('transports', () => {
    it('should have a console transport', () => {
      expect(
        logger.transports.some((transport) => transport instanceof winston.transports.Console)
      ).toBe(true);
    });

    it('should not write log files under the test environment', () => {
      expect(
        logger.transports.some((transport) => transport instanceof winston.transports.File)
      ).toBe(false);
    });
  });

  describe('logging functionality', () => {
    beforeEach(() => {
      logger.transports.forEach((transport) => {
        transport.silent = true;
      });
    });

    afterEach(() => {
      logger.transports.forEach((transport) => {
        transport.silent = false;
      });
    });

    it('should log messages with metadata', () => {
      expect(() => {
        logger.info('Test message with metadata', { hostId: 3, ip: '192.168.1.20' });
      }).not.toThrow();
    });

    it('should log error objects', () => {
      expect(() => {
        logger.error('Error occurred', { error: new Error('Test error') });
      }).not.toThrow();
    });
  });
});
