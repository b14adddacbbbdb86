import { Request, Response, NextFunction } from 'express';
import { AppError, errorHandler, notFoundHandler } from '../errorHandler';
import { config } from '../../config';
import { logger } from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

jest.mock('../../config', () => ({
  config: {
    server: {
      env: 'test',
    },
  },
}));

describe('errorHandler middleware', () => {
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    jest.clearAllMocks();
    config.server.env = 'test';

    mockReq = {
      path: '/hosts',
      method: 'POST',
      ip: '127.0.0.1',
    };

    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };

    mockNext = jest.fn();
  });

  describe('AppError class', () => {
    it('should create AppError with default values', () => {
      const error = new AppError('Test error');

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('INTERNAL_ERROR');
      expect(error.isOperational).toBe(true);
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });

    it('should create AppError with custom values', () => {
      const error = new AppError('Validation failed', 400, 'VALIDATION_ERROR', false);

      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.isOperational).toBe(false);
    });
  });

  describe('errorHandler', () => {
    it('should respond with the AppError status and code', () => {
      const error = new AppError('"ip" Required', 400, 'VALIDATION_ERROR');

      errorHandler(error, mockReq as Request, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({
        error: {
          code: 'VALIDATION_ERROR',
          message: '"ip" Required',
          statusCode: 400,
          timestamp: expect.any(String),
          path: '/hosts',
        },
      });
    });

    it('should treat a generic Error as 500', () => {
      errorHandler(new Error('disk full'), mockReq as Request, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(500);
      expect(mockRes.json).toHaveBeenCalledWith({
        error: {
          code: 'INTERNAL_ERROR',
          message: 'disk full',
          statusCode: 500,
          timestamp: expect.any(String),
          path: '/hosts',
        },
      });
    });

    it('should include the stack trace in development', () => {
      config.server.env = 'development';
      const error = new Error('Test error');
      error.stack = 'Error stack trace';

      errorHandler(error, mockReq as Request, mockRes as Response, mockNext);

      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({ stack: 'Error stack trace' })
      );
    });

    it('should not include the stack trace outside development', () => {
      config.server.env = 'production';

      errorHandler(new Error('Test error'), mockReq as Request, mockRes as Response, mockNext);

      const body = (mockRes.json as jest.Mock).mock.calls[0][0];
      expect(body).not.toHaveProperty('stack');
    });

    it('should log the error with request context', () => {
      errorHandler(
        new AppError('Test error', 500, 'TEST_ERROR'),
        mockReq as Request,
        mockRes as Response,
        mockNext
      );

      expect(logger.error).toHaveBeenCalledWith('Error occurred', {
        statusCode: 500,
        errorCode: 'TEST_ERROR',
        message: 'Test error',
        path: '/hosts',
        method: 'POST',
        ip: '127.0.0.1',
        stack: undefined,
      });
    });
  });

  describe('notFoundHandler', () => {
    it('should return 404 for unknown routes', () => {
      mockReq.method = 'GET';
      mockReq = { ...mockReq, path: '/api/machines' };

      notFoundHandler(mockReq as Request, mockRes as Response);

      expect(mockRes.status).toHaveBeenCalledWith(404);
      expect(mockRes.json).toHaveBeenCalledWith({
        error: {
          code: 'NOT_FOUND',
          message: 'Route not found',
          statusCode: 404,
          timestamp: expect.any(String),
          path: '/api/machines',
        },
      });
      expect(logger.warn).toHaveBeenCalledWith('Route not found: GET /api/machines');
    });
  });
});
