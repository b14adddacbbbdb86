import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { validateRequest } from '../validateRequest';
import { AppError } from '../errorHandler';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('validateRequest middleware', () => {
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;
  let mockNext: NextFunction;

  const schema = z.object({
    ip: z.string().trim().min(1),
    name: z.string().trim().optional(),
  });

  beforeEach(() => {
    mockReq = { body: {}, params: {} };
    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
    mockNext = jest.fn();
  });

  it('should replace the body with the parsed value', () => {
    mockReq.body = { ip: ' 10.0.0.5 ', name: ' nas ' };

    validateRequest(schema, 'body')(mockReq as Request, mockRes as Response, mockNext);

    expect(mockNext).toHaveBeenCalledTimes(1);
    expect(mockReq.body).toEqual({ ip: '10.0.0.5', name: 'nas' });
  });

  it('should throw a 400 AppError listing each failing field', () => {
    mockReq.body = { name: 5 };

    let thrown: unknown;
    try {
      validateRequest(schema, 'body')(mockReq as Request, mockRes as Response, mockNext);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AppError);
    if (thrown instanceof AppError) {
      expect(thrown.statusCode).toBe(400);
      expect(thrown.code).toBe('VALIDATION_ERROR');
      expect(thrown.message).toBe('"ip" Required, "name" Expected string, received number');
    }
    expect(mockNext).not.toHaveBeenCalled();
  });

  it('should validate params without replacing them', () => {
    const params = { id: '7' };
    mockReq.params = params;

    validateRequest(z.object({ id: z.string().regex(/^\d+$/) }), 'params')(
      mockReq as Request,
      mockRes as Response,
      mockNext
    );

    expect(mockNext).toHaveBeenCalled();
    expect(mockReq.params).toBe(params);
  });

  it('should reject invalid params', () => {
    mockReq.params = { id: 'abc' };

    expect(() =>
      validateRequest(z.object({ id: z.string().regex(/^\d+$/, 'bad id') }), 'params')(
        mockReq as Request,
        mockRes as Response,
        mockNext
      )
    ).toThrow('"id" bad id');
  });
});
