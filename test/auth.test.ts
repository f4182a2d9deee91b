import { Request, Response, NextFunction } from 'express';
import { requireApiKey, API_KEY_HEADER } from '../src/middleware/auth';

describe('API Key Authentication Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let nextFunction: NextFunction;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    mockRequest = {
      headers: {}
    };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis()
    };
    nextFunction = jest.fn();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  function run(expectedKey: string | undefined): void {
    requireApiKey(() => expectedKey)(
      mockRequest as Request,
      mockResponse as Response,
      nextFunction
    );
  }

  it('should return 500 if the API key is not configured', () => {
    run(undefined);

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: 'Server configuration error'
    });
    expect(errorSpy).toHaveBeenCalledWith('[Auth] API_KEY not configured in environment variables');
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should treat an empty configured key as missing', () => {
    run('');

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 401 if X-API-Key header is missing', () => {
    run('test-api-key');

    expect(mockResponse.status).toHaveBeenCalledWith(401);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: 'Missing X-API-Key header'
    });
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 403 if API key is invalid', () => {
    mockRequest.headers = {
      [API_KEY_HEADER]: 'wrong-api-key'
    };

    run('correct-api-key');

    expect(mockResponse.status).toHaveBeenCalledWith(403);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: 'Invalid API key'
    });
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should call next() if API key is valid', () => {
    mockRequest.headers = {
      [API_KEY_HEADER]: 'test-api-key'
    };

    run('test-api-key');

    expect(nextFunction).toHaveBeenCalledTimes(1);
    expect(mockResponse.status).not.toHaveBeenCalled();
    expect(mockResponse.json).not.toHaveBeenCalled();
  });

  it('should resolve the expected key on every request', () => {
    let key = 'first-key';
    const middleware = requireApiKey(() => key);
    mockRequest.headers = {
      [API_KEY_HEADER]: 'second-key'
    };

    middleware(mockRequest as Request, mockResponse as Response, nextFunction);
    expect(mockResponse.status).toHaveBeenCalledWith(403);

    key = 'second-key';
    middleware(mockRequest as Request, mockResponse as Response, nextFunction);
    expect(nextFunction).toHaveBeenCalledTimes(1);
  });

  it('should read process.env.API_KEY by default', () => {
    const original = process.env.API_KEY;
    process.env.API_KEY = 'env-key';
    mockRequest.headers = {
      [API_KEY_HEADER]: 'env-key'
    };

    try {
      requireApiKey()(mockRequest as Request, mockResponse as Response, nextFunction);
      expect(nextFunction).toHaveBeenCalledTimes(1);
    } finally {
      if (original === undefined) {
        delete process.env.API_KEY;
      } else {
        process.env.API_KEY = original;
      }
    }
  });
});
