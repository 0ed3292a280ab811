import type { NextFunction, Request, Response } from 'express';
import { RequestIdMiddleware } from './request-id.middleware';

describe('RequestIdMiddleware', () => {
  const middleware = new RequestIdMiddleware();

  function run(headers: Record<string, string | string[]>) {
    const req = { headers } as unknown as Request & { requestId?: string };
    const res = { setHeader: jest.fn() };
    const next: NextFunction = jest.fn();

    middleware.use(req, res as unknown as Response, next);

    return { req, res, next };
  }

  it('should keep an incoming request id', () => {
    const { req, res, next } = run({ 'x-request-id': 'req-42' });

    expect(req.requestId).toBe('req-42');
    expect(res.setHeader).toHaveBeenCalledWith('x-request-id', 'req-42');
    expect(next).toHaveBeenCalled();
  });

  it('should take the first of repeated headers', () => {
    const { req } = run({ 'x-request-id': ['req-1', 'req-2'] });

    expect(req.requestId).toBe('req-1');
  });

  it('should generate an id when none is sent', () => {
    const { req, res } = run({});

    expect(req.requestId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
    expect(res.setHeader).toHaveBeenCalledWith('x-request-id', req.requestId);
  });
});
