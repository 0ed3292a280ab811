import { Injectable, NestMiddleware } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(
    req: Request & { requestId?: string },
    res: Response,
    next: NextFunction,
  ) {
    const header = req.headers[REQUEST_ID_HEADER];
    const requestId =
      (Array.isArray(header) ? header[0] : header) || randomUUID();

    req.requestId = requestId;

    res.setHeader(REQUEST_ID_HEADER, requestId);

    next();
  }
}
