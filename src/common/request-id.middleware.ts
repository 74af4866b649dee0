import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const VALID_REQUEST_ID = /^[\w.-]{1,128}$/;

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  use(req: Request, res: Response, next: NextFunction) {
    const incoming = req.header(REQUEST_ID_HEADER);
    const requestId = incoming && VALID_REQUEST_ID.test(incoming) ? incoming : randomUUID();
    const startTime = Date.now();

    res.setHeader(REQUEST_ID_HEADER, requestId);
    res.on('finish', () => {
      this.logger.log(
        `[${requestId}] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startTime}ms`,
      );
    });

    next();
  }
}
