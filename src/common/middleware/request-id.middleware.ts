import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Longest client-supplied request id that is echoed back */
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Reads the request id assigned by RequestIdMiddleware.
 * Falls back to 'unknown' for requests that never went through it.
 */
export function requestIdOf(request: Pick<Request, 'headers'>): string {
  const header = request.headers[REQUEST_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value || 'unknown';
}

/**
 * Gives every request an id: the client's `x-request-id` when it sent a usable
 * one, a fresh UUID otherwise. The id is written back on the request headers
 * and echoed on the response.
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(request: Pick<Request, 'headers'>, response: Pick<Response, 'setHeader'>, next: NextFunction): void {
    const incoming = request.headers[REQUEST_ID_HEADER];
    const requestId =
      typeof incoming === 'string' && incoming.trim() !== '' && incoming.length <= MAX_REQUEST_ID_LENGTH
        ? incoming.trim()
        : uuidv4();

    request.headers[REQUEST_ID_HEADER] = requestId;
    response.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  }
}
