import { randomUUID } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import type { ZodType, ZodTypeDef } from 'zod';
import { DialogueError } from '../errors';
import { log } from '../log';

const rawBodies = new WeakMap<IncomingMessage, Buffer>();
const requestIds = new WeakMap<IncomingMessage, string>();

/** `verify` hook for the body parsers; keeps the exact bytes for signature checks. */
export function captureRawBody(req: IncomingMessage, _res: ServerResponse, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function getRawBody(req: IncomingMessage): Buffer {
  return rawBodies.get(req) ?? Buffer.alloc(0);
}

export function getRequestId(req: IncomingMessage): string | undefined {
  return requestIds.get(req);
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  requestIds.set(req, requestId);
  next();
}

/** Express 4 does not forward rejected promises to the error handler on its own. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/** Parses `req.body` with the schema, answering 400 on failure. */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request, res: Response): T | undefined {
  const parsed = schema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({ error: 'invalid_request', details: parsed.error.flatten() });
    return undefined;
  }
  return parsed.data;
}

function toSnakeCase(value: string): string {
  return value.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = getRequestId(req);

  if (err instanceof DialogueError && err.status !== undefined) {
    log.warn({ event: 'request_failed', err, code: err.code, requestId }, 'request failed');
    res.status(err.status).json({ error: toSnakeCase(err.code), message: err.message });
    return;
  }

  // Body parser failures (malformed JSON, oversized payloads) carry a 4xx status.
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    log.warn({ event: 'request_rejected', err, requestId }, 'request rejected');
    res.status(err.status).json({ error: 'invalid_request', details: err.message });
    return;
  }

  log.error({ err, requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}
