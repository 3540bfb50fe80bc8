/**
 * @fileoverview HTTP front end for the citation service
 *
 * Routing and error mapping live in a socket-free request handler; the
 * node:http server only moves bytes in and out of it.
 */

import http from 'node:http';
import { randomUUID } from 'node:crypto';
import { ValidationError } from '../core/errors.js';
import type { ParagraphLocation } from '../core/types.js';
import type { RunOptions } from '../agent/refinement_loop.js';
import { logError, logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { LEXLOCATOR_VERSION } from '../version.js';
import { classifyError } from './citation_service.js';
import { PROBLEM_CONTENT_TYPE, problem, type Problem } from './problem.js';

const SERVICE = 'lexlocator';
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export interface ParagraphFinder {
  findParagraph(payload: unknown, options?: RunOptions): Promise<ParagraphLocation>;
}

export interface HttpRequest {
  method: string;
  path: string;
  contentType?: string;
  body: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface RequestHandlerOptions {
  service: ParagraphFinder;
  version?: string;
  generateRequestId?: () => string;
}

export type RequestHandler = (request: HttpRequest) => Promise<HttpResponse>;

const ROUTES: Record<string, string> = {
  '/': 'GET',
  '/health': 'GET',
  '/find_paragraph': 'POST',
};

function json(status: number, body: unknown, requestId: string): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', 'x-request-id': requestId },
    body: JSON.stringify(body),
  };
}

function problemResponse(details: Problem, requestId: string): HttpResponse {
  return {
    status: details.status,
    headers: { 'content-type': PROBLEM_CONTENT_TYPE, 'x-request-id': requestId },
    body: JSON.stringify(details),
  };
}

function isJsonContentType(contentType: string | undefined): boolean {
  return (contentType ?? '').split(';')[0]?.trim().toLowerCase() === 'application/json';
}

export function createRequestHandler(options: RequestHandlerOptions): RequestHandler {
  const start = Date.now();
  const version = options.version ?? LEXLOCATOR_VERSION;
  const nextRequestId = options.generateRequestId ?? randomUUID;

  return async (request) => {
    const requestId = nextRequestId();
    const instance = request.path;

    const expectedMethod = ROUTES[request.path];
    if (expectedMethod === undefined) {
      return problemResponse(problem({ status: 404, code: 'NOT_FOUND', detail: 'not found', instance, requestId }), requestId);
    }
    if (request.method !== expectedMethod) {
      return problemResponse(
        problem({ status: 405, code: 'METHOD_NOT_ALLOWED', detail: `use ${expectedMethod}`, instance, requestId }),
        requestId
      );
    }

    if (request.path === '/') {
      return json(200, { message: 'Welcome to the lexlocator API. POST /find_paragraph to locate a justifying paragraph.' }, requestId);
    }
    if (request.path === '/health') {
      return json(200, { status: 'ok', service: SERVICE, version, uptimeMs: Date.now() - start }, requestId);
    }

    if (!isJsonContentType(request.contentType)) {
      return problemResponse(
        problem({ status: 415, code: 'UNSUPPORTED_MEDIA_TYPE', detail: 'content-type must be application/json', instance, requestId }),
        requestId
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(request.body);
    } catch {
      return problemResponse(
        problem({ status: 400, code: 'INVALID_ARGUMENT', detail: 'body must be valid JSON', instance, requestId }),
        requestId
      );
    }

    try {
      const location = await options.service.findParagraph(payload, { signal: request.signal });
      logInfo('find_paragraph succeeded', { requestId, ...location });
      return json(200, location, requestId);
    } catch (error) {
      const classified = classifyError(error);
      if (classified.internal) {
        logError('find_paragraph failed', { requestId, code: classified.code, error: getErrorMessage(error) });
      }
      return problemResponse(
        problem({
          status: classified.status,
          code: classified.code,
          detail: classified.detail,
          instance,
          requestId,
          errors: error instanceof ValidationError && error.issues.length > 0 ? error.issues : undefined,
        }),
        requestId
      );
    }
  };
}

export interface HttpServerOptions extends RequestHandlerOptions {
  maxBodyBytes?: number;
}

class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Collect the body up to `limit` bytes. Past the limit the rest is drained
 * and dropped, so the socket stays open for the 413 response.
 */
function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let exceeded = false;
    req.on('data', (chunk: Buffer) => {
      if (exceeded) return;
      size += chunk.length;
      if (size > limit) {
        exceeded = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!exceeded) resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
}

function send(res: http.ServerResponse, response: HttpResponse): void {
  res.statusCode = response.status;
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  res.end(response.body);
}

/**
 * Path of a request target, or null when it does not parse. The Host header
 * is client input, so a fixed base resolves the target.
 */
export function requestPath(target: string | undefined): string | null {
  try {
    return new URL(target ?? '/', 'http://localhost').pathname;
  } catch {
    return null;
  }
}

export function createHttpServer(options: HttpServerOptions): http.Server {
  const handle = createRequestHandler(options);
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  return http.createServer((req, res) => {
    const pathname = requestPath(req.url);
    if (pathname === null) {
      const requestId = randomUUID();
      req.resume();
      send(
        res,
        problemResponse(
          problem({ status: 400, code: 'INVALID_ARGUMENT', detail: 'invalid request target', requestId }),
          requestId
        )
      );
      return;
    }
    // A client that hangs up cancels the loop at its next iteration boundary.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    readBody(req, maxBodyBytes)
      .then((body) =>
        handle({
          method: req.method ?? 'GET',
          path: pathname,
          contentType: req.headers['content-type'],
          body,
          signal: controller.signal,
        })
      )
      .then((response) => send(res, response))
      .catch((error: unknown) => {
        const requestId = randomUUID();
        if (error instanceof PayloadTooLargeError) {
          const response = problemResponse(
            problem({ status: 413, code: 'PAYLOAD_TOO_LARGE', detail: error.message, instance: pathname, requestId }),
            requestId
          );
          send(res, { ...response, headers: { ...response.headers, connection: 'close' } });
          return;
        }
        logError('Unhandled HTTP failure', { requestId, error: getErrorMessage(error) });
        send(res, problemResponse(problem({ status: 500, code: 'INTERNAL', detail: 'internal error', instance: pathname, requestId }), requestId));
      });
  });
}

export async function startHttpServer(
  options: HttpServerOptions & { port: number; host?: string }
): Promise<{ server: http.Server; port: number }> {
  const server = createHttpServer(options);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => resolve());
  });
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : options.port;
  logInfo('lexlocator API listening', { port });
  return { server, port };
}

export async function stopHttpServer(server: http.Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  }).catch((error: unknown) => {
    logWarning('HTTP server did not close cleanly', { error: getErrorMessage(error) });
  });
}
