import http from 'node:http';
import type { HandlerDeps } from './http-handlers.js';
import { handleClassify, handleHealth, handleStats, sendError, sendJson } from './http-handlers.js';
import { RequestMalformedError, rejectClassificationRequest } from './boundary.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface HttpServerOptions {
  /** Bodies past this size are drained and answered with the error shape. */
  maxBodyBytes?: number;
}

interface RequestBody {
  text: string;
  truncated: boolean;
}

// Past the limit the rest of the body is read and discarded.
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<RequestBody> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let truncated = false;
    req.on('data', (chunk: Buffer) => {
      if (truncated) return;
      size += chunk.length;
      if (size > maxBytes) {
        truncated = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve({ text: Buffer.concat(chunks).toString('utf-8'), truncated }));
    req.on('error', reject);
  });
}

async function route(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
  maxBodyBytes: number,
): Promise<void> {
  const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

  if (req.method === 'GET' && pathname === '/health') {
    handleHealth(req, res, deps);
    return;
  }
  if (req.method === 'GET' && pathname === '/stats') {
    handleStats(req, res, deps);
    return;
  }
  if (req.method === 'POST' && pathname === '/classify') {
    const body = await readBody(req, maxBodyBytes);
    if (body.truncated) {
      sendJson(res, 200, rejectClassificationRequest(new RequestMalformedError('Request body too large'), '', deps.service));
      return;
    }
    await handleClassify(body.text, res, deps);
    return;
  }
  sendError(res, 404, 'Not found');
}

export function createHttpServer(deps: HandlerDeps, options: HttpServerOptions = {}): http.Server {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  return http.createServer((req, res) => {
    route(req, res, deps, maxBodyBytes).catch((err: unknown) => {
      log.error(`${req.method ?? '?'} ${req.url ?? '/'} failed`, err);
      if (!res.headersSent) {
        sendError(res, 500, err instanceof Error ? err.message : String(err));
      } else {
        res.end();
      }
    });
  });
}
