import http from 'node:http';
import type { ClassificationService } from '../classifier/service.js';
import type { DecisionLog } from '../logging/decision-log.js';
import { computeStats } from '../logging/stats.js';
import { handleClassificationRequest } from './boundary.js';

export interface HandlerDeps {
  service: ClassificationService;
  decisionLog: DecisionLog;
}

// ─── GET /health ───────────────────────────────────────────────────────

export function handleHealth(
  _req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
): void {
  sendJson(res, 200, {
    status: 'ok',
    mode: deps.service.mode,
    uptime: Math.round(process.uptime()),
  });
}

// ─── GET /stats ────────────────────────────────────────────────────────

export function handleStats(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
): void {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const limit = parseInt(url.searchParams.get('limit') ?? '', 10) || deps.decisionLog.size;
  sendJson(res, 200, computeStats(deps.decisionLog.tail(limit)));
}

// ─── POST /classify ────────────────────────────────────────────────────

/**
 * The body goes to the boundary adapter as raw text, so a malformed body
 * still gets the error-shaped classification with status 200.
 */
export async function handleClassify(
  body: string,
  res: http.ServerResponse,
  deps: HandlerDeps,
): Promise<void> {
  const result = await handleClassificationRequest(body, deps.service);
  sendJson(res, 200, result);
}

export function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data, null, 2);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

export function sendError(res: http.ServerResponse, status: number, message: string): void {
  sendJson(res, status, { error: message });
}
