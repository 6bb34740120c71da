import { z } from 'zod';
import type { ClassificationContext, ClassificationRequest, ClassificationResult } from '../classifier/types.js';
import type { ClassificationService } from '../classifier/service.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('boundary');

// Context is advisory: unknown keys and mistyped members are tolerated and dropped.
const contextSchema = z.object({
  session_id: z.unknown().optional(),
  history: z.unknown().optional(),
}).passthrough();

export const classificationRequestSchema = z.object({
  input: z.string(),
  context: contextSchema.nullish(),
});

function toContext(raw: z.infer<typeof contextSchema> | null | undefined): ClassificationContext | null | undefined {
  if (raw === null || raw === undefined) return raw;
  const context: ClassificationContext = {};
  if (typeof raw.session_id === 'string') context.session_id = raw.session_id;
  if (Array.isArray(raw.history)) context.history = raw.history;
  return context;
}

/**
 * The payload could not be parsed or did not match the request shape.
 */
export class RequestMalformedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestMalformedError';
  }
}

export function parseClassificationRequest(payload: unknown): ClassificationRequest {
  let raw = payload;
  if (typeof payload === 'string') {
    try {
      raw = JSON.parse(payload);
    } catch (err) {
      throw new RequestMalformedError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const parsed = classificationRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      .join('; ');
    throw new RequestMalformedError(`Invalid request: ${details}`);
  }
  const { input, context } = parsed.data;
  return context === undefined ? { input } : { input, context: toContext(context) };
}

export function errorResponse(message: string): ClassificationResult {
  return {
    classification: 'prompt',
    confidence: 0.5,
    reasoning: `Classification error: ${message}`,
    metadata: {
      detected_patterns: [],
      language_indicators: [],
      error: message,
    },
  };
}

// Rebuilds the result so nothing beyond the four contract keys crosses the boundary.
function toResponse(result: ClassificationResult): ClassificationResult {
  return {
    classification: result.classification,
    confidence: result.confidence,
    reasoning: result.reasoning,
    metadata: result.metadata,
  };
}

/**
 * Classifies one request payload, either a JSON string or an already-parsed
 * value. Always resolves to a well-formed result; failures come back as the
 * error-shaped response.
 */
export async function handleClassificationRequest(
  payload: unknown,
  service: ClassificationService,
): Promise<ClassificationResult> {
  try {
    const request = parseClassificationRequest(payload);
    return toResponse(await service.classify(request));
  } catch (err) {
    return rejectClassificationRequest(err, typeof payload === 'string' ? payload : '', service);
  }
}

/**
 * Answers a request that cannot be classified with the error-shaped result,
 * and records it as a failed decision.
 */
export function rejectClassificationRequest(
  err: unknown,
  input: string,
  service: ClassificationService,
): ClassificationResult {
  const message = err instanceof Error ? err.message : String(err);
  log.error(`Classification error: ${message}`, err instanceof RequestMalformedError ? undefined : err);
  const response = errorResponse(message);
  service.recordFailure(input, response);
  return response;
}

/**
 * String-in, string-out entry point for hosts across a process or language boundary.
 */
export async function classifyRequestJson(
  requestJson: string,
  service: ClassificationService,
): Promise<string> {
  return JSON.stringify(await handleClassificationRequest(requestJson, service));
}
