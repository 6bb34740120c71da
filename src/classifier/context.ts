import type { ClassificationContext, ClassificationResult } from './types.js';

/**
 * Extension point for history-aware confidence adjustment.
 *
 * Not implemented: the result is returned unchanged. Callers invoke it only
 * when the request carries a non-empty history, so a future implementation
 * can slot in without touching the service.
 */
export function adjustForContext(
  result: ClassificationResult,
  _context: ClassificationContext,
): ClassificationResult {
  return result;
}
