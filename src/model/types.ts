/**
 * Labels ranked by score, highest first. `labels[i]` pairs with `scores[i]`.
 */
export interface ZeroShotOutput {
  labels: string[];
  scores: number[];
}

/**
 * A zero-shot text classification capability. Implementations are not
 * assumed safe for concurrent use; callers serialize through a SerialGate.
 */
export interface ZeroShotModel {
  readonly name: string;
  classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotOutput>;
}

export type ModelLoader = () => ZeroShotModel | Promise<ZeroShotModel>;

/**
 * The model could not be brought up. The service stays heuristic-only for
 * its whole lifetime after this.
 */
export class ModelInitializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelInitializationError';
  }
}

/**
 * A single model invocation failed or returned something unusable.
 * Carries the HTTP status when the backend answered with an error.
 */
export class ModelInferenceError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ModelInferenceError';
    this.status = options?.status;
  }
}
