export type InputKind = 'shell' | 'prompt';

export type ClassificationMethod = 'empty' | 'heuristic' | 'model' | 'fallback' | 'error';

export interface ClassificationContext {
  session_id?: string;
  history?: unknown[];
}

export interface ClassificationRequest {
  input: string;
  context?: ClassificationContext | null;
}

/** Field names are the wire contract and stay snake_case. */
export interface ClassificationMetadata {
  detected_patterns: string[];
  language_indicators: string[];
  ml_label?: string;
  ml_scores?: Record<string, number>;
  error?: string;
}

export interface ClassificationResult {
  classification: InputKind;
  confidence: number;
  reasoning: string;
  metadata: ClassificationMetadata;
}

/**
 * A result plus the path that produced it.
 */
export interface ClassifierOutput extends ClassificationResult {
  method: ClassificationMethod;
}

export interface Vocabulary {
  shellCommands: ReadonlySet<string>;
  /** Ordered: indicators are reported in this order. */
  promptIndicators: readonly string[];
  interrogatives: readonly string[];
  candidateLabels: readonly string[];
  shellLabels: ReadonlySet<string>;
}
