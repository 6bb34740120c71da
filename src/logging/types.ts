import type { ClassificationMethod, InputKind } from '../classifier/types.js';

export interface DecisionLogEntry {
  requestId: string;
  timestamp: string;
  inputHash: string;
  classification: InputKind;
  confidence: number;
  method: ClassificationMethod;
  latencyMs: number;
}

export interface AggregateStats {
  totalRequests: number;
  classificationDistribution: Record<InputKind, number>;
  methodDistribution: Record<ClassificationMethod, number>;
  /** Share of model-path calls that fell back to heuristics, 0-100. */
  fallbackPercent: number;
  avgConfidence: number;
  avgLatencyMs: number;
  periodStart: string;
  periodEnd: string;
}
