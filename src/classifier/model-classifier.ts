import type { ClassifierOutput, Vocabulary } from './types.js';
import type { ZeroShotModel, ZeroShotOutput } from '../model/types.js';
import { ModelInferenceError } from '../model/types.js';
import { SerialGate } from '../model/serial-gate.js';
import { classifyHeuristic } from './heuristic.js';
import { attempt, withFallback } from '../utils/outcome.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('model-classifier');

/**
 * Zero-shot classification with a per-call heuristic fallback.
 *
 * The top-ranked label decides: labels in the vocabulary's shell set map to
 * `shell`, every other label to `prompt`. Confidence is the top score as
 * returned. Pattern metadata still comes from the heuristic pass so callers
 * see both signals.
 *
 * Any failure of a single invocation degrades that call, and only that call,
 * to the full heuristic result.
 */
export class ModelClassifier {
  private readonly gate: SerialGate;

  constructor(
    private readonly model: ZeroShotModel,
    private readonly vocabulary: Vocabulary,
    gate?: SerialGate,
  ) {
    this.gate = gate ?? new SerialGate();
  }

  get modelName(): string {
    return this.model.name;
  }

  async classify(text: string): Promise<ClassifierOutput> {
    const outcome = await attempt(() => this.invoke(text));

    return withFallback(
      outcome,
      (error): ClassifierOutput => {
        log.warn(`ML classification failed, falling back to heuristics: ${error.message}`);
        return { ...classifyHeuristic(text, this.vocabulary), method: 'fallback' };
      },
    );
  }

  private async invoke(text: string): Promise<ClassifierOutput> {
    const output = await this.gate.run(() => this.model.classify(text, this.vocabulary.candidateLabels));
    const { label, score } = topPrediction(output);

    const heuristic = classifyHeuristic(text, this.vocabulary);
    const mlScores: Record<string, number> = {};
    output.labels.forEach((l, i) => {
      const s = output.scores[i];
      if (s !== undefined) mlScores[l] = s;
    });

    return {
      classification: this.vocabulary.shellLabels.has(label) ? 'shell' : 'prompt',
      confidence: score,
      reasoning: `ML model classified as '${label}' with confidence ${score.toFixed(3)}`,
      metadata: {
        detected_patterns: heuristic.metadata.detected_patterns,
        language_indicators: heuristic.metadata.language_indicators,
        ml_label: label,
        ml_scores: mlScores,
      },
      method: 'model',
    };
  }
}

function topPrediction(output: ZeroShotOutput): { label: string; score: number } {
  if (output.labels.length !== output.scores.length) {
    throw new ModelInferenceError(
      `Model returned ${output.labels.length} labels but ${output.scores.length} scores`,
    );
  }
  const label = output.labels[0];
  const score = output.scores[0];
  if (label === undefined || score === undefined) {
    throw new ModelInferenceError('Model returned no labels');
  }
  if (!Number.isFinite(score) || score < 0 || score > 1) {
    throw new ModelInferenceError(`Model returned an out-of-range score: ${score}`);
  }
  return { label, score };
}
