import { z } from 'zod';
import { performance } from 'node:perf_hooks';
import type { ZeroShotModel, ZeroShotOutput } from './types.js';
import { ModelInferenceError } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('huggingface');

export interface HuggingFaceOptions {
  apiToken: string;
  modelName: string;
  baseUrl: string;
  timeoutMs: number;
}

const score = z.number().min(0).max(1);

// The classic inference API answers with parallel arrays; the newer router
// answers with a ranked list of pairs.
const parallelShape = z.object({
  labels: z.array(z.string()).min(1),
  scores: z.array(score).min(1),
}).refine(r => r.labels.length === r.scores.length, {
  message: 'labels and scores differ in length',
});

const pairShape = z.array(z.object({ label: z.string(), score })).min(1);

const responseSchema = z.union([parallelShape, pairShape]);

export function normalizeZeroShotResponse(raw: unknown): ZeroShotOutput {
  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ModelInferenceError(`Malformed zero-shot response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  const data = parsed.data;
  if (Array.isArray(data)) {
    const ranked = [...data].sort((a, b) => b.score - a.score);
    return {
      labels: ranked.map(p => p.label),
      scores: ranked.map(p => p.score),
    };
  }
  return { labels: data.labels, scores: data.scores };
}

/**
 * Zero-shot classification over the Hugging Face Inference API.
 */
export class HuggingFaceZeroShotModel implements ZeroShotModel {
  readonly name: string;
  private readonly options: HuggingFaceOptions;

  constructor(options: HuggingFaceOptions) {
    this.options = options;
    this.name = options.modelName;
  }

  async classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotOutput> {
    const url = `${this.options.baseUrl}/models/${this.options.modelName}`;
    const startMs = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.options.apiToken}`,
        },
        body: JSON.stringify({
          inputs: text,
          parameters: { candidate_labels: candidateLabels },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ModelInferenceError(`Hugging Face request failed: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelInferenceError(
        `Hugging Face API error (${response.status}): ${errorText}`,
        { status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ModelInferenceError('Hugging Face response was not JSON', { cause: err });
    }

    const output = normalizeZeroShotResponse(body);
    log.debug(`${this.name} answered in ${Math.round(performance.now() - startMs)}ms`);
    return output;
  }
}
