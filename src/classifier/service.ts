import crypto from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type {
  ClassificationMethod,
  ClassificationRequest,
  ClassificationResult,
  ClassifierOutput,
  Vocabulary,
} from './types.js';
import type { ModelLoader } from '../model/types.js';
import { ModelInitializationError } from '../model/types.js';
import type { DecisionLog } from '../logging/decision-log.js';
import type { DecisionLogEntry } from '../logging/types.js';
import { ModelClassifier } from './model-classifier.js';
import { classifyHeuristic } from './heuristic.js';
import { preprocess } from './preprocess.js';
import { adjustForContext } from './context.js';
import { hashInput } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('classification-service');

export type ServiceMode = 'uninitialized' | 'model' | 'heuristic';

export interface ClassificationServiceOptions {
  vocabulary: Vocabulary;
  /** Omit to run heuristic-only. */
  loadModel?: ModelLoader;
  decisionLog?: DecisionLog;
}

/**
 * Picks the classification path and assembles results.
 *
 * The model is brought up at most once per service through `initialize()`.
 * If that fails the service stays heuristic-only; it is never retried.
 */
export class ClassificationService {
  private readonly vocabulary: Vocabulary;
  private readonly loadModel: ModelLoader | undefined;
  private readonly decisionLog: DecisionLog | undefined;
  private initPromise: Promise<ModelClassifier | null> | null = null;
  private currentMode: ServiceMode = 'uninitialized';
  private modelClassifier: ModelClassifier | null = null;

  constructor(options: ClassificationServiceOptions) {
    this.vocabulary = options.vocabulary;
    this.loadModel = options.loadModel;
    this.decisionLog = options.decisionLog;
  }

  get mode(): ServiceMode {
    return this.currentMode;
  }

  get modelName(): string | null {
    return this.modelClassifier?.modelName ?? null;
  }

  /**
   * Brings the model up once. Concurrent and later callers share the first
   * attempt's outcome. Never rejects.
   */
  initialize(): Promise<ModelClassifier | null> {
    if (!this.initPromise) {
      this.initPromise = this.bringUpModel();
    }
    return this.initPromise;
  }

  async classify(request: ClassificationRequest): Promise<ClassificationResult> {
    const startMs = performance.now();
    const { input, context } = request;

    if (!input || !input.trim()) {
      const result: ClassificationResult = {
        classification: 'shell',
        confidence: 1.0,
        reasoning: 'Empty input defaults to shell',
        metadata: { detected_patterns: [], language_indicators: [] },
      };
      this.record(input, result, 'empty', startMs);
      return result;
    }

    const text = preprocess(input);
    const model = await this.initialize();

    const output: ClassifierOutput = model
      ? await model.classify(text)
      : { ...classifyHeuristic(text, this.vocabulary), method: 'heuristic' };

    const { method, ...assembled } = output;
    let result: ClassificationResult = assembled;

    if (context?.history && context.history.length > 0) {
      result = adjustForContext(result, context);
    }

    this.record(input, result, method, startMs);
    return result;
  }

  /**
   * Records a decision made outside `classify`, such as a boundary failure.
   */
  recordFailure(input: string, result: ClassificationResult): void {
    this.decisionLog?.append(this.entryFor(input, result, 'error', 0));
  }

  private async bringUpModel(): Promise<ModelClassifier | null> {
    if (!this.loadModel) {
      log.info('No model loader configured, using heuristic classification');
      this.currentMode = 'heuristic';
      return null;
    }

    try {
      const model = await this.loadModel();
      this.modelClassifier = new ModelClassifier(model, this.vocabulary);
      this.currentMode = 'model';
      log.info(`Initialized classifier with model: ${model.name}`);
      return this.modelClassifier;
    } catch (err) {
      const failure = err instanceof ModelInitializationError
        ? err
        : new ModelInitializationError(
          `Model initialization failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      log.warn(`${failure.message}. Falling back to heuristic classification`);
      this.currentMode = 'heuristic';
      return null;
    }
  }

  private record(
    input: string,
    result: ClassificationResult,
    method: ClassificationMethod,
    startMs: number,
  ): void {
    if (!this.decisionLog) return;
    this.decisionLog.append(this.entryFor(input, result, method, Math.round(performance.now() - startMs)));
  }

  private entryFor(input: string, result: ClassificationResult, method: ClassificationMethod, latencyMs: number): DecisionLogEntry {
    return {
      requestId: crypto.randomUUID(),
      timestamp: new Date().toISOString(),
      inputHash: hashInput(input),
      classification: result.classification,
      confidence: result.confidence,
      method,
      latencyMs,
    };
  }
}
