import type { ShellsenseConfig } from './config/types.js';
import { loadVocabulary } from './classifier/vocabulary.js';
import { ClassificationService } from './classifier/service.js';
import { DecisionLog } from './logging/decision-log.js';
import { createModelLoader } from './model/loader.js';

export interface Runtime {
  service: ClassificationService;
  decisionLog: DecisionLog;
}

/**
 * Wires the service from configuration. Throws if the vocabulary file is
 * missing or invalid; model problems only surface later, in `initialize()`.
 */
export function createRuntime(config: ShellsenseConfig): Runtime {
  const vocabulary = loadVocabulary(config.vocabularyPath);
  const decisionLog = new DecisionLog(config.logging.historySize);
  const service = new ClassificationService({
    vocabulary,
    loadModel: createModelLoader(config.model),
    decisionLog,
  });
  return { service, decisionLog };
}
