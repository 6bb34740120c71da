import type { ShellsenseConfig } from '../config/types.js';
import type { ModelLoader, ZeroShotModel } from './types.js';
import { ModelInitializationError } from './types.js';
import { HuggingFaceZeroShotModel } from './huggingface.js';

/**
 * Builds the loader the service runs once at startup. The loader throws
 * ModelInitializationError when the model path is switched off or has no
 * credentials, which leaves the service heuristic-only.
 */
export function createModelLoader(modelConfig: ShellsenseConfig['model']): ModelLoader {
  return (): ZeroShotModel => {
    if (!modelConfig.enabled) {
      throw new ModelInitializationError('Model classification is disabled by configuration');
    }
    if (!modelConfig.apiToken) {
      throw new ModelInitializationError(`No API token configured for ${modelConfig.provider} model ${modelConfig.name}`);
    }
    return new HuggingFaceZeroShotModel({
      apiToken: modelConfig.apiToken,
      modelName: modelConfig.name,
      baseUrl: modelConfig.baseUrl,
      timeoutMs: modelConfig.timeoutMs,
    });
  };
}
