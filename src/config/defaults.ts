import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { ShellsenseConfig } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '..', '..');

const configDir = process.env['SHELLSENSE_CONFIG_DIR']
  ?? path.join(os.homedir(), '.config', 'shellsense');

export const defaults: ShellsenseConfig = {
  logging: {
    level: 'info',
    historySize: 500,
  },
  model: {
    enabled: true,
    provider: 'huggingface',
    name: 'facebook/bart-large-mnli',
    apiToken: '',
    baseUrl: 'https://api-inference.huggingface.co',
    timeoutMs: 30_000,
  },
  vocabularyPath: path.join(projectRoot, 'data', 'vocabulary.json'),
  http: {
    port: 8585,
    enabled: false,
  },
};

export { configDir };
