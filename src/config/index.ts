import fs from 'node:fs';
import path from 'node:path';
import type { LogLevel, ShellsenseConfig } from './types.js';
import { defaults, configDir } from './defaults.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function deepMerge<T extends PlainObject>(base: T, override: PlainObject): T {
  const result: PlainObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result as T;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Applies environment overrides on top of a merged config. Exported for tests.
 */
export function applyEnv(config: ShellsenseConfig, env: NodeJS.ProcessEnv): ShellsenseConfig {
  if (env['HF_API_TOKEN']) {
    config.model.apiToken = env['HF_API_TOKEN'];
  }
  if (env['SHELLSENSE_MODEL']) {
    config.model.name = env['SHELLSENSE_MODEL'];
  }
  const enabled = env['SHELLSENSE_MODEL_ENABLED'];
  if (enabled === 'true' || enabled === 'false') {
    config.model.enabled = enabled === 'true';
  }
  const level = env['SHELLSENSE_LOG_LEVEL'];
  if (level && isLogLevel(level)) {
    config.logging.level = level;
  }
  const port = Number.parseInt(env['SHELLSENSE_HTTP_PORT'] ?? '', 10);
  if (Number.isInteger(port) && port > 0) {
    config.http.port = port;
  }
  return config;
}

export function loadConfig(dir: string = configDir, env: NodeJS.ProcessEnv = process.env): ShellsenseConfig {
  const configFilePath = path.join(dir, 'config.json');
  let fileConfig: PlainObject = {};

  if (fs.existsSync(configFilePath)) {
    const parsed: unknown = JSON.parse(fs.readFileSync(configFilePath, 'utf-8'));
    if (!isPlainObject(parsed)) {
      throw new Error(`Config file ${configFilePath} must contain a JSON object`);
    }
    fileConfig = parsed;
  }

  // structuredClone keeps the shared defaults untouched by env overrides
  const config = deepMerge(structuredClone(defaults) as unknown as PlainObject, fileConfig) as unknown as ShellsenseConfig;
  return applyEnv(config, env);
}

export { configDir };
export type { ShellsenseConfig, LogLevel } from './types.js';
