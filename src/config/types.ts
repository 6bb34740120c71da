export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ShellsenseConfig {
  logging: {
    level: LogLevel;
    /** Number of recent decisions kept in memory for stats. */
    historySize: number;
  };

  model: {
    enabled: boolean;
    provider: 'huggingface';
    name: string;
    apiToken: string;
    baseUrl: string;
    timeoutMs: number;
  };

  vocabularyPath: string;

  http: {
    port: number;
    enabled: boolean;
  };
}
