export type LogLevel = 'log' | 'debug' | 'warn' | 'error';

export interface DebugOutputConfig {
  target: string;
  directory?: string;
}

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[] | Record<string, unknown>;
  level: string;
  output: DebugOutputConfig | string;
  lazyEvaluation: boolean;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}

/**
 * Where the configuration manager looks for settings. Tests substitute
 * temporary directories and a private environment.
 */
export interface ConfigSources {
  env: NodeJS.ProcessEnv;
  homeDir: string;
  cwd: string;
}
