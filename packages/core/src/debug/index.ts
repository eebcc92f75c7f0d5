export { DebugLogger } from './DebugLogger.js';
export { ConfigurationManager } from './ConfigurationManager.js';
export { FileOutput } from './FileOutput.js';
export type {
  ConfigSources,
  DebugOutputConfig,
  DebugSettings,
  LogEntry,
  LogLevel,
} from './types.js';
