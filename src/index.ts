export * from "./agent/index.js";
export * from "./providers/index.js";
export {
  ConfigError,
  loadConfig,
  parseConfig,
  resolveConfigPath,
  type ResilienceConfig,
  type RotationProfileConfig,
  type SteerloopConfig,
} from "./config.js";
export {
  createLogger,
  createLoggerWithCleanup,
  createSilentLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./log.js";
