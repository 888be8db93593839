// @commitrelay/core — configuration, errors, logging and repository targets

export {
  RelayError,
  ConfigurationError,
  UpstreamUnavailableError,
  DeliveryFailedError,
  PersistenceError,
  errorMessage,
} from "./errors.js";
export type { RelayErrorCode } from "./errors.js";

export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel, LogSink, LoggerOptions } from "./logger.js";

export {
  parseRepoTarget,
  targetKey,
  formatTarget,
  sameTarget,
  isValidRepo,
  isValidBranch,
} from "./targets.js";
export type { RepoTarget } from "./targets.js";

export {
  loadConfig,
  loadEnvFile,
  DEFAULT_CONFIG_FILE,
  DEFAULT_GITHUB_API_URL,
} from "./config.js";
export type { RelayConfig, TitleStyle, LoadConfigOptions } from "./config.js";
