/**
 * @pegcode/core
 *
 * Configuration, logging and the error base shared by every pegcode package.
 *
 * @module
 */

export {
  config,
  defineConfig,
  parseEnvConfig,
  readConfigFiles,
  DEFAULT_CONFIG,
  type PegcodeConfig,
  type ResolvedConfig,
  type VmConfig,
  type EmitConfig,
  type EmitFormat,
} from "./config.js";

export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogLevel } from "./logger.js";

export { PegcodeError, ConfigError, ErrorCode, isPegcodeError, lineCol } from "./errors.js";
