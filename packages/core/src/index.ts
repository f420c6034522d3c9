/**
 * @lawkit/core: configuration, logging and error types shared by lawkit packages.
 *
 * @packageDocumentation
 */

export {
  config,
  defineConfig,
  type LawkitConfig,
  type LogConfig,
  type LogLevel,
  type TagsConfig,
  type ExplorerConfig,
} from "./config.js";

export { createLogger, isLevelEnabled, type Logger } from "./logger.js";

export { LawkitError, ContractViolationError } from "./errors.js";
