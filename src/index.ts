export * from "./rules/index.js";
export {
  createLogger,
  parseLogLevel,
  setLogLevel,
} from "./util/logger.js";
export type { Logger, LogLevel } from "./util/logger.js";
