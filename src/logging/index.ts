export type { LogLevel, Logger, StructuredLoggerOptions } from "./logger.js";
export {
  StructuredLogger,
  createLogger,
  describeError,
  isLogLevel,
} from "./logger.js";
