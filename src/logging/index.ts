export {
  createLogger,
  defaultLogger,
  parseLogLevel,
  type LoggerOptions,
  type LogLevelName,
  type LogOutputType,
} from "./logger.js";
