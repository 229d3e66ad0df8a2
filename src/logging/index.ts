export {
  type LogLevel,
  type LogSink,
  type Logger,
  type LoggerOptions,
  LOG_LEVELS,
  isLogLevel,
  formatLine,
  createLogger,
  silentLogger,
} from "./logger";
