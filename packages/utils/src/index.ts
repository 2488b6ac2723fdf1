export { LogLevel, logger, type LogRecord, type LogSink, type ScopedLogger } from "./logger";
