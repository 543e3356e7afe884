export { Logger, createLogger, isLogLevel, stderrTransport } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions, Transport } from "./logger.js";
