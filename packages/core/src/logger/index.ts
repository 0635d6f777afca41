// Factory
export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
// Transports
export type { ConsoleTransportOptions, JsonTransportOptions } from "./transports/index.js";
export { ConsoleTransport, JsonTransport } from "./transports/index.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
export { LOG_LEVEL_COLORS, LOG_LEVEL_PRIORITY, LOG_LEVELS } from "./types.js";
