export { createLogger, toError, type Logger, type LoggerConfig } from "./logger";

export { logFormatSchema, logLevelSchema, type LogFormat, type LogLevel } from "./schema";
