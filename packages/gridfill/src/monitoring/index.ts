export { Logger, getLogger, redactObject } from './logger';
export type { LogLevel, LogEntry, LoggerOptions } from './logger';
