export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener } from "./journal.js";
export { ConsoleLogger, silentLogger, parseLogLevel } from "./logger.js";
export type { LogLevel } from "./logger.js";
