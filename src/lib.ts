export * from "./grammar/index.js";
export * from "./corpus/index.js";
export * from "./correct/index.js";
export { createLoggers, describeError, makeLogger, silentLogger, type Logger, type Loggers } from "./ui/logger.js";
export type { BuildStats, LanguageConfig, SentenceRow, WordRow } from "./types.js";
