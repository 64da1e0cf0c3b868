/**
 * Corpus generation: sentences file loading, SQLite storage and the
 * per-language rebuild cache.
 */

export { CorpusCache, type CorpusCacheOptions } from "./cache.js";
export { generateSentences, type BuildDeps } from "./builder.js";
export {
  compileGrammarSource,
  loadGrammarSource,
  type GrammarSource,
  type GrammarSourceDeps,
  type SentenceTemplate,
} from "./source.js";
export { CorpusStore } from "./store.js";
export { CorpusLimitError, DependencyError, GrammarSourceError } from "./errors.js";
