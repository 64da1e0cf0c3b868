export interface Config {
  sentencesDir: string;
  databaseDir: string;
  language: string;
  scoreCutoff: number;
  maxSentences: number | undefined;
  debug: boolean;
  contentWords: boolean;
}

export type Command = "build" | "correct" | "vocab";

export interface ParseResult {
  config: Config;
  command: Command;
  /** Transcript to correct, joined from the positional arguments. */
  text: string;
}

/**
 * Loaded state for one language. Replaced as a whole when the sentences
 * file changes, never updated in place.
 */
export interface LanguageConfig {
  readonly language: string;
  readonly sentencesMtimeNs: bigint;
  readonly sentencesFileSize: bigint;
  readonly databasePath: string;
  readonly noCorrectPatterns: readonly RegExp[];
  readonly unknownText?: string;
}

export interface SentenceRow {
  id: number;
  inputText: string;
  outputText: string;
}

export interface WordRow {
  id: number;
  word: string;
}

export interface BuildStats {
  sentenceCount: number;
  wordCount: number;
  elapsedMs: number;
}
