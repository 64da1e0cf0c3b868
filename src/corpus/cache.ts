import fs from "node:fs";
import path from "node:path";
import {
  BUILD_FILE_SUFFIX,
  DATABASE_FILE_EXTENSION,
  SENTENCES_FILE_EXTENSION,
} from "../config/constants.js";
import type { LanguageConfig } from "../types.js";
import { silentLogger, type Logger } from "../ui/logger.js";
import { generateSentences } from "./builder.js";
import { loadGrammarSource } from "./source.js";
import { CorpusStore } from "./store.js";

export interface CorpusCacheOptions {
  sentencesDir: string;
  databaseDir: string;
  maxSentences?: number | undefined;
  corpusLog?: Logger;
  corpusWarn?: Logger;
}

/**
 * Per-language corpus configs, rebuilt when the sentences file changes.
 *
 * A file is unchanged when both its modification time (ns) and size match
 * what was recorded at the last build. Not safe for concurrent rebuilds of
 * the same language.
 */
export class CorpusCache {
  private readonly configs = new Map<string, LanguageConfig>();
  private readonly log: Logger;
  private readonly warn: Logger;

  constructor(private readonly options: CorpusCacheOptions) {
    this.log = options.corpusLog ?? silentLogger;
    this.warn = options.corpusWarn ?? silentLogger;
  }

  sentencesPath(language: string): string {
    return path.join(this.options.sentencesDir, `${language}${SENTENCES_FILE_EXTENSION}`);
  }

  databasePath(language: string): string {
    return path.join(this.options.databaseDir, `${language}${DATABASE_FILE_EXTENSION}`);
  }

  get(language: string): LanguageConfig | undefined {
    return this.configs.get(language);
  }

  /**
   * Return the config for `language`, rebuilding its corpus first if the
   * sentences file changed since the last build. Returns undefined when the
   * sentences file is missing, empty or has no sentences.
   */
  getOrBuild(language: string): LanguageConfig | undefined {
    const sentencesPath = this.sentencesPath(language);
    const stats = fs.statSync(sentencesPath, { bigint: true, throwIfNoEntry: false });
    if (!stats?.isFile()) {
      this.warn(`Missing sentences file: ${sentencesPath}`);
      return undefined;
    }

    const cached = this.configs.get(language);
    if (
      cached &&
      cached.sentencesMtimeNs === stats.mtimeNs &&
      cached.sentencesFileSize === stats.size
    ) {
      return cached;
    }

    this.configs.delete(language);
    const source = loadGrammarSource(sentencesPath, {
      corpusLog: this.log,
      corpusWarn: this.warn,
    });
    if (!source) {
      return undefined;
    }

    fs.mkdirSync(this.options.databaseDir, { recursive: true });
    const databasePath = this.databasePath(language);
    const buildPath = `${databasePath}${BUILD_FILE_SUFFIX}`;

    // The old corpus is gone before the new one is started, and the new one
    // only appears under its real name once complete.
    fs.rmSync(databasePath, { force: true });
    fs.rmSync(buildPath, { force: true });

    try {
      const store = CorpusStore.create(buildPath);
      try {
        generateSentences(source, store, {
          corpusLog: this.log,
          corpusWarn: this.warn,
          maxSentences: this.options.maxSentences,
        });
      } finally {
        store.close();
      }
      fs.renameSync(buildPath, databasePath);
    } catch (error) {
      fs.rmSync(buildPath, { force: true });
      throw error;
    }

    const base = {
      language,
      sentencesMtimeNs: stats.mtimeNs,
      sentencesFileSize: stats.size,
      databasePath,
      noCorrectPatterns: source.noCorrectPatterns,
    };
    const config: LanguageConfig =
      source.unknownText === undefined ? base : { ...base, unknownText: source.unknownText };

    this.configs.set(language, config);
    return config;
  }

  /** Forget the cached config; the next getOrBuild rebuilds. */
  invalidate(language: string): boolean {
    return this.configs.delete(language);
  }

  clear(): void {
    this.configs.clear();
  }
}
