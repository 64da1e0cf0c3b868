#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";
import { removeStopwords } from "stopword";

import { COLOR_CODES } from "./config/constants.js";
import { ConfigError, parseConfig, USAGE } from "./config/parser.js";
import { CorpusCache, CorpusStore } from "./corpus/index.js";
import { resolveTranscript } from "./correct/index.js";
import type { Config } from "./types.js";
import { colorize, createLoggers, type Loggers } from "./ui/logger.js";
import { printResult, separator } from "./ui/output.js";

function runBuild(cache: CorpusCache, config: Config): void {
  const languageConfig = cache.getOrBuild(config.language);
  if (!languageConfig) {
    process.exitCode = 1;
    return;
  }

  const store = CorpusStore.open(languageConfig.databasePath);
  try {
    const { sentences, words } = store.countRows();
    printResult(`${sentences} sentence(s), ${words} word(s): ${languageConfig.databasePath}`);
  } finally {
    store.close();
  }
}

function runCorrect(cache: CorpusCache, config: Config, loggers: Loggers, text: string): void {
  const languageConfig = cache.getOrBuild(config.language);
  if (!languageConfig) {
    // Nothing to correct against
    printResult(text);
    return;
  }
  printResult(
    resolveTranscript(text, languageConfig, config.scoreCutoff, { correctLog: loggers.correctLog })
  );
}

function runVocab(cache: CorpusCache, config: Config): void {
  const languageConfig = cache.getOrBuild(config.language);
  if (!languageConfig) {
    process.exitCode = 1;
    return;
  }

  const store = CorpusStore.open(languageConfig.databasePath);
  let words: string[];
  try {
    words = store.readWords().map((row) => row.word);
  } finally {
    store.close();
  }

  if (config.contentWords) {
    words = removeStopwords(words);
  }
  words.sort((a, b) => a.localeCompare(b));

  separator(config.debug, `VOCABULARY (${words.length})`);
  for (const word of words) {
    printResult(word);
  }
}

function main(): void {
  const { config, command, text } = parseConfig();
  const loggers = createLoggers(config.debug);

  const cache = new CorpusCache({
    sentencesDir: config.sentencesDir,
    databaseDir: config.databaseDir,
    maxSentences: config.maxSentences,
    corpusLog: loggers.corpusLog,
    corpusWarn: loggers.corpusWarn,
  });

  switch (command) {
    case "build":
      runBuild(cache, config);
      break;
    case "correct":
      runCorrect(cache, config, loggers, text);
      break;
    case "vocab":
      runVocab(cache, config);
      break;
  }
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`${error.message}\n\n${USAGE}`);
  } else {
    console.error(colorize("[corpus] Fatal error:", COLOR_CODES.error), error);
  }
  process.exit(1);
}
