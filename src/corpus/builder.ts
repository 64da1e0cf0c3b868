import { performance } from "node:perf_hooks";
import {
  isTemplate,
  parseSentence,
  sampleExpression,
  substituteOutput,
} from "../grammar/index.js";
import type { BuildStats } from "../types.js";
import { silentLogger, type Logger } from "../ui/logger.js";
import { splitWords } from "../utils/strings.js";
import { CorpusLimitError } from "./errors.js";
import type { GrammarSource } from "./source.js";
import type { CorpusStore } from "./store.js";

export interface BuildDeps {
  corpusLog?: Logger;
  corpusWarn?: Logger;
  /** Abort the build once more sentences than this are generated. */
  maxSentences?: number | undefined;
}

/**
 * Expand every sentence template into `store`, then record the vocabulary.
 * Each template is written in its own transaction. Any error aborts the
 * build and leaves the store incomplete; callers must discard it.
 */
export function generateSentences(
  source: GrammarSource,
  store: CorpusStore,
  deps: BuildDeps = {}
): BuildStats {
  const log = deps.corpusLog ?? silentLogger;
  const warn = deps.corpusWarn ?? silentLogger;
  const startTime = performance.now();

  let sentenceCount = 0;
  const words = new Set<string>();

  const add = (inputText: string, outputText: string): void => {
    if (deps.maxSentences !== undefined && sentenceCount >= deps.maxSentences) {
      throw new CorpusLimitError(deps.maxSentences);
    }
    store.insertSentence(inputText, outputText);
    for (const word of splitWords(inputText)) {
      words.add(word);
    }
    sentenceCount++;
  };

  for (const template of source.templates) {
    store.transaction(() => {
      for (const inputTemplate of template.inputs) {
        if (!isTemplate(inputTemplate)) {
          add(inputTemplate, template.output || inputTemplate);
          continue;
        }

        const expression = parseSentence(inputTemplate);
        for (const { inputText, outputText, substitutions } of sampleExpression(expression, {
          slotLists: source.slotLists,
          expansionRules: source.expansionRules,
          warn,
        })) {
          add(
            inputText,
            substituteOutput(template.output || outputText || inputText, substitutions)
          );
        }
      }
    });
  }

  store.insertWords(words);

  const elapsedMs = performance.now() - startTime;
  log(
    `Generated ${sentenceCount} sentence(s) with ${words.size} unique word(s) in ${(elapsedMs / 1000).toFixed(2)} second(s)`
  );

  return { sentenceCount, wordCount: words.size, elapsedMs };
}
