/**
 * Transcript corrector.
 *
 * Snaps a speech transcript onto the closest generated sentence and returns
 * that sentence's output text.
 */

import fs from "node:fs";
import { DISTANCE_WEIGHTS, type DistanceWeights } from "../config/constants.js";
import { CorpusStore } from "../corpus/store.js";
import type { LanguageConfig } from "../types.js";
import { silentLogger, type Logger } from "../ui/logger.js";
import { distanceLowerBound, truncateMiddle, weightedLevenshtein } from "../utils/strings.js";

export interface CorrectionDeps {
  correctLog?: Logger;
}

export interface ClosestSentence {
  inputText: string;
  outputText: string;
  distance: number;
}

export type CorrectionOutcome =
  | { kind: "no-store" }
  | { kind: "bypassed" }
  | { kind: "no-match" }
  | { kind: "rejected"; match: ClosestSentence }
  | { kind: "accepted"; match: ClosestSentence };

/**
 * First row with the smallest weighted distance from `text`, or undefined
 * when there are no rows. Ties go to the earlier row.
 */
export function findClosestSentence(
  text: string,
  rows: Iterable<{ inputText: string; outputText: string }>,
  weights: DistanceWeights = DISTANCE_WEIGHTS
): ClosestSentence | undefined {
  const textLength = Array.from(text).length;
  let best: ClosestSentence | undefined;

  for (const row of rows) {
    if (
      best &&
      distanceLowerBound(textLength, Array.from(row.inputText).length, weights) >= best.distance
    ) {
      continue;
    }

    const distance = weightedLevenshtein(text, row.inputText, weights);
    if (!best || distance < best.distance) {
      best = { inputText: row.inputText, outputText: row.outputText, distance };
      if (distance === 0) break;
    }
  }

  return best;
}

export function isBypassed(text: string, config: LanguageConfig): boolean {
  return config.noCorrectPatterns.some((pattern) => pattern.test(text));
}

/**
 * Decide what happens to `text`. A `scoreCutoff` of zero or less accepts
 * the best match at any distance.
 */
export function matchTranscript(
  text: string,
  config: LanguageConfig,
  scoreCutoff = 0
): CorrectionOutcome {
  if (!fs.statSync(config.databasePath, { throwIfNoEntry: false })?.isFile()) {
    return { kind: "no-store" };
  }

  if (isBypassed(text, config)) {
    return { kind: "bypassed" };
  }

  const store = CorpusStore.open(config.databasePath);
  try {
    const match = findClosestSentence(text, store.iterateSentences());
    if (!match) return { kind: "no-match" };
    return scoreCutoff <= 0 || match.distance <= scoreCutoff
      ? { kind: "accepted", match }
      : { kind: "rejected", match };
  } finally {
    store.close();
  }
}

function logOutcome(
  log: Logger,
  text: string,
  outcome: CorrectionOutcome,
  scoreCutoff: number,
  finalText: string
): void {
  const score = "match" in outcome ? outcome.match.distance : "-";
  log(
    `[correct] ${outcome.kind} score=${score}/${scoreCutoff}, original=${truncateMiddle(text, 120)}, final=${truncateMiddle(finalText, 120)}`
  );
}

/**
 * Output text of the closest sentence, or `text` unchanged when there is
 * no corpus, a no-correct pattern matches, or the best match is further
 * than `scoreCutoff`.
 */
export function correctSentence(
  text: string,
  config: LanguageConfig,
  scoreCutoff = 0,
  deps: CorrectionDeps = {}
): string {
  const outcome = matchTranscript(text, config, scoreCutoff);
  const finalText = outcome.kind === "accepted" ? outcome.match.outputText : text;
  logOutcome(deps.correctLog ?? silentLogger, text, outcome, scoreCutoff, finalText);
  return finalText;
}

/**
 * Like correctSentence, but a transcript that matches nothing closely
 * enough becomes the language's unknown text when one is configured.
 */
export function resolveTranscript(
  text: string,
  config: LanguageConfig,
  scoreCutoff = 0,
  deps: CorrectionDeps = {}
): string {
  const outcome = matchTranscript(text, config, scoreCutoff);
  let finalText = text;
  if (outcome.kind === "accepted") {
    finalText = outcome.match.outputText;
  } else if (
    (outcome.kind === "rejected" || outcome.kind === "no-match") &&
    config.unknownText !== undefined
  ) {
    finalText = config.unknownText;
  }
  logOutcome(deps.correctLog ?? silentLogger, text, outcome, scoreCutoff, finalText);
  return finalText;
}
