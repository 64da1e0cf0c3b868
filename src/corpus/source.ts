/**
 * Sentences file loader.
 *
 * Example <language>.yaml:
 *
 * ```yaml
 * sentences:
 *   - turn on the light               # same text in and out
 *   - in: what time is it
 *     out: time
 *   - in:
 *       - set (the|a) timer
 *       - start a timer
 *     out: timer
 *   - the {colors} car
 * lists:
 *   colors:
 *     - red
 *     - in: (navy|sky) blue
 *       out: blue
 * expansion_rules:
 *   area: (kitchen|living room)
 * no_correct_patterns:
 *   - ^yes$
 * unknown_text: "[unknown]"
 * ```
 */

import fs from "node:fs";
import { parse as parseYAML } from "yaml";
import {
  isTemplate,
  parseSentence,
  sampleExpression,
  text,
  type ExpansionRules,
  type Expression,
  type ListValue,
  type SlotList,
  type SlotLists,
} from "../grammar/index.js";
import { describeError, silentLogger, type Logger } from "../ui/logger.js";
import { GrammarSourceError } from "./errors.js";

export interface SentenceTemplate {
  /** One or more input templates sharing the same output. */
  inputs: string[];
  output?: string;
}

export interface GrammarSource {
  templates: SentenceTemplate[];
  slotLists: SlotLists;
  expansionRules: ExpansionRules;
  noCorrectPatterns: RegExp[];
  unknownText?: string;
}

export interface GrammarSourceDeps {
  corpusLog?: Logger;
  corpusWarn?: Logger;
}

type Scalar = string | number;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number";
}

/**
 * Read and compile the sentences file at `sourcePath`.
 *
 * Returns undefined (after a warning) when the file is missing, empty or
 * declares no sentences. Malformed content throws GrammarSourceError.
 */
export function loadGrammarSource(
  sourcePath: string,
  deps: GrammarSourceDeps = {}
): GrammarSource | undefined {
  const warn = deps.corpusWarn ?? silentLogger;
  const log = deps.corpusLog ?? silentLogger;

  if (!fs.statSync(sourcePath, { throwIfNoEntry: false })?.isFile()) {
    warn(`Missing sentences file: ${sourcePath}`);
    return undefined;
  }

  log(`Loading ${sourcePath}`);
  let document: unknown;
  try {
    document = parseYAML(fs.readFileSync(sourcePath, "utf8"));
  } catch (error) {
    throw new GrammarSourceError(describeError(error), sourcePath);
  }

  return compileGrammarSource(document, sourcePath, deps);
}

export function compileGrammarSource(
  document: unknown,
  sourcePath: string,
  deps: GrammarSourceDeps = {}
): GrammarSource | undefined {
  const warn = deps.corpusWarn ?? silentLogger;

  if (document === null || document === undefined || document === "") {
    warn(`Empty YAML file: ${sourcePath}`);
    return undefined;
  }
  if (!isRecord(document)) {
    throw new GrammarSourceError("top level must be a mapping", sourcePath);
  }

  const sentences = document["sentences"];
  if (
    sentences === undefined ||
    sentences === null ||
    sentences === "" ||
    (Array.isArray(sentences) && sentences.length === 0)
  ) {
    warn(`No sentences in ${sourcePath}`);
    return undefined;
  }

  const source: GrammarSource = {
    templates: compileTemplates(sentences, sourcePath),
    slotLists: compileLists(document["lists"], sourcePath, warn),
    expansionRules: compileRules(document["expansion_rules"], sourcePath),
    noCorrectPatterns: compilePatterns(document["no_correct_patterns"], sourcePath),
  };

  const unknownText = document["unknown_text"];
  if (unknownText !== undefined && unknownText !== null) {
    if (!isScalar(unknownText)) {
      throw new GrammarSourceError("unknown_text must be a string", sourcePath);
    }
    source.unknownText = String(unknownText);
  }

  return source;
}

function compileTemplates(sentences: unknown, sourcePath: string): SentenceTemplate[] {
  if (!Array.isArray(sentences)) {
    throw new GrammarSourceError("sentences must be a list", sourcePath);
  }

  return sentences.map((entry: unknown, index): SentenceTemplate => {
    if (isScalar(entry)) {
      return { inputs: [String(entry)] };
    }
    if (!isRecord(entry)) {
      throw new GrammarSourceError(`sentences[${index}] must be a string or mapping`, sourcePath);
    }

    const input = entry["in"];
    let inputs: string[];
    if (isScalar(input)) {
      inputs = [String(input)];
    } else if (Array.isArray(input) && input.length > 0 && input.every(isScalar)) {
      inputs = input.map(String);
    } else {
      throw new GrammarSourceError(
        `sentences[${index}].in must be a string or a list of strings`,
        sourcePath
      );
    }

    const output = entry["out"];
    if (output === undefined || output === null) {
      return { inputs };
    }
    if (!isScalar(output)) {
      throw new GrammarSourceError(`sentences[${index}].out must be a string`, sourcePath);
    }
    return { inputs, output: String(output) };
  });
}

function compileLists(lists: unknown, sourcePath: string, warn: Logger): SlotLists {
  const slotLists = new Map<string, SlotList>();
  if (lists === undefined || lists === null) return slotLists;
  if (!isRecord(lists)) {
    throw new GrammarSourceError("lists must be a mapping", sourcePath);
  }

  for (const [listName, listInfo] of Object.entries(lists)) {
    const rawValues: unknown = Array.isArray(listInfo)
      ? listInfo
      : isRecord(listInfo)
        ? listInfo["values"]
        : undefined;

    if (
      rawValues === undefined ||
      rawValues === null ||
      (Array.isArray(rawValues) && rawValues.length === 0)
    ) {
      warn(`No values for list ${listName}, skipping`);
      continue;
    }
    if (!Array.isArray(rawValues)) {
      throw new GrammarSourceError(`lists.${listName}.values must be a list`, sourcePath);
    }

    const values: ListValue[] = [];
    for (const [index, rawValue] of rawValues.entries()) {
      values.push(...compileListValue(rawValue, `lists.${listName}[${index}]`, sourcePath));
    }
    slotLists.set(listName, { name: listName, values });
  }

  return slotLists;
}

/**
 * A templated `in` is expanded here so each surface form becomes its own
 * value with the shared `out`.
 */
function compileListValue(rawValue: unknown, label: string, sourcePath: string): ListValue[] {
  if (isScalar(rawValue)) {
    const value = String(rawValue);
    return [{ input: text(value), output: value }];
  }
  if (!isRecord(rawValue)) {
    throw new GrammarSourceError(`${label} must be a string or mapping`, sourcePath);
  }

  const valueIn = rawValue["in"];
  const valueOut = rawValue["out"];
  if (!isScalar(valueIn) || !isScalar(valueOut)) {
    throw new GrammarSourceError(`${label} needs string "in" and "out"`, sourcePath);
  }

  const output = String(valueOut);
  const input = String(valueIn);
  if (!isTemplate(input)) {
    return [{ input: text(input), output }];
  }

  const expanded: ListValue[] = [];
  for (const sampled of sampleExpression(parseSentence(input))) {
    expanded.push({ input: text(sampled.inputText), output });
  }
  return expanded;
}

function compileRules(rules: unknown, sourcePath: string): ExpansionRules {
  const expansionRules = new Map<string, Expression>();
  if (rules === undefined || rules === null) return expansionRules;
  if (!isRecord(rules)) {
    throw new GrammarSourceError("expansion_rules must be a mapping", sourcePath);
  }

  for (const [ruleName, ruleText] of Object.entries(rules)) {
    if (!isScalar(ruleText)) {
      throw new GrammarSourceError(`expansion_rules.${ruleName} must be a string`, sourcePath);
    }
    expansionRules.set(ruleName, parseSentence(String(ruleText)));
  }
  return expansionRules;
}

/** Patterns only match at the start of a transcript. */
function compilePatterns(patterns: unknown, sourcePath: string): RegExp[] {
  if (patterns === undefined || patterns === null) return [];
  if (!Array.isArray(patterns) || !patterns.every((p) => typeof p === "string")) {
    throw new GrammarSourceError("no_correct_patterns must be a list of strings", sourcePath);
  }

  return patterns.map((pattern: string) => {
    try {
      return new RegExp(`^(?:${pattern})`);
    } catch (error) {
      throw new GrammarSourceError(
        `invalid no_correct_patterns entry "${pattern}": ${describeError(error)}`,
        sourcePath
      );
    }
  });
}
