import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import type { Command, ParseResult } from "../types.js";
import { describeError } from "../ui/logger.js";
import {
  DEFAULT_DATABASE_DIR,
  DEFAULT_LANGUAGE,
  DEFAULT_SENTENCES_DIR,
} from "./constants.js";

const COMMANDS: readonly Command[] = ["build", "correct", "vocab"];

export const USAGE = `Usage: sentence-corpus <command> [options]

Commands:
  build              Generate the corpus for a language
  correct <text...>  Snap a transcript onto the corpus
  vocab              List the corpus vocabulary

Options:
  --sentences-dir <dir>   Directory with <language>.yaml files (SENTENCES_DIR)
  --database-dir <dir>    Directory for <language>.db files (DATABASE_DIR)
  --language <code>       Language to load (LANGUAGE)
  --score-cutoff <n>      Maximum accepted distance, 0 = any (SCORE_CUTOFF)
  --max-sentences <n>     Abort builds larger than this (MAX_SENTENCES)
  --content-words         vocab: leave out stopwords
  --debug                 Verbose logging (DEBUG)`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function resolveDir(dir: string): string {
  return path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
}

function parseNonNegative(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed) || parsed < 0) {
    throw new ConfigError(`--${name} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new ConfigError(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        "sentences-dir": {
          type: "string",
          default: process.env["SENTENCES_DIR"] ?? DEFAULT_SENTENCES_DIR,
        },
        "database-dir": {
          type: "string",
          default: process.env["DATABASE_DIR"] ?? DEFAULT_DATABASE_DIR,
        },
        language: {
          type: "string",
          short: "l",
          default: process.env["LANGUAGE"] ?? DEFAULT_LANGUAGE,
        },
        "score-cutoff": {
          type: "string",
          default: process.env["SCORE_CUTOFF"] ?? "0",
        },
        "max-sentences": {
          type: "string",
          default: process.env["MAX_SENTENCES"] ?? "",
        },
        "content-words": {
          type: "boolean",
          default: false,
        },
        debug: {
          type: "boolean",
          default:
            process.env["DEBUG"] === "1" || process.env["DEBUG"] === "true",
        },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new ConfigError(describeError(error));
  }
}

export function parseConfig(args: string[] = process.argv.slice(2)): ParseResult {
  const { values, positionals } = readArgs(args);
  const [command, ...rest] = positionals;
  if (!isCommand(command)) {
    throw new ConfigError(
      command ? `Unknown command "${command}"` : "Missing command"
    );
  }

  const text = rest.join(" ").trim();
  if (command === "correct" && !text) {
    throw new ConfigError("correct needs the text to correct");
  }

  return {
    config: {
      sentencesDir: resolveDir(values["sentences-dir"] ?? DEFAULT_SENTENCES_DIR),
      databaseDir: resolveDir(values["database-dir"] ?? DEFAULT_DATABASE_DIR),
      language: values.language ?? DEFAULT_LANGUAGE,
      scoreCutoff: parseNonNegative("score-cutoff", values["score-cutoff"] ?? "0"),
      maxSentences: parsePositiveInt("max-sentences", values["max-sentences"]),
      debug: values.debug ?? false,
      contentWords: values["content-words"] ?? false,
    },
    command,
    text,
  };
}
