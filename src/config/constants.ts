export const DEFAULT_SENTENCES_DIR = "sentences";
export const DEFAULT_DATABASE_DIR = "data";
export const DEFAULT_LANGUAGE = "en";

export const SENTENCES_FILE_EXTENSION = ".yaml";
export const DATABASE_FILE_EXTENSION = ".db";
export const BUILD_FILE_SUFFIX = ".tmp";

// Characters that turn a sentence into a template that must be expanded
export const TEMPLATE_CHARS = "{}[]()<>|";

// Edit costs used when snapping a transcript onto the corpus.
// Substitutions cost three times an insertion or deletion.
export const DISTANCE_WEIGHTS = {
  insertion: 1,
  deletion: 1,
  substitution: 3,
} as const;

export type DistanceWeights = {
  readonly [K in keyof typeof DISTANCE_WEIGHTS]: number;
};

export const COLOR_CODES = {
  reset: "\u001B[0m",
  corpus: "\u001B[36m", // cyan - grammar loading and corpus builds
  correct: "\u001B[32m", // green - transcript corrections
  warn: "\u001B[35m",
  error: "\u001B[31m",
  heading: "\u001B[34m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";
