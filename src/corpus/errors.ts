export class GrammarSourceError extends Error {
  constructor(
    message: string,
    readonly sourcePath: string
  ) {
    super(`${sourcePath}: ${message}`);
    this.name = "GrammarSourceError";
  }
}

export class CorpusLimitError extends Error {
  constructor(readonly maxSentences: number) {
    super(`Grammar produces more than ${maxSentences} sentence(s)`);
    this.name = "CorpusLimitError";
  }
}

/** A required runtime capability could not be loaded. */
export class DependencyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DependencyError";
  }
}
