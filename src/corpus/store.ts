import fs from "node:fs";
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";
import type { SentenceRow, WordRow } from "../types.js";
import { DependencyError } from "./errors.js";

const SCHEMA = `
CREATE TABLE sentences (id INTEGER PRIMARY KEY AUTOINCREMENT, input_text TEXT, output_text TEXT);
CREATE TABLE words (id INTEGER PRIMARY KEY AUTOINCREMENT, word TEXT);
`;

// The WASM engine loads once per process; a failure is reported on first use.
let engine: SqlJsStatic | undefined;
let engineError: unknown;
try {
  engine = await initSqlJs();
} catch (error) {
  engineError = error;
}

function sqlite(): SqlJsStatic {
  if (!engine) {
    throw new DependencyError(
      "SQLite support is unavailable; reinstall sql.js so its WASM file is present",
      { cause: engineError }
    );
  }
  return engine;
}

function toText(value: SqlValue | undefined): string {
  return typeof value === "string" ? value : String(value ?? "");
}

function toId(value: SqlValue | undefined): number {
  return typeof value === "number" ? value : Number(value);
}

/**
 * SQLite file holding one language's corpus: every generated sentence and
 * the vocabulary of the input side.
 *
 * The database lives in memory while open. A store from `create` is written
 * to its file on close; one from `open` is read-only.
 */
export class CorpusStore {
  private constructor(
    private readonly db: Database,
    private readonly savePath: string | undefined
  ) {}

  /** Start an empty corpus that is written to `databasePath` on close. */
  static create(databasePath: string): CorpusStore {
    const db = new (sqlite().Database)();
    db.exec(SCHEMA);
    return new CorpusStore(db, databasePath);
  }

  /** Load an existing corpus file read-only. */
  static open(databasePath: string): CorpusStore {
    const data = fs.readFileSync(databasePath);
    return new CorpusStore(new (sqlite().Database)(data), undefined);
  }

  /** Run `fn` in one committed transaction. */
  transaction<T>(fn: () => T): T {
    this.db.exec("BEGIN");
    try {
      const result = fn();
      this.db.exec("COMMIT");
      return result;
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  insertSentence(inputText: string, outputText: string): void {
    this.db.run("INSERT INTO sentences (input_text, output_text) VALUES (?, ?)", [
      inputText,
      outputText,
    ]);
  }

  insertWords(words: Iterable<string>): void {
    this.transaction(() => {
      const stmt = this.db.prepare("INSERT INTO words (word) VALUES (?)");
      try {
        for (const word of words) {
          stmt.run([word]);
        }
      } finally {
        stmt.free();
      }
    });
  }

  /** Sentences in insertion order, read lazily. */
  *iterateSentences(): Generator<SentenceRow, void, undefined> {
    const stmt = this.db.prepare(
      "SELECT id, input_text, output_text FROM sentences ORDER BY id"
    );
    try {
      while (stmt.step()) {
        const [id, inputText, outputText] = stmt.get();
        yield { id: toId(id), inputText: toText(inputText), outputText: toText(outputText) };
      }
    } finally {
      stmt.free();
    }
  }

  readSentences(): SentenceRow[] {
    return [...this.iterateSentences()];
  }

  readWords(): WordRow[] {
    const [result] = this.db.exec("SELECT id, word FROM words ORDER BY id");
    return (result?.values ?? []).map(([id, word]) => ({ id: toId(id), word: toText(word) }));
  }

  countRows(): { sentences: number; words: number } {
    const count = (table: "sentences" | "words"): number =>
      toId(this.db.exec(`SELECT COUNT(*) FROM ${table}`)[0]?.values[0]?.[0] ?? 0);
    return { sentences: count("sentences"), words: count("words") };
  }

  /** Write a created store to its file, then release the database. */
  close(): void {
    try {
      if (this.savePath !== undefined) {
        fs.writeFileSync(this.savePath, this.db.export());
      }
    } finally {
      this.db.close();
    }
  }
}
