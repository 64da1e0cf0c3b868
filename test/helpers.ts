import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { stringify as stringifyYAML } from "yaml";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sentence-corpus-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write `<dir>/<language>.yaml` and return its path. */
export function writeGrammar(dir: string, language: string, grammar: unknown): string {
  const filePath = path.join(dir, `${language}.yaml`);
  fs.writeFileSync(filePath, stringifyYAML(grammar), "utf8");
  return filePath;
}
