import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  compileGrammarSource,
  GrammarSourceError,
  loadGrammarSource,
} from "../src/corpus/index.js";
import { text } from "../src/grammar/index.js";
import { makeTempDir, removeDir, writeGrammar } from "./helpers.js";

describe("compileGrammarSource", () => {
  it("returns nothing for an empty document", () => {
    const corpusWarn = vi.fn();
    expect(compileGrammarSource(null, "en.yaml", { corpusWarn })).toBeUndefined();
    expect(corpusWarn).toHaveBeenCalledWith("Empty YAML file: en.yaml");
  });

  it("returns nothing without sentences", () => {
    const corpusWarn = vi.fn();
    expect(compileGrammarSource({ lists: {} }, "en.yaml", { corpusWarn })).toBeUndefined();
    expect(compileGrammarSource({ sentences: [] }, "en.yaml", { corpusWarn })).toBeUndefined();
    expect(compileGrammarSource({ sentences: "" }, "en.yaml", { corpusWarn })).toBeUndefined();
    expect(compileGrammarSource({ sentences: null }, "en.yaml", { corpusWarn })).toBeUndefined();
    expect(corpusWarn).toHaveBeenCalledTimes(4);
    expect(corpusWarn).toHaveBeenCalledWith("No sentences in en.yaml");
  });

  it("reads every sentence form", () => {
    const source = compileGrammarSource(
      {
        sentences: ["turn on the light", { in: "what time is it", out: "time" }, { in: ["a", "b"] }],
      },
      "en.yaml"
    );
    expect(source?.templates).toEqual([
      { inputs: ["turn on the light"] },
      { inputs: ["what time is it"], output: "time" },
      { inputs: ["a", "b"] },
    ]);
  });

  it("expands templated list inputs into separate values", () => {
    const source = compileGrammarSource(
      {
        sentences: ["the {colors} car"],
        lists: {
          colors: ["red", { in: "(navy|sky) blue", out: "blue" }],
          numbers: { values: [1, 2] },
        },
      },
      "en.yaml"
    );
    expect(source?.slotLists.get("colors")?.values).toEqual([
      { input: text("red"), output: "red" },
      { input: text("navy blue"), output: "blue" },
      { input: text("sky blue"), output: "blue" },
    ]);
    expect(source?.slotLists.get("numbers")?.values).toEqual([
      { input: text("1"), output: "1" },
      { input: text("2"), output: "2" },
    ]);
  });

  it("skips lists without values", () => {
    const corpusWarn = vi.fn();
    const source = compileGrammarSource(
      { sentences: ["a"], lists: { empty: { values: [] } } },
      "en.yaml",
      { corpusWarn }
    );
    expect(source?.slotLists.has("empty")).toBe(false);
    expect(corpusWarn).toHaveBeenCalledWith("No values for list empty, skipping");
  });

  it("anchors no-correct patterns at the start", () => {
    const source = compileGrammarSource(
      { sentences: ["a"], no_correct_patterns: ["^yes$", "no"] },
      "en.yaml"
    );
    const [yes, no] = source?.noCorrectPatterns ?? [];
    expect(yes?.test("yes")).toBe(true);
    expect(yes?.test("yes please")).toBe(false);
    expect(no?.test("no way")).toBe(true);
    expect(no?.test("say no")).toBe(false);
  });

  it("keeps the unknown text", () => {
    const source = compileGrammarSource(
      { sentences: ["a"], unknown_text: "[unk]" },
      "en.yaml"
    );
    expect(source?.unknownText).toBe("[unk]");
  });

  it("rejects malformed sections", () => {
    expect(() => compileGrammarSource({ sentences: "a" }, "en.yaml")).toThrow(
      "en.yaml: sentences must be a list"
    );
    expect(() => compileGrammarSource({ sentences: [{ out: "x" }] }, "en.yaml")).toThrow(
      "en.yaml: sentences[0].in must be a string or a list of strings"
    );
    expect(() =>
      compileGrammarSource({ sentences: ["a"], expansion_rules: ["x"] }, "en.yaml")
    ).toThrow(GrammarSourceError);
    expect(() =>
      compileGrammarSource({ sentences: ["a"], no_correct_patterns: ["("] }, "en.yaml")
    ).toThrow(GrammarSourceError);
    expect(() =>
      compileGrammarSource({ sentences: ["a"], lists: { colors: [{ in: "red" }] } }, "en.yaml")
    ).toThrow('en.yaml: lists.colors[0] needs string "in" and "out"');
  });
});

describe("loadGrammarSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("reads a YAML file", () => {
    const filePath = writeGrammar(dir, "en", {
      sentences: ["turn on the <area> light"],
      expansion_rules: { area: "(kitchen|hall)" },
    });
    const source = loadGrammarSource(filePath);
    expect(source?.templates).toEqual([{ inputs: ["turn on the <area> light"] }]);
    expect(source?.expansionRules.has("area")).toBe(true);
  });

  it("returns nothing for a missing or empty file", () => {
    const corpusWarn = vi.fn();
    const missing = path.join(dir, "fr.yaml");
    expect(loadGrammarSource(missing, { corpusWarn })).toBeUndefined();
    expect(corpusWarn).toHaveBeenCalledWith(`Missing sentences file: ${missing}`);

    const empty = path.join(dir, "de.yaml");
    fs.writeFileSync(empty, "");
    expect(loadGrammarSource(empty, { corpusWarn })).toBeUndefined();
    expect(corpusWarn).toHaveBeenCalledWith(`Empty YAML file: ${empty}`);
  });

  it("wraps YAML syntax errors", () => {
    const broken = path.join(dir, "en.yaml");
    fs.writeFileSync(broken, "sentences: [a, b\n");
    expect(() => loadGrammarSource(broken)).toThrow(GrammarSourceError);
  });
});
