import { describe, expect, it, vi } from "vitest";
import {
  alternative,
  emptySubstitutions,
  listRef,
  MissingListError,
  MissingRuleError,
  parseSentence,
  ruleRef,
  sampleExpression,
  text,
  type ExpansionRules,
  type SlotLists,
} from "../src/grammar/index.js";

const slotLists: SlotLists = new Map([
  [
    "colors",
    {
      name: "colors",
      values: [
        { input: alternative(text("crimson"), text("scarlet")), output: "red" },
        { input: text("blue"), output: "blue" },
        { input: text("green") },
      ],
    },
  ],
  ["sizes", { name: "sizes", values: [{ input: text("big"), output: "large" }] }],
  ["empty", { name: "empty", values: [] }],
]);

const expansionRules: ExpansionRules = new Map([
  ["area", parseSentence("(kitchen|living room)")],
  ["action", parseSentence("(switch|turn) on")],
]);

function inputs(template: string): string[] {
  return [...sampleExpression(parseSentence(template), { slotLists, expansionRules })].map(
    (s) => s.inputText
  );
}

describe("sampleExpression", () => {
  it("yields a single literal unchanged with no substitutions", () => {
    expect([...sampleExpression(text("hello"))]).toEqual([
      { inputText: "hello", outputText: "hello", substitutions: emptySubstitutions() },
    ]);
  });

  it("yields one sentence per alternative in order", () => {
    const sampled = [...sampleExpression(alternative(text("a"), text("b"), text("c")))];
    expect(sampled.map((s) => s.inputText)).toEqual(["a", "b", "c"]);
  });

  it("expands concatenations as a product with the leftmost item slowest", () => {
    expect(inputs("(a|b|c) (x|y)")).toEqual(["a x", "a y", "b x", "b y", "c x", "c y"]);
  });

  it("collapses whitespace left by empty optionals", () => {
    expect(inputs("turn on [the] light")).toEqual(["turn on the light", "turn on light"]);
  });

  it("gives the declared list output to the first surface form only", () => {
    const sampled = [
      ...sampleExpression(parseSentence("the {colors} car"), { slotLists, expansionRules }),
    ];
    expect(sampled.map((s) => [s.inputText, s.outputText])).toEqual([
      ["the crimson car", "the red car"],
      ["the scarlet car", "the car"],
      ["the blue car", "the blue car"],
      ["the green car", "the green car"],
    ]);
    expect(sampled.map((s) => s.substitutions.lists.get("colors"))).toEqual([
      "red",
      "red",
      "blue",
      "green",
    ]);
  });

  it("records list choices from every concatenated item", () => {
    const [first] = sampleExpression(parseSentence("a {sizes} {colors} box"), {
      slotLists,
      expansionRules,
    });
    expect(first?.outputText).toBe("a large red box");
    expect(Object.fromEntries(first?.substitutions.lists ?? [])).toEqual({
      sizes: "large",
      colors: "red",
    });
  });

  it("keeps sibling alternatives from seeing each other's choices", () => {
    const sampled = [
      ...sampleExpression(parseSentence("({sizes}|{colors})"), { slotLists, expansionRules }),
    ];
    expect([...(sampled[0]?.substitutions.lists.keys() ?? [])]).toEqual(["sizes"]);
    expect([...(sampled[1]?.substitutions.lists.keys() ?? [])]).toEqual(["colors"]);
  });

  it("records the chosen expansion of a rule", () => {
    const sampled = [
      ...sampleExpression(parseSentence("turn on the <area> light"), { slotLists, expansionRules }),
    ];
    expect(sampled.map((s) => s.inputText)).toEqual([
      "turn on the kitchen light",
      "turn on the living room light",
    ]);
    expect(sampled.map((s) => s.substitutions.expansionRules.get("area"))).toEqual([
      "kitchen",
      "living room",
    ]);
    expect(sampled.every((s) => s.substitutions.currentRule === undefined)).toBe(true);
  });

  it("records the whole text of a rule built from several pieces", () => {
    const sampled = [
      ...sampleExpression(parseSentence("<action> the light"), { slotLists, expansionRules }),
    ];
    expect(sampled.map((s) => s.substitutions.expansionRules.get("action"))).toEqual([
      "switch on",
      "turn on",
    ]);
  });

  it("records literal text under the rule being expanded", () => {
    const [sampled] = sampleExpression(text("kitchen"), {
      substitutions: { ...emptySubstitutions(), currentRule: "area" },
    });
    expect(sampled?.substitutions.expansionRules.get("area")).toBe("kitchen");
  });

  it("throws for an undefined list", () => {
    expect(() => [...sampleExpression(listRef("missing"), { slotLists })]).toThrow(
      MissingListError
    );
  });

  it("throws for an undefined rule", () => {
    expect(() => [...sampleExpression(ruleRef("missing"), { expansionRules })]).toThrow(
      "Missing expansion rule <missing>"
    );
    expect(() => [...sampleExpression(ruleRef("missing"))]).toThrow(MissingRuleError);
  });

  it("warns about a list without values and yields nothing for it", () => {
    const warn = vi.fn();
    expect([...sampleExpression(listRef("empty"), { slotLists, warn })]).toEqual([]);
    expect(warn).toHaveBeenCalledWith("No values for list: empty");
  });

  it("produces the same sentences on every run", () => {
    const expression = parseSentence("(a|b) {colors} <area>");
    const run = () =>
      [...sampleExpression(expression, { slotLists, expansionRules })].map((s) => [
        s.inputText,
        s.outputText,
      ]);
    expect(run()).toEqual(run());
    expect(run()).toHaveLength(2 * 4 * 2);
  });
});
