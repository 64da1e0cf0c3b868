/**
 * Template expression tree.
 *
 * A parsed sentence template is a group at the root. Alternatives choose
 * exactly one item per produced sentence; groups concatenate all items.
 */

export interface TextChunk {
  type: "text";
  text: string;
}

export interface Alternative {
  type: "alternative";
  items: Expression[];
}

export interface Group {
  type: "group";
  items: Expression[];
}

export interface ListReference {
  type: "list";
  listName: string;
}

export interface RuleReference {
  type: "rule";
  ruleName: string;
}

export type Expression =
  | TextChunk
  | Alternative
  | Group
  | ListReference
  | RuleReference;

export function text(value: string): TextChunk {
  return { type: "text", text: value };
}

export function alternative(...items: Expression[]): Alternative {
  return { type: "alternative", items };
}

export function group(...items: Expression[]): Group {
  return { type: "group", items };
}

export function listRef(listName: string): ListReference {
  return { type: "list", listName };
}

export function ruleRef(ruleName: string): RuleReference {
  return { type: "rule", ruleName };
}

/** One value of a named list: what is said, and optionally what it means. */
export interface ListValue {
  input: Expression;
  output?: string;
}

export interface SlotList {
  name: string;
  values: ListValue[];
}

export type SlotLists = ReadonlyMap<string, SlotList>;
export type ExpansionRules = ReadonlyMap<string, Expression>;
