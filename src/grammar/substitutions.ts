/**
 * Record of the list values and rule expansions chosen along one derivation.
 *
 * Values are never mutated: every update returns a new record, so sibling
 * branches of an expansion cannot see each other's choices.
 */
export interface Substitutions {
  readonly lists: ReadonlyMap<string, string>;
  readonly expansionRules: ReadonlyMap<string, string>;
  /** Rule whose body is being expanded; literal text is recorded under it. */
  readonly currentRule?: string;
}

const EMPTY: Substitutions = {
  lists: new Map(),
  expansionRules: new Map(),
};

export function emptySubstitutions(): Substitutions {
  return EMPTY;
}

export function withListValue(
  substitutions: Substitutions,
  listName: string,
  value: string
): Substitutions {
  return {
    ...substitutions,
    lists: new Map(substitutions.lists).set(listName, value),
  };
}

export function withRuleText(
  substitutions: Substitutions,
  ruleName: string,
  value: string
): Substitutions {
  return {
    ...substitutions,
    expansionRules: new Map(substitutions.expansionRules).set(ruleName, value),
  };
}

export function withCurrentRule(
  substitutions: Substitutions,
  ruleName: string | undefined
): Substitutions {
  const { lists, expansionRules } = substitutions;
  return ruleName === undefined
    ? { lists, expansionRules }
    : { lists, expansionRules, currentRule: ruleName };
}

/** Union of all records; on a name collision the later record wins. */
export function mergeSubstitutions(...records: Substitutions[]): Substitutions {
  const lists = new Map<string, string>();
  const expansionRules = new Map<string, string>();
  for (const record of records) {
    for (const [name, value] of record.lists) lists.set(name, value);
    for (const [name, value] of record.expansionRules) expansionRules.set(name, value);
  }
  return { lists, expansionRules };
}
