import type { Substitutions } from "./substitutions.js";

/**
 * Fill `{list}` and `<rule>` placeholders in an output template with the
 * values chosen during expansion. Only the first occurrence of each
 * placeholder is replaced; names with no recorded value are left as-is.
 */
export function substituteOutput(template: string, substitutions: Substitutions): string {
  let result = template;
  for (const [listName, value] of substitutions.lists) {
    result = result.replace(`{${listName}}`, () => value);
  }
  for (const [ruleName, value] of substitutions.expansionRules) {
    result = result.replace(`<${ruleName}>`, () => value);
  }
  return result;
}
