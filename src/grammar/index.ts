/**
 * Sentence template grammar: parsing, exhaustive expansion and output
 * substitution.
 */

export { parseSentence, isTemplate } from "./parse.js";
export { sampleExpression, type SampledSentence, type SampleOptions } from "./sample.js";
export { substituteOutput } from "./substitute.js";
export {
  emptySubstitutions,
  mergeSubstitutions,
  withCurrentRule,
  withListValue,
  withRuleText,
  type Substitutions,
} from "./substitutions.js";
export {
  alternative,
  group,
  listRef,
  ruleRef,
  text,
  type Expression,
  type ExpansionRules,
  type ListValue,
  type SlotList,
  type SlotLists,
} from "./expression.js";
export { MissingListError, MissingRuleError, TemplateParseError } from "./errors.js";
