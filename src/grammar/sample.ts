/**
 * Exhaustive sentence sampler.
 *
 * Walks a template expression and yields every sentence it can produce,
 * together with the output text and the list/rule choices behind it.
 * Enumeration is lazy and follows declaration order; concatenations are
 * expanded as a Cartesian product with the leftmost item varying slowest.
 */

import { silentLogger, type Logger } from "../ui/logger.js";
import { collapseWhitespace } from "../utils/strings.js";
import { MissingListError, MissingRuleError } from "./errors.js";
import type {
  ExpansionRules,
  Expression,
  Group,
  ListReference,
  RuleReference,
  SlotLists,
} from "./expression.js";
import {
  emptySubstitutions,
  mergeSubstitutions,
  withCurrentRule,
  withListValue,
  withRuleText,
  type Substitutions,
} from "./substitutions.js";

export interface SampledSentence {
  inputText: string;
  /** Undefined when this variant must not contribute output text. */
  outputText: string | undefined;
  substitutions: Substitutions;
}

export interface SampleOptions {
  slotLists?: SlotLists;
  expansionRules?: ExpansionRules;
  substitutions?: Substitutions;
  warn?: Logger;
}

interface SampleEnv {
  slotLists: SlotLists;
  expansionRules: ExpansionRules;
  warn: Logger;
}

/**
 * Yield every sentence `expression` can produce. Each call is a fresh,
 * deterministic enumeration.
 *
 * @throws MissingListError when a referenced list is not defined
 * @throws MissingRuleError when a referenced expansion rule is not defined
 */
export function* sampleExpression(
  expression: Expression,
  options: SampleOptions = {}
): Generator<SampledSentence, void, undefined> {
  const env: SampleEnv = {
    slotLists: options.slotLists ?? new Map(),
    expansionRules: options.expansionRules ?? new Map(),
    warn: options.warn ?? silentLogger,
  };

  for (const sampled of sample(expression, env, options.substitutions ?? emptySubstitutions())) {
    yield {
      inputText: sampled.inputText.trim(),
      outputText: sampled.outputText?.trim(),
      substitutions: sampled.substitutions,
    };
  }
}

function* sample(
  expression: Expression,
  env: SampleEnv,
  substitutions: Substitutions
): Generator<SampledSentence, void, undefined> {
  switch (expression.type) {
    case "text": {
      const { currentRule } = substitutions;
      yield {
        inputText: expression.text,
        outputText: expression.text,
        substitutions:
          currentRule === undefined
            ? substitutions
            : withRuleText(substitutions, currentRule, expression.text),
      };
      return;
    }
    case "alternative": {
      for (const item of expression.items) {
        yield* sample(item, env, substitutions);
      }
      return;
    }
    case "group": {
      yield* sampleGroup(expression, env, substitutions);
      return;
    }
    case "list": {
      yield* sampleList(expression, env, substitutions);
      return;
    }
    case "rule": {
      yield* sampleRule(expression, env, substitutions);
      return;
    }
    default: {
      const unexpected: never = expression;
      throw new Error(`Unexpected expression: ${JSON.stringify(unexpected)}`);
    }
  }
}

function* sampleGroup(
  expression: Group,
  env: SampleEnv,
  substitutions: Substitutions
): Generator<SampledSentence, void, undefined> {
  for (const parts of product(expression.items, 0, env, substitutions)) {
    const outputs = parts.flatMap((p) => (p.outputText === undefined ? [] : [p.outputText]));
    yield {
      inputText: collapseWhitespace(parts.map((p) => p.inputText).join("")),
      outputText: collapseWhitespace(outputs.join("")),
      substitutions: mergeSubstitutions(
        substitutions,
        ...parts.map((p) => p.substitutions)
      ),
    };
  }
}

/** Every combination of one sample per item, from `index` onwards. */
function* product(
  items: Expression[],
  index: number,
  env: SampleEnv,
  substitutions: Substitutions
): Generator<SampledSentence[], void, undefined> {
  const item = items[index];
  if (item === undefined) {
    yield [];
    return;
  }

  for (const head of sample(item, env, substitutions)) {
    for (const tail of product(items, index + 1, env, substitutions)) {
      yield [head, ...tail];
    }
  }
}

function* sampleList(
  expression: ListReference,
  env: SampleEnv,
  substitutions: Substitutions
): Generator<SampledSentence, void, undefined> {
  const { listName } = expression;
  const slotList = env.slotLists.get(listName);
  if (!slotList) {
    throw new MissingListError(listName);
  }

  if (slotList.values.length === 0) {
    // Not necessarily an error, but may be a surprise
    env.warn(`No values for list: ${listName}`);
  }

  for (const value of slotList.values) {
    const declaredOutput = value.output;
    if (declaredOutput) {
      // Only the first surface form carries the declared output, so one
      // value never produces its canonical text twice.
      let isFirst = true;
      for (const sampled of sample(value.input, env, substitutions)) {
        yield {
          inputText: sampled.inputText,
          outputText: isFirst ? declaredOutput : undefined,
          substitutions: withListValue(sampled.substitutions, listName, declaredOutput),
        };
        isFirst = false;
      }
    } else {
      for (const sampled of sample(value.input, env, substitutions)) {
        const chosen = (sampled.outputText ?? sampled.inputText).trim();
        yield {
          ...sampled,
          substitutions: withListValue(sampled.substitutions, listName, chosen),
        };
      }
    }
  }
}

function* sampleRule(
  expression: RuleReference,
  env: SampleEnv,
  substitutions: Substitutions
): Generator<SampledSentence, void, undefined> {
  const { ruleName } = expression;
  const body = env.expansionRules.get(ruleName);
  if (!body) {
    throw new MissingRuleError(ruleName);
  }

  const inRule = withCurrentRule(substitutions, ruleName);
  for (const sampled of sample(body, env, inRule)) {
    // The rule stands for the words spoken, so a declared list output in the
    // body fills {list} but not <rule>.
    const recorded = withRuleText(sampled.substitutions, ruleName, sampled.inputText.trim());
    yield {
      ...sampled,
      substitutions: withCurrentRule(recorded, substitutions.currentRule),
    };
  }
}
