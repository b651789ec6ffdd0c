import type { LineRule, RuleDefinition } from "../types.js";
import { createExceptionHidingRule } from "./exception-hiding.js";
import { createFakeSuccessRule } from "./fake-success.js";
import { createMagicNumberRule } from "./magic-number.js";
import { createPatternRule } from "./pattern-rule.js";
import type { RuleSettings } from "./settings.js";
import { createSyntheticFeatureRule } from "./synthetic-feature.js";
import { createTodoStubRule } from "./todo-stub.js";

type RuleFactory = (
  definition: RuleDefinition,
  settings: RuleSettings,
) => LineRule;

export const BUILT_IN_RULES: Readonly<Record<string, RuleFactory>> = {
  "FD-FEATURE-001": createSyntheticFeatureRule,
  "FD-EXC-001": createExceptionHidingRule,
  "FD-MAGIC-001": createMagicNumberRule,
  "FD-SUCCESS-001": createFakeSuccessRule,
  "FD-TODO-001": createTodoStubRule,
};

export function buildRuleSet(
  definitions: readonly RuleDefinition[],
  settings: RuleSettings,
): LineRule[] {
  return definitions.map((definition) => {
    const factory = BUILT_IN_RULES[definition.id] ?? createPatternRule;
    return factory(definition, settings);
  });
}

export { createPatternRule } from "./pattern-rule.js";
export type { RuleSettings } from "./settings.js";
