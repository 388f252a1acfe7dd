import { z } from "zod";
import { deepFreeze, readJsonConfig } from "./config_file";
import { foldText } from "./text_normalize";
import { FactCategorySchema, type Fact } from "./types";

function isValidPattern(pattern: string) {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}

export const RuleConditionSchema = z
  .object({
    category: FactCategorySchema.optional(),
    predicate: z.string().min(1).optional(),
    value_contains: z.string().min(1).optional(),
    value_matches: z.string().min(1).refine(isValidPattern, "value_matches is not a valid regular expression").optional(),
  })
  .strict()
  .refine(
    (condition) =>
      condition.category !== undefined ||
      condition.predicate !== undefined ||
      condition.value_contains !== undefined ||
      condition.value_matches !== undefined,
    "a condition must name at least one of category, predicate, value_contains, value_matches"
  );

export const RuleTriggerSchema = z.union([
  z.object({ any: z.array(RuleConditionSchema).min(1) }).strict(),
  z.object({ all: z.array(RuleConditionSchema).min(1) }).strict(),
]);

export const RuleSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_.-]*$/),
  trigger: RuleTriggerSchema,
  action: z.string().min(1),
  why: z.string().min(1),
  priority: z.number().int(),
});

export const RuleFileSchema = z
  .object({ rules: z.array(RuleSchema) })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["rules", index, "id"], message: `duplicate rule id ${rule.id}` });
      }
      seen.add(rule.id);
    });
  });

export type RuleCondition = z.infer<typeof RuleConditionSchema>;
export type RuleTrigger = z.infer<typeof RuleTriggerSchema>;
export type Rule = z.infer<typeof RuleSchema>;

/** Rules ordered for evaluation: priority descending, ties in file order. */
export type RuleSet = readonly Rule[];

export function conditionMatches(condition: RuleCondition, fact: Fact): boolean {
  if (condition.category !== undefined && fact.category !== condition.category) return false;
  if (condition.predicate !== undefined && fact.predicate !== condition.predicate) return false;
  if (condition.value_contains !== undefined && !foldText(fact.value).includes(foldText(condition.value_contains))) {
    return false;
  }
  if (condition.value_matches !== undefined && !new RegExp(condition.value_matches, "i").test(fact.value)) {
    return false;
  }
  return true;
}

export function triggerConditions(trigger: RuleTrigger): { mode: "any" | "all"; conditions: RuleCondition[] } {
  return "any" in trigger ? { mode: "any", conditions: trigger.any } : { mode: "all", conditions: trigger.all };
}

export function toRuleSet(rules: Rule[]): RuleSet {
  // Stable sort: equal priorities keep declaration order.
  return deepFreeze([...rules].sort((a, b) => b.priority - a.priority));
}

export function loadRules(filePath: string): RuleSet {
  const file = readJsonConfig(filePath, RuleFileSchema, "Rule file");
  return toRuleSet(file.rules);
}
