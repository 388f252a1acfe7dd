/**
 * Recommendation Engine
 *
 * Evaluates the rule set against one client's facts. A fired rule carries
 * every fact that made its trigger true, so the caller can always show why.
 */

import { conditionMatches, triggerConditions, type Rule, type RuleSet } from "./rules";
import { toEvidenceRef, type Fact, type Recommendation } from "./types";

/** Facts that make the trigger true, in store order; null when the rule does not fire. */
export function matchRule(rule: Rule, facts: Fact[]): Fact[] | null {
  const { mode, conditions } = triggerConditions(rule.trigger);
  const matchedPerCondition = conditions.map((condition) => facts.filter((fact) => conditionMatches(condition, fact)));

  const fires =
    mode === "any"
      ? matchedPerCondition.some((matched) => matched.length > 0)
      : matchedPerCondition.every((matched) => matched.length > 0);
  if (!fires) return null;

  const contributing = new Set(matchedPerCondition.flat());
  return facts.filter((fact) => contributing.has(fact));
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

export function renderWhy(template: string, clientId: string, evidence: Fact[]): string {
  const replacements: Record<string, string> = {
    values: unique(evidence.map((fact) => fact.value)).join(", "),
    pages: unique(evidence.map((fact) => fact.source_page))
      .sort((a, b) => a - b)
      .join(", "),
    count: String(evidence.length),
    client_id: clientId,
  };
  return template.replace(/\{(values|pages|count|client_id)\}/g, (_match, key: string) => replacements[key] ?? "");
}

export function recommend(clientId: string, facts: Fact[], rules: RuleSet): Recommendation[] {
  const own = facts.filter((fact) => fact.client_id === clientId);
  if (own.length === 0) return [];

  const out: Recommendation[] = [];
  for (const rule of rules) {
    const matched = matchRule(rule, own);
    if (!matched) continue;
    const evidence = [...matched].sort((a, b) => a.source_page - b.source_page);
    out.push({
      rule_id: rule.id,
      action: rule.action,
      why: renderWhy(rule.why, clientId, evidence),
      priority: rule.priority,
      evidence: evidence.map(toEvidenceRef),
    });
  }
  return out;
}
