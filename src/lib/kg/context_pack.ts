import { foldText } from "./text_normalize";
import type { Fact, FactCategory, Recommendation, SimilarClient } from "./types";

export const MAX_PACK_FACTS = 12;
export const MAX_EVIDENCE_PER_FACT = 2;
export const MAX_PACK_SNIPPET_CHARS = 240;
export const MAX_PACK_TEXT_CHARS = 200;
export const MAX_PACK_RECOMMENDATIONS = 5;
export const MAX_PACK_SIMILAR = 3;
const MAX_SHARED_IN_WHY = 5;

const TRAIT_CATEGORIES: FactCategory[] = ["behavioral", "communication", "other"];
const DRIVER_CATEGORIES: FactCategory[] = ["driving_force", "motivator"];

export type PackEvidence = { fact_id: string; page: number; snippet: string };

export type PackFact = {
  category: FactCategory;
  predicate: string;
  value: string;
  evidence: PackEvidence[];
};

export type PackRecommendation = {
  rule_id: string;
  action: string;
  why: string;
  evidence: PackEvidence[];
};

export type PackSimilarClient = {
  client_id: string;
  business_type: string | null;
  why_similar: string;
};

/** A bounded, deterministic summary of one client for prompts and exports. */
export type ContextPack = {
  client_id: string;
  traits: PackFact[];
  drivers: PackFact[];
  risks: PackFact[];
  recommendations: PackRecommendation[];
  similar_clients: PackSimilarClient[];
};

export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  if (maxChars <= 3) return text.slice(0, maxChars);
  const head = text.slice(0, maxChars - 3);
  const cut = head.lastIndexOf(" ");
  return `${cut > 0 ? head.slice(0, cut) : head}...`;
}

function packEvidence(fact: Fact): PackEvidence {
  return {
    fact_id: fact.content_hash,
    page: fact.source_page,
    snippet: truncateAtWord(fact.source_snippet, MAX_PACK_SNIPPET_CHARS),
  };
}

// The same statement found on several pages becomes one entry with up to two snippets.
function groupFacts(facts: Fact[]): PackFact[] {
  const byKey = new Map<string, PackFact>();
  for (const fact of facts) {
    const key = `${fact.category}|${fact.predicate}|${foldText(fact.value)}`;
    const entry = byKey.get(key);
    if (entry) {
      if (entry.evidence.length < MAX_EVIDENCE_PER_FACT) entry.evidence.push(packEvidence(fact));
      continue;
    }
    byKey.set(key, {
      category: fact.category,
      predicate: fact.predicate,
      value: fact.value.slice(0, MAX_PACK_TEXT_CHARS),
      evidence: [packEvidence(fact)],
    });
  }
  return [...byKey.values()];
}

function whySimilar(client: SimilarClient) {
  const values = client.shared_tokens.slice(0, MAX_SHARED_IN_WHY).map((token) => token.split(":").slice(2).join(":"));
  return values.length > 0 ? values.join(", ") : "similar profile";
}

export function buildContextPack(input: {
  client_id: string;
  facts: Fact[];
  recommendations: Recommendation[];
  similar: SimilarClient[];
}): ContextPack {
  const grouped = groupFacts(input.facts);

  // Traits fill the budget first, then drivers, then risks.
  let remaining = MAX_PACK_FACTS;
  const take = (categories: FactCategory[]) => {
    const picked = grouped.filter((entry) => categories.includes(entry.category)).slice(0, remaining);
    remaining -= picked.length;
    return picked;
  };
  const traits = take(TRAIT_CATEGORIES);
  const drivers = take(DRIVER_CATEGORIES);
  const risks = take(["risk"]);

  return {
    client_id: input.client_id,
    traits,
    drivers,
    risks,
    recommendations: input.recommendations.slice(0, MAX_PACK_RECOMMENDATIONS).map((item) => ({
      rule_id: item.rule_id,
      action: item.action.slice(0, MAX_PACK_TEXT_CHARS),
      why: item.why.slice(0, MAX_PACK_TEXT_CHARS),
      evidence: item.evidence.slice(0, MAX_EVIDENCE_PER_FACT).map((ref) => ({
        fact_id: ref.fact_id,
        page: ref.page,
        snippet: truncateAtWord(ref.snippet, MAX_PACK_SNIPPET_CHARS),
      })),
    })),
    similar_clients: input.similar.slice(0, MAX_PACK_SIMILAR).map((client) => ({
      client_id: client.client_id,
      business_type: client.business_type,
      why_similar: whySimilar(client),
    })),
  };
}

export function countPackFacts(pack: ContextPack): number {
  return pack.traits.length + pack.drivers.length + pack.risks.length;
}
