import { describe, expect, it } from "vitest";
import { buildContextPack, countPackFacts, MAX_PACK_FACTS, MAX_PACK_SNIPPET_CHARS, truncateAtWord } from "../context_pack";
import { toEvidenceRef, type Recommendation, type SimilarClient } from "../types";
import { makeFact } from "./fixtures";

const planAhead = [1, 2, 3].map((page) =>
  makeFact({ value: "plan ahead", source_page: page, source_snippet: `She likes to plan ahead (page ${page}).` })
);
const traits = Array.from({ length: 10 }, (_, index) => makeFact({ value: `trait ${index + 1}` }));
const driver = makeFact({
  category: "driving_force",
  predicate: "motivated_by",
  value: "recognition",
  source_snippet: `Dana is motivated by recognition ${"and more ".repeat(40)}`,
});
const risk = makeFact({ category: "risk", predicate: "avoids", value: "cold calls" });

function recommendation(index: number): Recommendation {
  return { rule_id: `rule-${index}`, action: `Action ${index}`, why: "x".repeat(250), priority: index, evidence: [toEvidenceRef(risk)] };
}

function similar(clientId: string, shared: string[]): SimilarClient {
  return { client_id: clientId, score: 0.5, business_type: null, shared_tokens: shared };
}

describe("buildContextPack", () => {
  it("groups repeated facts and fills the fact budget traits first", () => {
    const pack = buildContextPack({ client_id: "C1", facts: [...planAhead, ...traits, driver, risk], recommendations: [], similar: [] });

    expect(countPackFacts(pack)).toBe(MAX_PACK_FACTS);
    expect(pack.traits).toHaveLength(11);
    expect(pack.drivers.map((entry) => entry.value)).toEqual(["recognition"]);
    expect(pack.risks).toEqual([]);
    expect(pack.traits[0].evidence.map((item) => item.page)).toEqual([1, 2]);

    const snippet = pack.drivers[0].evidence[0].snippet;
    expect(snippet.length).toBeLessThanOrEqual(MAX_PACK_SNIPPET_CHARS);
    expect(snippet.endsWith("more...")).toBe(true);
  });

  it("caps recommendations and similar clients", () => {
    const pack = buildContextPack({
      client_id: "C1",
      facts: [risk],
      recommendations: [1, 2, 3, 4, 5, 6].map(recommendation),
      similar: [
        similar("C2", ["behavioral:tends_to:plan ahead", "risk:avoids:cold calls"]),
        similar("C3", []),
        similar("C4", []),
        similar("C5", []),
      ],
    });

    expect(pack.risks.map((entry) => entry.value)).toEqual(["cold calls"]);
    expect(pack.recommendations.map((item) => item.rule_id)).toEqual(["rule-1", "rule-2", "rule-3", "rule-4", "rule-5"]);
    expect(pack.recommendations[0].why).toHaveLength(200);
    expect(pack.similar_clients).toEqual([
      { client_id: "C2", business_type: null, why_similar: "plan ahead, cold calls" },
      { client_id: "C3", business_type: null, why_similar: "similar profile" },
      { client_id: "C4", business_type: null, why_similar: "similar profile" },
    ]);
  });
});

describe("truncateAtWord", () => {
  it("cuts at the last space before the limit", () => {
    expect(truncateAtWord("money talk until late", 14)).toBe("money talk...");
    expect(truncateAtWord("short", 14)).toBe("short");
  });
});
