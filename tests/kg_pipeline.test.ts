import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { KgConfigError, MalformedDocumentError } from "../src/lib/kg/errors";
import { getKgConfig } from "../src/lib/kg/kg_config";
import { createKgLogger } from "../src/lib/kg/logger";
import { KnowledgeGraphService, type KnowledgeGraphServiceParams } from "../src/lib/kg/knowledge_graph_service";
import type { ClientProfile } from "../src/lib/kg/seed_clients";
import { sampleReportBytes, tenPageReportBytes } from "../src/lib/kg/__tests__/fixtures";

const services: KnowledgeGraphService[] = [];

function makeService(env: Record<string, string> = {}, params: KnowledgeGraphServiceParams = {}) {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "kg-pipeline-"));
  const config = getKgConfig({ KG_DATA_DIR: dataDir, KG_LOG_ECHO: "false", ...env });
  const service = new KnowledgeGraphService({ config, logger: createKgLogger({ echo: false }), ...params });
  services.push(service);
  return service;
}

afterEach(() => {
  for (const service of services.splice(0)) service.close();
});

describe("ingest", () => {
  it("skips a document uploaded twice for the same client", () => {
    const service = makeService();

    const first = service.ingest(tenPageReportBytes(), "C2");
    expect(first).toMatchObject({ facts_extracted: 10, facts_added: 10, already_ingested: false, reason: "facts_found" });

    const second = service.ingest(tenPageReportBytes(), "C2");
    expect(second).toEqual({
      client_id: "C2",
      document_hash: first.document_hash,
      facts_extracted: 0,
      facts_added: 0,
      already_ingested: true,
      yielded_nothing: false,
      reason: "duplicate_document",
    });
    expect(service.factsFor("C2")).toHaveLength(10);
    expect(service.ingestions("C2")).toHaveLength(1);
    expect(service.events.readEvents().map((event) => event.type)).toContain("ingest_duplicate");
  });

  it("adds nothing when new bytes carry facts already stored", () => {
    const service = makeService();
    service.ingest(tenPageReportBytes(), "C2");

    const reexport = new Uint8Array([...tenPageReportBytes(), ...new TextEncoder().encode("\f")]);
    const result = service.ingest(reexport, "C2");

    expect(result).toMatchObject({ facts_extracted: 10, facts_added: 0, already_ingested: false });
    expect(service.ingestions("C2")).toHaveLength(2);

    const hashes = service.facts.allFacts().map((fact) => fact.content_hash);
    expect(new Set(hashes).size).toBe(hashes.length);
  });

  it("stores nothing for a binary PDF", () => {
    const service = makeService();
    const pdf = new TextEncoder().encode("%PDF-1.7\n1 0 obj\n");

    expect(() => service.ingest(pdf, "C1")).toThrow(MalformedDocumentError);
    expect(service.factsFor("C1")).toEqual([]);
    expect(service.ingestions("C1")).toEqual([]);
    expect(service.events.readEvents().map((event) => event.type)).toEqual(["ingest_started", "ingest_failed"]);
  });

  it("records a document without known headings as yielding nothing", () => {
    const service = makeService();
    const result = service.ingest(new TextEncoder().encode("Just some notes. She tends to relax on Fridays."), "C1");

    expect(result).toMatchObject({ facts_added: 0, yielded_nothing: true, reason: "no_recognized_headings" });
    expect(service.factsFor("C1")).toEqual([]);
    expect(service.ingestions("C1")).toHaveLength(1);
  });

  it("rejects an empty client id", () => {
    const service = makeService();
    expect(() => service.ingest(sampleReportBytes(), "  ")).toThrow("client_id must be a non-empty string.");
  });
});

describe("queries over stored facts", () => {
  it("recommends financial clarity backed only by the money fact", () => {
    const service = makeService();
    service.ingest(sampleReportBytes(), "C1");

    const financial = service.recommend("C1").find((item) => item.rule_id === "financial-clarity");
    expect(financial?.evidence).toEqual([
      {
        fact_id: expect.any(String),
        category: "risk",
        predicate: "avoids",
        value: "money talk until late in the process",
        page: 5,
        snippet: "She avoids money talk until late in the process.",
      },
    ]);
    expect(service.recommend("nobody")).toEqual([]);
  });

  it("ranks similar clients and lets ingested facts replace a seed record", () => {
    const seeds: ClientProfile[] = [
      { client_id: "C1", business_type: null, attributes: [{ category: "other", predicate: "needs", value: "nothing" }] },
      {
        client_id: "C3",
        business_type: "Dental practice",
        attributes: [
          { category: "behavioral", predicate: "tends_to", value: "take charge in meetings" },
          { category: "behavioral", predicate: "prefers", value: "short written summaries" },
          { category: "risk", predicate: "avoids", value: "cold calls" },
        ],
      },
      { client_id: "C4", business_type: null, attributes: [{ category: "behavioral", predicate: "tends_to", value: "plan far ahead" }] },
    ];
    const service = makeService({}, { seed_clients: seeds });
    service.ingest(sampleReportBytes(), "C1");

    const ranked = service.similar("C1", 3);
    expect(ranked.map((item) => item.client_id)).toEqual(["C3", "C4"]);
    expect(ranked[0].score).toBeGreaterThan(ranked[1].score);
    expect(ranked[0].shared_tokens).toEqual([
      "behavioral:prefers:short written summaries",
      "behavioral:tends_to:take charge in meetings",
    ]);
    expect(ranked[1].score).toBe(0);

    service.ingest(sampleReportBytes(), "C4", "Bakery");
    const [top] = service.similar("C1", 3);
    expect(top.client_id).toBe("C4");
    expect(top.business_type).toBe("Bakery");
    expect(top.score).toBeCloseTo(1, 10);

    expect(service.similar("unknown-client")).toEqual([]);
  });

  it("keeps graph.json equal to the rebuilt graph", () => {
    const service = makeService();
    service.ingest(sampleReportBytes(), "C1", "Dental practice");

    const onDisk = fs.readFileSync(service.config.graph_path, "utf-8");
    expect(JSON.parse(onDisk)).toEqual(service.rebuildGraph());
    expect(fs.readFileSync(service.config.graph_path, "utf-8")).toBe(onDisk);

    const graph = service.graph();
    expect(graph.attributesOf("C1")).toHaveLength(7);
    expect(graph.clientSubgraph("C1").nodes.find((node) => node.kind === "client")).toEqual({
      id: "client:C1",
      kind: "client",
      client_id: "C1",
      business_type: "Dental practice",
    });
  });

  it("drafts text from chosen facts and rejects unknown ids", async () => {
    const service = makeService();
    service.ingest(sampleReportBytes(), "C1");
    const ids = service.factsFor("C1").map((fact) => fact.content_hash);

    const result = await service.generate("call_agenda", ids.slice(0, 4), { duration_min: 20 });
    expect(result.insufficient_evidence).toBe(false);
    expect(result.facts_used.length).toBeGreaterThan(0);
    expect(result.facts_used.every((ref) => ids.slice(0, 4).includes(ref.fact_id))).toBe(true);

    await expect(service.generate("strategy_summary", [ids[0], "missing-id"])).rejects.toMatchObject({
      code: "UNKNOWN_FACT",
      details: ["missing-id"],
    });
  });

  it("summarises signals for the dashboard", () => {
    const service = makeService();
    service.ingest(sampleReportBytes(), "C1");

    const signals = service.signals("C1");
    expect(signals.map((signal) => [signal.tag, signal.score])).toEqual([
      ["Relationship-focused", 6],
      ["People-oriented", 1],
    ]);
    expect(signals[0].evidence.length).toBeLessThanOrEqual(2);
  });
});

describe("fit and context", () => {
  it("ranks career and business archetypes from the client's signals", () => {
    const service = makeService();
    service.ingest(sampleReportBytes(), "C1");

    const fit = service.fit("C1");
    expect(fit.career.map((item) => [item.name, item.score])).toEqual([
      ["Client success and account management", 10],
      ["Coaching and training", 4],
      ["Sales and business development", 1],
      ["Operations and process management", 0],
      ["Founder or independent consultant", 0],
    ]);
    expect(fit.career[0].rationale).toBe("Why: Relationship-focused; People-oriented");
    expect(fit.career[0].evidence_used.length).toBeLessThanOrEqual(2);
    expect(fit.business.map((item) => [item.name, item.score]).slice(0, 2)).toEqual([
      ["Referral-led service business", 10],
      ["Mission-driven practice", 6],
    ]);
    expect(service.fit("C1", 1).career).toHaveLength(1);
    expect(service.fit("nobody")).toEqual({ career: [], business: [] });
  });

  it("packs a bounded client summary", () => {
    const service = makeService();
    service.ingest(sampleReportBytes(), "C1");

    const pack = service.contextPack("C1");
    expect(pack.client_id).toBe("C1");
    expect(pack.traits.map((entry) => [entry.predicate, entry.value])).toEqual([
      ["tends_to", "take charge in meetings"],
      ["prefers", "short written summaries"],
      ["likes_to", "close deals quickly"],
      ["do", "send the agenda a day early"],
      ["dont", "interrupt her while she is thinking"],
    ]);
    expect(pack.drivers.map((entry) => entry.value)).toEqual(["recognition"]);
    expect(pack.risks.map((entry) => entry.value)).toEqual(["money talk until late in the process"]);
    expect(pack.recommendations.map((item) => item.rule_id)).toEqual(service.recommend("C1").slice(0, 5).map((item) => item.rule_id));
    expect(pack.similar_clients.length).toBeLessThanOrEqual(3);
  });
});

describe("configuration", () => {
  it("fails construction on an invalid rules file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "kg-bad-rules-"));
    const rulesPath = path.join(dir, "rules.json");
    fs.writeFileSync(rulesPath, JSON.stringify({ rules: [{ id: "Bad Id", trigger: { any: [] }, action: "", why: "", priority: 1 }] }));

    expect(() => makeService({ KG_RULES_PATH: rulesPath })).toThrow(KgConfigError);
  });

  it("fails construction on an archetype file with an unknown tag", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "kg-bad-archetypes-"));
    const archetypesPath = path.join(dir, "career_archetypes.json");
    fs.writeFileSync(
      archetypesPath,
      JSON.stringify({ archetypes: [{ name: "Pilot", description: "Flies planes.", requires: { "Loves altitude": 1 } }] })
    );

    expect(() => makeService({ KG_CAREER_ARCHETYPES_PATH: archetypesPath })).toThrow(KgConfigError);
  });
});
