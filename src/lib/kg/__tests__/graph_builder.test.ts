import { describe, expect, it } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { attributeNodeId, buildGraph, writeGraphSnapshot } from "../graph_builder";
import { makeFact } from "./fixtures";

const shared = { category: "driving_force" as const, predicate: "motivated_by", value: "recognition" };

describe("buildGraph", () => {
  it("shares one attribute node between clients with the same value", () => {
    const graph = buildGraph([
      makeFact({ client_id: "C1", ...shared, source_page: 3 }),
      makeFact({ client_id: "C2", ...shared, source_page: 1 }),
      makeFact({ client_id: "C2", value: "decide quickly" }),
    ]);

    expect(graph.counts()).toEqual({ clients: 2, attributes: 2, edges: 3 });
    expect(graph.clientsSharing(shared).map(({ client }) => client.client_id)).toEqual(["C1", "C2"]);
    expect(graph.attributesOf("C2").map(({ attribute }) => attribute.value)).toEqual(["recognition", "decide quickly"]);
  });

  it("adds weight only for reinforcement from another page", () => {
    const page3 = makeFact({ ...shared, source_page: 3 });
    const page7 = makeFact({ ...shared, source_page: 7 });
    const graph = buildGraph([page3, page3, page7]);

    const [{ edge }] = graph.attributesOf("C1");
    expect(edge.weight).toBe(2);
    expect(edge.pages).toEqual([3, 7]);
    expect(edge.fact_ids).toEqual([page3.content_hash, page7.content_hash]);
  });

  it("produces the same snapshot regardless of fact order", () => {
    const facts = [
      makeFact({ client_id: "C1", ...shared, source_page: 3 }),
      makeFact({ client_id: "C2", ...shared, source_page: 1 }),
      makeFact({ client_id: "C1", ...shared, source_page: 4 }),
      makeFact({ client_id: "C2", category: "risk", predicate: "avoids", value: "money talk" }),
    ];
    const types = new Map([["C2", "Dental practice"]]);

    expect(buildGraph([...facts].reverse(), { business_types: types }).snapshot()).toEqual(
      buildGraph(facts, { business_types: types }).snapshot()
    );
  });

  it("records business types on client nodes", () => {
    const graph = buildGraph([makeFact()], { business_types: new Map([["C1", "Landscaping"], ["C9", "Cafe"]]) });
    const clients = graph.snapshot().nodes.filter((node) => node.kind === "client");
    expect(clients).toEqual([
      { id: "client:C1", kind: "client", client_id: "C1", business_type: "Landscaping" },
      { id: "client:C9", kind: "client", client_id: "C9", business_type: "Cafe" },
    ]);
  });

  it("returns the client subgraph with neighbours through shared attributes", () => {
    const graph = buildGraph([
      makeFact({ client_id: "C1", ...shared }),
      makeFact({ client_id: "C2", ...shared }),
      makeFact({ client_id: "C2", value: "unrelated trait" }),
      makeFact({ client_id: "C3", value: "another trait" }),
    ]);

    const subgraph = graph.clientSubgraph("C1");
    expect(subgraph.nodes.map((node) => node.id)).toEqual(["attr:driving_force:motivated_by:recognition", "client:C1", "client:C2"]);
    expect(subgraph.links.map((link) => `${link.source}->${link.target}`)).toEqual([
      "client:C1->attr:driving_force:motivated_by:recognition",
      "client:C2->attr:driving_force:motivated_by:recognition",
    ]);
    expect(graph.clientSubgraph("nobody").nodes).toEqual([]);
  });

  it("overwrites the snapshot file wholesale", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "kg-graph-"));
    const filePath = path.join(dir, "graph.json");
    fs.writeFileSync(filePath, "stale");

    const graph = buildGraph([makeFact()]);
    const snapshot = writeGraphSnapshot(graph, filePath);

    expect(JSON.parse(fs.readFileSync(filePath, "utf-8"))).toEqual(snapshot);
    expect(snapshot.links[0].target).toBe(attributeNodeId(makeFact()));
    expect(fs.readdirSync(dir)).toEqual(["graph.json"]);
  });
});
