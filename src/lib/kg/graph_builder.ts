import fs from "node:fs";
import path from "node:path";
import type { Fact, FactCategory } from "./types";

export type ClientNode = {
  id: string;
  kind: "client";
  client_id: string;
  business_type: string | null;
};

export type AttributeNode = {
  id: string;
  kind: "attribute";
  category: FactCategory;
  predicate: string;
  value: string;
};

export type GraphNode = ClientNode | AttributeNode;

export type GraphEdge = {
  source: string;
  target: string;
  weight: number;
  pages: number[];
  fact_ids: string[];
};

export type GraphSnapshot = {
  directed: true;
  nodes: GraphNode[];
  links: GraphEdge[];
};

export type AttributeRef = Pick<AttributeNode, "category" | "predicate" | "value">;

export function clientNodeId(clientId: string) {
  return `client:${clientId}`;
}

export function attributeNodeId(attribute: AttributeRef) {
  return `attr:${attribute.category}:${attribute.predicate}:${attribute.value}`;
}

function edgeKey(source: string, target: string) {
  return `${source}\u0000${target}`;
}

const byId = (a: { id: string }, b: { id: string }) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

/**
 * Derived projection of the fact journal: client nodes point at the attribute
 * nodes their facts assert. Attribute identity is value equality, so clients
 * with the same trait share one node.
 */
export class KnowledgeGraph {
  private clients = new Map<string, ClientNode>();
  private attributes = new Map<string, AttributeNode>();
  private edges = new Map<string, GraphEdge>();
  private outgoing = new Map<string, string[]>();
  private incoming = new Map<string, string[]>();

  ensureClient(clientId: string, businessType: string | null = null): ClientNode {
    const id = clientNodeId(clientId);
    const existing = this.clients.get(id);
    if (existing) {
      if (existing.business_type === null && businessType !== null) existing.business_type = businessType;
      return existing;
    }
    const node: ClientNode = { id, kind: "client", client_id: clientId, business_type: businessType };
    this.clients.set(id, node);
    return node;
  }

  private ensureAttribute(attribute: AttributeRef): AttributeNode {
    const id = attributeNodeId(attribute);
    const existing = this.attributes.get(id);
    if (existing) return existing;
    const node: AttributeNode = {
      id,
      kind: "attribute",
      category: attribute.category,
      predicate: attribute.predicate,
      value: attribute.value,
    };
    this.attributes.set(id, node);
    return node;
  }

  addFact(fact: Fact): void {
    const client = this.ensureClient(fact.client_id);
    const attribute = this.ensureAttribute(fact);
    const key = edgeKey(client.id, attribute.id);
    const edge = this.edges.get(key);

    if (!edge) {
      this.edges.set(key, {
        source: client.id,
        target: attribute.id,
        weight: 1,
        pages: [fact.source_page],
        fact_ids: [fact.content_hash],
      });
      this.outgoing.set(client.id, [...(this.outgoing.get(client.id) ?? []), attribute.id]);
      this.incoming.set(attribute.id, [...(this.incoming.get(attribute.id) ?? []), client.id]);
      return;
    }

    if (!edge.fact_ids.includes(fact.content_hash)) edge.fact_ids.push(fact.content_hash);
    // Reinforcement counts only when it comes from another page.
    if (!edge.pages.includes(fact.source_page)) {
      edge.pages.push(fact.source_page);
      edge.weight += 1;
    }
  }

  hasClient(clientId: string) {
    return this.clients.has(clientNodeId(clientId));
  }

  attributesOf(clientId: string): Array<{ attribute: AttributeNode; edge: GraphEdge }> {
    const source = clientNodeId(clientId);
    return (this.outgoing.get(source) ?? []).flatMap((target) => {
      const attribute = this.attributes.get(target);
      const edge = this.edges.get(edgeKey(source, target));
      return attribute && edge ? [{ attribute, edge }] : [];
    });
  }

  clientsSharing(attribute: AttributeRef): Array<{ client: ClientNode; edge: GraphEdge }> {
    const target = attributeNodeId(attribute);
    return (this.incoming.get(target) ?? []).flatMap((source) => {
      const client = this.clients.get(source);
      const edge = this.edges.get(edgeKey(source, target));
      return client && edge ? [{ client, edge }] : [];
    });
  }

  /** The client, its attributes, and every other client linked to one of them. */
  clientSubgraph(clientId: string): GraphSnapshot {
    const root = this.clients.get(clientNodeId(clientId));
    if (!root) return { directed: true, nodes: [], links: [] };

    const nodes = new Map<string, GraphNode>([[root.id, root]]);
    const links: GraphEdge[] = [];
    for (const { attribute, edge } of this.attributesOf(clientId)) {
      nodes.set(attribute.id, attribute);
      links.push(edge);
      for (const shared of this.clientsSharing(attribute)) {
        if (shared.client.id === root.id) continue;
        nodes.set(shared.client.id, shared.client);
        links.push(shared.edge);
      }
    }
    return sortSnapshot([...nodes.values()], links);
  }

  counts() {
    return { clients: this.clients.size, attributes: this.attributes.size, edges: this.edges.size };
  }

  snapshot(): GraphSnapshot {
    return sortSnapshot([...this.clients.values(), ...this.attributes.values()], [...this.edges.values()]);
  }
}

function sortSnapshot(nodes: GraphNode[], links: GraphEdge[]): GraphSnapshot {
  return {
    directed: true,
    nodes: nodes.map((node) => ({ ...node })).sort(byId),
    links: links
      .map((edge) => ({
        ...edge,
        pages: [...edge.pages].sort((a, b) => a - b),
        fact_ids: [...edge.fact_ids].sort(),
      }))
      .sort((a, b) => byId({ id: edgeKey(a.source, a.target) }, { id: edgeKey(b.source, b.target) })),
  };
}

export function buildGraph(facts: Fact[], options: { business_types?: Map<string, string> } = {}): KnowledgeGraph {
  const graph = new KnowledgeGraph();
  for (const fact of facts) graph.addFact(fact);
  for (const [clientId, businessType] of options.business_types ?? []) {
    graph.ensureClient(clientId, businessType);
  }
  return graph;
}

/** Replaces the snapshot file wholesale; readers never see a half-written file. */
export function writeGraphSnapshot(graph: KnowledgeGraph, filePath: string): GraphSnapshot {
  const snapshot = graph.snapshot();
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2));
  fs.renameSync(tmpPath, filePath);
  return snapshot;
}
