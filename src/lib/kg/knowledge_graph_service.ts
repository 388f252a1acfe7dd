import fs from "node:fs";
import { hashDocument } from "./content_hash";
import { buildContextPack, MAX_PACK_SIMILAR, type ContextPack } from "./context_pack";
import { KgError } from "./errors";
import { KgEventLog } from "./event_log";
import { extractFacts } from "./extract_facts";
import { FactStore } from "./fact_store";
import { loadArchetypes, scoreArchetypes, type Archetype, type ClientFit } from "./fit_scoring";
import { buildGraph, writeGraphSnapshot, type GraphSnapshot, type KnowledgeGraph } from "./graph_builder";
import { IngestionStore } from "./ingestion_store";
import { getKgConfig, type KgConfig } from "./kg_config";
import { createKgLogger, type KgLogger } from "./logger";
import { recommend } from "./recommendations";
import { loadRules, type RuleSet } from "./rules";
import { loadSeedClients, type ClientProfile } from "./seed_clients";
import { factsToSignals, loadSignalTable, type Signal, type SignalTable } from "./signals";
import { rankSimilar } from "./similarity";
import type { Fact, IngestionRecord, IngestResult, Recommendation, SimilarClient } from "./types";
import type { CompletionClient } from "@/src/lib/generation/completion_client";
import { GroundedGenerator } from "@/src/lib/generation/grounded_generator";
import type { GenerationOptions, GenerationResult, GenerationTask } from "@/src/lib/generation/types";

export type KnowledgeGraphServiceParams = {
  config?: KgConfig;
  logger?: KgLogger;
  /** Pre-loaded configuration; read from the configured files when omitted. */
  rules?: RuleSet;
  seed_clients?: readonly ClientProfile[];
  signal_table?: SignalTable;
  archetypes?: { career: readonly Archetype[]; business: readonly Archetype[] };
  completion_client?: CompletionClient;
  now?: () => Date;
};

function requireClientId(clientId: string) {
  const trimmed = clientId.trim();
  if (!trimmed) {
    throw new KgError({ code: "INVALID_CLIENT_ID", reason: "client_id must be a non-empty string." });
  }
  return trimmed;
}

function profileFromFacts(clientId: string, businessType: string | null, facts: Fact[]): ClientProfile {
  return {
    client_id: clientId,
    business_type: businessType,
    attributes: facts.map((fact) => ({ category: fact.category, predicate: fact.predicate, value: fact.value })),
  };
}

/**
 * In-process entry point for the dashboard: ingestion plus the queries over
 * stored facts. Rules, seed clients, signal phrases and archetypes are loaded once here;
 * a bad file fails construction with a KgConfigError.
 */
export class KnowledgeGraphService {
  readonly config: KgConfig;
  readonly logger: KgLogger;
  readonly facts: FactStore;
  readonly events: KgEventLog;
  private ingestionStore: IngestionStore;
  private rules: RuleSet;
  private seedClients: readonly ClientProfile[];
  private signalTable: SignalTable;
  private archetypes: { career: readonly Archetype[]; business: readonly Archetype[] };
  private generator: GroundedGenerator;
  private now: () => Date;
  private cachedGraph: KnowledgeGraph | null = null;

  constructor(params: KnowledgeGraphServiceParams = {}) {
    this.config = params.config ?? getKgConfig();
    this.logger = params.logger ?? createKgLogger({ echo: this.config.log_echo, max_entries: this.config.log_max_entries });
    this.now = params.now ?? (() => new Date());

    this.rules = params.rules ?? loadRules(this.config.rules_path);
    this.seedClients = params.seed_clients ?? loadSeedClients(this.config.seed_path);
    this.signalTable = params.signal_table ?? loadSignalTable(this.config.signal_phrases_path);
    this.archetypes = params.archetypes ?? {
      career: loadArchetypes(this.config.career_archetypes_path, this.signalTable),
      business: loadArchetypes(this.config.business_archetypes_path, this.signalTable),
    };

    fs.mkdirSync(this.config.data_dir, { recursive: true });
    this.facts = new FactStore({ journal_path: this.config.facts_path, logger: this.logger });
    this.ingestionStore = new IngestionStore(this.config.db_path);
    this.events = new KgEventLog(this.config.events_path);
    this.generator = new GroundedGenerator({
      config: this.config.generator,
      events: this.events,
      logger: this.logger,
      client: params.completion_client,
    });
  }

  ingest(documentBytes: Uint8Array, clientId: string, businessType?: string | null): IngestResult {
    const client_id = requireClientId(clientId);
    const business_type = businessType?.trim() || null;
    const document_hash = hashDocument(documentBytes);
    const requestId = this.events.newRequestId();
    const startedAt = Date.now();
    this.events.logEvent(requestId, "ingest_started", { client_id, document_hash, bytes: documentBytes.length });

    if (this.ingestionStore.hasIngested(client_id, document_hash)) {
      this.events.logDuration(requestId, "ingest_duplicate", startedAt, { client_id, document_hash });
      this.logger.info(`Document ${document_hash.slice(0, 12)} already ingested for ${client_id}; skipped.`);
      return {
        client_id,
        document_hash,
        facts_extracted: 0,
        facts_added: 0,
        already_ingested: true,
        yielded_nothing: false,
        reason: "duplicate_document",
      };
    }

    let extraction: ReturnType<typeof extractFacts>;
    try {
      extraction = extractFacts(documentBytes, client_id);
    } catch (error) {
      this.events.logDuration(requestId, "ingest_failed", startedAt, {
        client_id,
        document_hash,
        error: KgEventLog.serializeError(error),
      });
      this.logger.error(`Ingest for ${client_id} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }

    // Facts go first: a crash before the record is written only means the
    // next upload re-extracts and the store drops the repeats.
    const facts_added = this.facts.append(extraction.facts);
    this.ingestionStore.record({
      client_id,
      document_hash,
      business_type,
      ingested_at: this.now().toISOString(),
      facts_extracted: extraction.facts.length,
      facts_added,
    });

    if (facts_added > 0 || business_type !== null) this.rebuildGraph();

    const yielded_nothing = extraction.facts.length === 0;
    this.events.logDuration(requestId, "ingest_completed", startedAt, {
      client_id,
      document_hash,
      outcome: extraction.outcome,
      page_count: extraction.page_count,
      sections_found: extraction.sections_found,
      facts_extracted: extraction.facts.length,
      facts_added,
    });
    if (yielded_nothing) {
      this.logger.warn(`Document for ${client_id} yielded no facts (${extraction.outcome}).`);
    } else {
      this.logger.info(`Ingested ${client_id}: ${facts_added} new of ${extraction.facts.length} extracted facts.`);
    }

    return {
      client_id,
      document_hash,
      facts_extracted: extraction.facts.length,
      facts_added,
      already_ingested: false,
      yielded_nothing,
      reason: extraction.outcome,
    };
  }

  factsFor(clientId: string): Fact[] {
    return this.facts.factsFor(requireClientId(clientId));
  }

  private businessTypeOf(clientId: string, ingested: Map<string, string>) {
    return ingested.get(clientId) ?? this.seedClients.find((seed) => seed.client_id === clientId)?.business_type ?? null;
  }

  /**
   * Nearest known clients. The pool is the seed population plus, unless
   * disabled, every other ingested client; ingested facts replace a seed
   * record with the same id.
   */
  similar(clientId: string, topN: number = this.config.similar_top_n): SimilarClient[] {
    const client_id = requireClientId(clientId);
    const ingestedTypes = this.ingestionStore.businessTypes();

    const ownFacts = this.facts.factsFor(client_id);
    const target =
      ownFacts.length > 0
        ? profileFromFacts(client_id, this.businessTypeOf(client_id, ingestedTypes), ownFacts)
        : this.seedClients.find((seed) => seed.client_id === client_id);
    if (!target) return [];

    const pool = new Map<string, ClientProfile>(this.seedClients.map((seed) => [seed.client_id, seed]));
    if (this.config.include_ingested_clients) {
      const byClient = new Map<string, Fact[]>();
      for (const fact of this.facts.allFacts()) {
        byClient.set(fact.client_id, [...(byClient.get(fact.client_id) ?? []), fact]);
      }
      for (const [id, facts] of byClient) {
        pool.set(id, profileFromFacts(id, this.businessTypeOf(id, ingestedTypes), facts));
      }
    }
    pool.delete(client_id);

    return rankSimilar(target, [...pool.values()], { top_n: topN });
  }

  recommend(clientId: string): Recommendation[] {
    const client_id = requireClientId(clientId);
    return recommend(client_id, this.facts.factsFor(client_id), this.rules);
  }

  /** Drafts text from the given facts (content hashes). Unknown ids are rejected. */
  async generate(task: GenerationTask, factIds: string[], options: GenerationOptions = {}): Promise<GenerationResult> {
    const ids = [...new Set(factIds)];
    const facts = this.facts.getFacts(ids);
    if (facts.length !== ids.length) {
      const known = new Set(facts.map((fact) => fact.content_hash));
      const missing = ids.filter((id) => !known.has(id));
      throw new KgError({
        code: "UNKNOWN_FACT",
        reason: `Unknown fact id(s): ${missing.join(", ")}`,
        details: missing,
        next_action: "Pass content hashes returned by factsFor() or recommend().",
      });
    }
    return this.generator.generate(task, facts, options);
  }

  graph(): KnowledgeGraph {
    if (!this.cachedGraph) {
      this.cachedGraph = buildGraph(this.facts.allFacts(), { business_types: this.ingestionStore.businessTypes() });
    }
    return this.cachedGraph;
  }

  /** Rebuilds the graph from the journal and, when enabled, overwrites the snapshot file. */
  rebuildGraph(): GraphSnapshot {
    const requestId = this.events.newRequestId();
    const startedAt = Date.now();
    this.cachedGraph = null;
    const graph = this.graph();
    const snapshot = this.config.write_graph_snapshot
      ? writeGraphSnapshot(graph, this.config.graph_path)
      : graph.snapshot();
    this.events.logDuration(requestId, "graph_rebuilt", startedAt, {
      ...graph.counts(),
      written: this.config.write_graph_snapshot,
    });
    return snapshot;
  }

  signals(clientId: string): Signal[] {
    return factsToSignals(this.facts.factsFor(requireClientId(clientId)), this.signalTable);
  }

  /** Career and business archetypes ranked by the client's signals; empty lists for a client with no facts. */
  fit(clientId: string, topN: number = this.config.fit_top_n): ClientFit {
    const signals = this.signals(clientId);
    if (signals.length === 0) return { career: [], business: [] };
    return {
      career: scoreArchetypes(signals, this.archetypes.career, { top_n: topN }),
      business: scoreArchetypes(signals, this.archetypes.business, { top_n: topN }),
    };
  }

  /** Bounded summary of a client's facts, recommendations and nearest clients. */
  contextPack(clientId: string): ContextPack {
    const client_id = requireClientId(clientId);
    return buildContextPack({
      client_id,
      facts: this.facts.factsFor(client_id),
      recommendations: this.recommend(client_id),
      similar: this.similar(client_id, MAX_PACK_SIMILAR),
    });
  }

  ingestions(clientId: string): IngestionRecord[] {
    return this.ingestionStore.listFor(requireClientId(clientId));
  }

  close(): void {
    this.ingestionStore.close();
  }
}
