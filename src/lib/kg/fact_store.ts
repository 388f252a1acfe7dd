import fs from "node:fs";
import path from "node:path";
import { hashFact } from "./content_hash";
import { FactSchema, type Fact } from "./types";
import type { KgLogger } from "./logger";
import { assertValid, validateFactRecord } from "./schemas/validators";

/**
 * Append-only fact journal (one JSON fact per line).
 *
 * Facts are never updated or removed; a correction is a new fact. Each append
 * is a separate write, so a failure part-way keeps the facts written before it.
 */
export class FactStore {
  readonly journal_path: string;
  private logger?: KgLogger;
  private hashesByClient: Map<string, Set<string>> | null = null;

  constructor(params: { journal_path: string; logger?: KgLogger }) {
    this.journal_path = params.journal_path;
    this.logger = params.logger;
  }

  private readJournal(): Fact[] {
    if (!fs.existsSync(this.journal_path)) return [];
    const lines = fs.readFileSync(this.journal_path, "utf-8").split("\n");
    const facts: Fact[] = [];
    lines.forEach((line, index) => {
      const trimmed = line.trim();
      if (!trimmed) return;
      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch (error) {
        // Only a crash mid-append leaves a torn line behind.
        this.logger?.warn(`Skipping unreadable journal line ${index + 1}: ${String(error)}`);
        return;
      }
      const parsed = FactSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger?.warn(`Skipping invalid journal line ${index + 1}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        return;
      }
      facts.push(parsed.data);
    });
    return facts;
  }

  private index(): Map<string, Set<string>> {
    if (this.hashesByClient) return this.hashesByClient;
    const index = new Map<string, Set<string>>();
    for (const fact of this.readJournal()) {
      const hashes = index.get(fact.client_id) ?? new Set<string>();
      hashes.add(fact.content_hash);
      index.set(fact.client_id, hashes);
    }
    this.hashesByClient = index;
    return index;
  }

  // A torn last line must not swallow the next record.
  private ensureLineBoundary() {
    if (!fs.existsSync(this.journal_path)) return;
    const size = fs.statSync(this.journal_path).size;
    if (size === 0) return;
    const fd = fs.openSync(this.journal_path, "r");
    try {
      const last = Buffer.alloc(1);
      fs.readSync(fd, last, 0, 1, size - 1);
      if (last[0] !== 0x0a) fs.appendFileSync(this.journal_path, "\n");
    } finally {
      fs.closeSync(fd);
    }
  }

  /** Appends facts not yet stored for their client; returns how many were written. */
  append(facts: Fact[]): number {
    const index = this.index();
    this.ensureLineBoundary();
    let inserted = 0;
    for (const candidate of facts) {
      const fact: Fact = { ...candidate, content_hash: hashFact(candidate) };
      assertValid(validateFactRecord, fact, "FactRecord");

      const hashes = index.get(fact.client_id) ?? new Set<string>();
      if (hashes.has(fact.content_hash)) continue;

      fs.mkdirSync(path.dirname(this.journal_path), { recursive: true });
      fs.appendFileSync(this.journal_path, `${JSON.stringify(fact)}\n`);
      hashes.add(fact.content_hash);
      index.set(fact.client_id, hashes);
      inserted += 1;
    }
    return inserted;
  }

  factsFor(clientId: string): Fact[] {
    return this.readJournal().filter((fact) => fact.client_id === clientId);
  }

  allFacts(): Fact[] {
    return this.readJournal();
  }

  clientIds(): string[] {
    return [...this.index().keys()];
  }

  hasFact(contentHash: string): boolean {
    for (const hashes of this.index().values()) {
      if (hashes.has(contentHash)) return true;
    }
    return false;
  }

  /** Looks facts up by content hash, keeping the order of `ids`. Unknown ids are left out. */
  getFacts(ids: string[]): Fact[] {
    const byHash = new Map(this.readJournal().map((fact) => [fact.content_hash, fact]));
    return ids.flatMap((id) => {
      const fact = byHash.get(id);
      return fact ? [fact] : [];
    });
  }
}
