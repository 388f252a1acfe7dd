import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { IngestionRecord } from "./types";
import { assertValid, validateIngestionRecord } from "./schemas/validators";

type IngestionRow = {
  client_id: string;
  document_hash: string;
  business_type: string | null;
  ingested_at: string;
  facts_extracted: number;
  facts_added: number;
};

function initDb(dbPath: string) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(`
    CREATE TABLE IF NOT EXISTS document_ingestions (
      client_id TEXT NOT NULL,
      document_hash TEXT NOT NULL,
      business_type TEXT,
      ingested_at TEXT NOT NULL,
      facts_extracted INTEGER NOT NULL,
      facts_added INTEGER NOT NULL,
      PRIMARY KEY (client_id, document_hash)
    );
    CREATE INDEX IF NOT EXISTS idx_ingestions_client ON document_ingestions(client_id);
  `);
  return db;
}

/** One row per uploaded document and client; drives idempotent re-upload. */
export class IngestionStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = initDb(dbPath);
  }

  hasIngested(clientId: string, documentHash: string): boolean {
    const row = this.db
      .prepare("SELECT 1 AS found FROM document_ingestions WHERE client_id = ? AND document_hash = ?")
      .get(clientId, documentHash);
    return row !== undefined;
  }

  record(record: IngestionRecord): void {
    assertValid(validateIngestionRecord, record, "IngestionRecord");
    this.db
      .prepare(
        `INSERT INTO document_ingestions (client_id, document_hash, business_type, ingested_at, facts_extracted, facts_added)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(client_id, document_hash) DO NOTHING`
      )
      .run(
        record.client_id,
        record.document_hash,
        record.business_type,
        record.ingested_at,
        record.facts_extracted,
        record.facts_added
      );
  }

  listFor(clientId: string): IngestionRecord[] {
    return this.db
      .prepare(
        `SELECT client_id, document_hash, business_type, ingested_at, facts_extracted, facts_added
         FROM document_ingestions WHERE client_id = ? ORDER BY ingested_at, rowid`
      )
      .all(clientId) as IngestionRow[];
  }

  /** Latest non-null business type per client. */
  businessTypes(): Map<string, string> {
    const rows = this.db
      .prepare(
        `SELECT client_id, business_type FROM document_ingestions
         WHERE business_type IS NOT NULL ORDER BY ingested_at, rowid`
      )
      .all() as Array<{ client_id: string; business_type: string }>;
    const out = new Map<string, string>();
    for (const row of rows) out.set(row.client_id, row.business_type);
    return out;
  }

  close(): void {
    this.db.close();
  }
}
