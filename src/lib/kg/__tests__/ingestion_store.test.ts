import { afterEach, describe, expect, it } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { IngestionStore } from "../ingestion_store";
import type { IngestionRecord } from "../types";

const HASH_A = "a".repeat(64);
const HASH_B = "b".repeat(64);

function record(overrides: Partial<IngestionRecord> = {}): IngestionRecord {
  return {
    client_id: "C1",
    document_hash: HASH_A,
    business_type: null,
    ingested_at: "2026-01-05T10:00:00.000Z",
    facts_extracted: 7,
    facts_added: 7,
    ...overrides,
  };
}

describe("IngestionStore", () => {
  let store: IngestionStore | null = null;

  afterEach(() => {
    store?.close();
    store = null;
  });

  function openStore() {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "kg-ingestions-"));
    store = new IngestionStore(path.join(dir, "kg.db"));
    return store;
  }

  it("records each document once per client", () => {
    const ingestions = openStore();
    ingestions.record(record());
    ingestions.record(record({ facts_added: 0, ingested_at: "2026-01-06T10:00:00.000Z" }));

    expect(ingestions.hasIngested("C1", HASH_A)).toBe(true);
    expect(ingestions.hasIngested("C2", HASH_A)).toBe(false);
    expect(ingestions.listFor("C1")).toEqual([record()]);
  });

  it("keeps the latest business type per client", () => {
    const ingestions = openStore();
    ingestions.record(record({ business_type: "Cafe" }));
    ingestions.record(record({ document_hash: HASH_B, business_type: "Bakery", ingested_at: "2026-02-01T09:00:00.000Z" }));
    ingestions.record(record({ client_id: "C2", business_type: null }));

    expect([...ingestions.businessTypes()]).toEqual([["C1", "Bakery"]]);
    expect(ingestions.listFor("C1").map((row) => row.document_hash)).toEqual([HASH_A, HASH_B]);
  });

  it("rejects malformed records", () => {
    const ingestions = openStore();
    expect(() => ingestions.record(record({ document_hash: "not-a-hash" }))).toThrow();
    expect(ingestions.listFor("C1")).toEqual([]);
  });
});
