import crypto from "node:crypto";
import type { Fact, FactDraft } from "./types";

function sha256(data: string | Uint8Array) {
  return crypto.createHash("sha256").update(data).digest("hex");
}

export function hashDocument(bytes: Uint8Array): string {
  return sha256(bytes);
}

export function hashFact(fact: Pick<FactDraft, "client_id" | "category" | "predicate" | "value" | "source_page">): string {
  const payload = JSON.stringify([fact.client_id, fact.category, fact.predicate, fact.value, fact.source_page]);
  return sha256(payload);
}

export function withContentHash(draft: FactDraft): Fact {
  return { ...draft, content_hash: hashFact(draft) };
}
