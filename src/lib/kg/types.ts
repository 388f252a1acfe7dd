import { z } from "zod";

export const FactCategorySchema = z.enum([
  "behavioral",
  "driving_force",
  "communication",
  "motivator",
  "risk",
  "other",
]);
export type FactCategory = z.infer<typeof FactCategorySchema>;

export const FactSchema = z.object({
  client_id: z.string().min(1),
  category: FactCategorySchema,
  predicate: z.string().regex(/^[a-z][a-z0-9_]*$/),
  value: z.string().min(1),
  source_page: z.number().int().min(1),
  source_snippet: z.string(),
  content_hash: z.string().regex(/^[0-9a-f]{64}$/),
});
export type Fact = z.infer<typeof FactSchema>;

/** A fact before its content hash is assigned. */
export type FactDraft = Omit<Fact, "content_hash">;

export type IngestionRecord = {
  client_id: string;
  document_hash: string;
  business_type: string | null;
  ingested_at: string;
  facts_extracted: number;
  facts_added: number;
};

export type ExtractionOutcome = "facts_found" | "no_recognized_headings" | "no_trigger_matches";

export type ExtractionResult = {
  client_id: string;
  facts: Fact[];
  outcome: ExtractionOutcome;
  page_count: number;
  sections_found: number;
};

export type IngestResult = {
  client_id: string;
  document_hash: string;
  facts_extracted: number;
  facts_added: number;
  already_ingested: boolean;
  yielded_nothing: boolean;
  reason: ExtractionOutcome | "duplicate_document";
};

export type EvidenceRef = {
  fact_id: string;
  category: FactCategory;
  predicate: string;
  value: string;
  page: number;
  snippet: string;
};

export type Recommendation = {
  rule_id: string;
  action: string;
  why: string;
  priority: number;
  evidence: EvidenceRef[];
};

export type SimilarClient = {
  client_id: string;
  score: number;
  business_type: string | null;
  shared_tokens: string[];
};

export function toEvidenceRef(fact: Fact): EvidenceRef {
  return {
    fact_id: fact.content_hash,
    category: fact.category,
    predicate: fact.predicate,
    value: fact.value,
    page: fact.source_page,
    snippet: fact.source_snippet,
  };
}
