import { z } from "zod";
import { deepFreeze, readJsonConfig } from "./config_file";
import { prepareEvidenceForDisplay } from "./evidence_text";
import { foldText } from "./text_normalize";
import type { Fact } from "./types";

export const SignalTableSchema = z
  .object({
    fallback_tag: z.string().min(1),
    max_evidence_per_tag: z.number().int().min(0),
    tags: z.array(z.string().min(1)).min(1),
    phrases: z.array(z.object({ phrase: z.string().min(1), tag: z.string().min(1) })),
  })
  .superRefine((table, ctx) => {
    const known = new Set(table.tags);
    if (!known.has(table.fallback_tag)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["fallback_tag"], message: `unknown tag ${table.fallback_tag}` });
    }
    table.phrases.forEach((entry, index) => {
      if (!known.has(entry.tag)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["phrases", index, "tag"], message: `unknown tag ${entry.tag}` });
      }
    });
  });

export type SignalTable = z.infer<typeof SignalTableSchema>;

export type SignalEvidence = { fact_id: string; page: number; snippet: string };

export type Signal = {
  tag: string;
  score: number;
  evidence: SignalEvidence[];
};

export function loadSignalTable(filePath: string): SignalTable {
  return deepFreeze(readJsonConfig(filePath, SignalTableSchema, "Signal phrase file"));
}

export function matchSignalTags(value: string, table: SignalTable): string[] {
  const folded = foldText(value).trim();
  const tags: string[] = [];
  for (const { phrase, tag } of table.phrases) {
    if (folded.includes(phrase) && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

/**
 * Maps facts onto the canonical coaching signals. Score is the number of
 * facts behind a tag; only snippets that survive display cleaning are kept.
 */
export function factsToSignals(facts: Fact[], table: SignalTable): Signal[] {
  const byTag = new Map<string, Signal>();
  for (const fact of facts) {
    const matched = matchSignalTags(fact.value, table);
    const tags = matched.length > 0 ? matched : [table.fallback_tag];
    const snippet = prepareEvidenceForDisplay(fact.source_snippet);

    for (const tag of tags) {
      const signal = byTag.get(tag) ?? { tag, score: 0, evidence: [] };
      signal.score += 1;
      if (snippet && signal.evidence.length < table.max_evidence_per_tag) {
        signal.evidence.push({ fact_id: fact.content_hash, page: fact.source_page, snippet });
      }
      byTag.set(tag, signal);
    }
  }

  const order = new Map(table.tags.map((tag, index) => [tag, index]));
  return [...byTag.values()].sort(
    (a, b) => b.score - a.score || (order.get(a.tag) ?? 0) - (order.get(b.tag) ?? 0)
  );
}
