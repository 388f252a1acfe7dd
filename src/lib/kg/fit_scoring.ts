/**
 * Fit Scoring
 *
 * Ranks career and business archetypes against a client's signals. Each
 * archetype weights the signal tags it needs and the ones it should avoid;
 * the score is the weighted sum of the first minus the second.
 */

import { z } from "zod";
import { deepFreeze, readJsonConfig } from "./config_file";
import { isAcceptableEvidence } from "./evidence_text";
import type { Signal, SignalTable } from "./signals";

export const MAX_FIT_EVIDENCE = 2;
export const MAX_WATCH_OUTS = 2;
const MAX_RATIONALE_TAGS = 3;
const MAX_FIT_SNIPPET_CHARS = 200;

const TagWeightsSchema = z.record(z.string().min(1), z.number().positive());

export const ArchetypeSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  requires: TagWeightsSchema,
  avoid: TagWeightsSchema.default({}),
  recommended_actions: z.array(z.string().min(1)).default([]),
});

export type Archetype = z.infer<typeof ArchetypeSchema>;

export type FitEvidence = { fact_id: string; page: number; snippet: string };

export type FitResult = {
  name: string;
  description: string;
  score: number;
  rationale: string;
  evidence_used: FitEvidence[];
  watch_outs: string[];
  recommended_actions: string[];
};

export type ClientFit = { career: FitResult[]; business: FitResult[] };

/** The archetype file schema, bound to the tags the signal table knows. */
export function archetypeFileSchema(knownTags: readonly string[]) {
  const known = new Set(knownTags);
  return z
    .object({ archetypes: z.array(ArchetypeSchema).min(1) })
    .superRefine((file, ctx) => {
      const names = new Set<string>();
      file.archetypes.forEach((archetype, index) => {
        if (names.has(archetype.name)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["archetypes", index, "name"], message: `duplicate archetype ${archetype.name}` });
        }
        names.add(archetype.name);
        for (const field of ["requires", "avoid"] as const) {
          for (const tag of Object.keys(archetype[field])) {
            if (!known.has(tag)) {
              ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["archetypes", index, field, tag], message: `unknown tag ${tag}` });
            }
          }
        }
      });
    });
}

export function loadArchetypes(filePath: string, table: SignalTable): readonly Archetype[] {
  return deepFreeze(readJsonConfig(filePath, archetypeFileSchema(table.tags), "Archetype file").archetypes);
}

const DO_DONT = /^(?:do|don['’]?t)\s*:/i;
const STRONG_WORDS = /\b(?:people[- ]oriented|big[- ]picture|direct|focused|results?)\b/i;

/** Higher is better: Do/Don't lines, mid-length, complete sentences. */
export function evidenceQuality(snippet: string): number {
  const text = snippet.trim();
  if (!text) return 0;
  let score = 0;
  if (DO_DONT.test(text)) score += 50;
  if (text.length >= 20 && text.length <= 120) score += 20;
  else if (text.length >= 18 && text.length <= 150) score += 10;
  if (/[.!?]$/.test(text)) score += 10;
  if (STRONG_WORDS.test(text)) score += 5;
  if (text.split("...").length - 1 < 2) score += 5;
  return score;
}

function pickEvidence(byTag: Map<string, Signal>, tags: string[]): FitEvidence[] {
  const candidates: Array<FitEvidence & { quality: number }> = [];
  for (const tag of tags) {
    for (const item of byTag.get(tag)?.evidence ?? []) {
      const snippet = item.snippet.trim().slice(0, MAX_FIT_SNIPPET_CHARS);
      if (!isAcceptableEvidence(snippet)) continue;
      candidates.push({ ...item, snippet, quality: evidenceQuality(snippet) });
    }
  }

  candidates.sort((a, b) => b.quality - a.quality || a.page - b.page);
  const seen = new Set<string>();
  const picked: FitEvidence[] = [];
  for (const { fact_id, page, snippet } of candidates) {
    if (picked.length >= MAX_FIT_EVIDENCE) break;
    const key = snippet.toLowerCase().slice(0, 120);
    if (seen.has(key)) continue;
    seen.add(key);
    picked.push({ fact_id, page, snippet });
  }
  return picked;
}

function round2(value: number) {
  return Math.round(value * 100) / 100;
}

export function scoreArchetypes(
  signals: Signal[],
  archetypes: readonly Archetype[],
  options: { top_n?: number } = {}
): FitResult[] {
  const topN = options.top_n ?? 5;
  const byTag = new Map(signals.map((signal) => [signal.tag, signal]));
  const scoreOf = (tag: string) => byTag.get(tag)?.score ?? 0;

  const scored = archetypes.map((archetype, order) => {
    let positive = 0;
    const contributing: Array<{ tag: string; amount: number }> = [];
    for (const [tag, weight] of Object.entries(archetype.requires)) {
      const amount = scoreOf(tag) * weight;
      positive += amount;
      if (amount > 0) contributing.push({ tag, amount });
    }

    let negative = 0;
    const watchTags: string[] = [];
    for (const [tag, weight] of Object.entries(archetype.avoid)) {
      const amount = scoreOf(tag) * weight;
      negative += amount;
      if (amount > 0) watchTags.push(tag);
    }

    // Stable: equal contributions keep the archetype's own tag order.
    contributing.sort((a, b) => b.amount - a.amount);
    const topTags = contributing.slice(0, MAX_RATIONALE_TAGS).map((item) => item.tag);

    const result: FitResult = {
      name: archetype.name,
      description: archetype.description,
      score: round2(positive - negative),
      rationale: topTags.length > 0 ? `Why: ${topTags.join("; ")}` : "Limited signal match.",
      evidence_used: pickEvidence(byTag, topTags),
      watch_outs: watchTags.slice(0, MAX_WATCH_OUTS).map((tag) => `Watch-out: ${tag}; adjust the approach.`),
      recommended_actions: [...archetype.recommended_actions],
    };
    return { result, order };
  });

  return scored
    .sort((a, b) => b.result.score - a.result.score || a.order - b.order)
    .slice(0, Math.max(0, topN))
    .map((item) => item.result);
}
