/**
 * Similarity Engine
 *
 * TF-IDF over `category:predicate:value` tokens, cosine scored. The vector
 * space is fitted over the query and the candidates of a single call, so a
 * ranking depends only on its inputs.
 */

import { collapseWhitespace, foldText } from "./text_normalize";
import type { ClientProfile, ProfileAttribute } from "./seed_clients";
import type { SimilarClient } from "./types";

export const DEFAULT_TOP_N = 10;

export function profileToken(attribute: ProfileAttribute): string {
  return foldText(collapseWhitespace(`${attribute.category}:${attribute.predicate}:${attribute.value}`));
}

export function profileTokens(profile: Pick<ClientProfile, "attributes">): string[] {
  return profile.attributes.map(profileToken);
}

function termCounts(tokens: string[]) {
  const counts = new Map<string, number>();
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);
  return counts;
}

function cosineSimilarity(a: number[], b: number[]) {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

function l2Normalize(vector: number[]) {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

/** Smoothed idf: ln((1 + N) / (1 + df)) + 1. */
export function fitTfIdf(documents: string[][]) {
  const counts = documents.map(termCounts);
  const vocabulary = [...new Set(documents.flat())].sort();
  const n = documents.length;
  const idf = vocabulary.map((term) => {
    const df = counts.filter((c) => c.has(term)).length;
    return Math.log((1 + n) / (1 + df)) + 1;
  });
  const vectors = counts.map((c) => l2Normalize(vocabulary.map((term, i) => (c.get(term) ?? 0) * idf[i])));
  return { vocabulary, vectors };
}

/**
 * Ranks candidates by similarity to the target profile: score descending, ties
 * by client_id ascending. Candidates with no shared token score 0 and stay in.
 */
export function rankSimilar(
  target: ClientProfile,
  candidates: readonly ClientProfile[],
  options: { top_n?: number } = {}
): SimilarClient[] {
  const topN = Math.max(0, Math.trunc(options.top_n ?? DEFAULT_TOP_N));
  const pool = candidates.filter((candidate) => candidate.client_id !== target.client_id);
  if (pool.length === 0 || topN === 0) return [];

  const queryTokens = profileTokens(target);
  const candidateTokens = pool.map((candidate) => profileTokens(candidate));
  const { vectors } = fitTfIdf([queryTokens, ...candidateTokens]);
  const [queryVector, ...candidateVectors] = vectors;
  const querySet = new Set(queryTokens);

  return pool
    .map((candidate, index) => ({
      client_id: candidate.client_id,
      score: cosineSimilarity(queryVector, candidateVectors[index]),
      business_type: candidate.business_type,
      shared_tokens: [...new Set(candidateTokens[index])].filter((token) => querySet.has(token)).sort(),
    }))
    .sort((a, b) => b.score - a.score || (a.client_id < b.client_id ? -1 : a.client_id > b.client_id ? 1 : 0))
    .slice(0, topN);
}
