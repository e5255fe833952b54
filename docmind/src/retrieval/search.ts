import type { IndexRecord, RecordFilter, ScoredRecord } from "./types.js";
import { cosineSimilarity } from "./similarity.js";

/**
 * Brute-force top-k by cosine similarity. Records whose dimension differs from
 * the query are ignored. Ties are broken by record id so results are stable.
 */
export function topKSimilarRecords(params: {
  queryEmbedding: number[];
  records: Iterable<IndexRecord>;
  k: number;
  filter?: RecordFilter;
}): ScoredRecord[] {
  const expectedDim = params.queryEmbedding.length;
  if (expectedDim === 0 || params.k <= 0) return [];

  const scored: ScoredRecord[] = [];
  for (const record of params.records) {
    if (record.embedding.length !== expectedDim) continue;
    if (params.filter && !params.filter(record.metadata)) continue;
    scored.push({ record, score: cosineSimilarity(params.queryEmbedding, record.embedding) });
  }

  return scored
    .sort((a, b) => b.score - a.score || (a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0))
    .slice(0, params.k);
}
