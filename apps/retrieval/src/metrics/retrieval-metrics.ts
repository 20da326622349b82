/**
 * Retrieval quality metrics
 *
 * Pure ranking metrics over document ids. Degenerate inputs (no relevant
 * ids, k <= 0, zero ideal DCG) score 0 rather than throwing.
 */

import type { QueryResult } from '../store/types.js';

export const DEFAULT_K_VALUES = [1, 3, 5, 10];

export type MetricsReport = Record<string, number>;

function topK(rankedIds: readonly string[], k: number): Set<string> {
  return new Set(rankedIds.slice(0, Math.max(0, k)));
}

function countRelevant(ids: Iterable<string>, relevantIds: ReadonlySet<string>): number {
  let hits = 0;
  for (const id of ids) {
    if (relevantIds.has(id)) {
      hits++;
    }
  }
  return hits;
}

/**
 * Share of relevant ids found in the first k results
 */
export function recallAtK(rankedIds: readonly string[], relevantIds: ReadonlySet<string>, k: number): number {
  if (relevantIds.size === 0) {
    return 0;
  }
  return countRelevant(topK(rankedIds, k), relevantIds) / relevantIds.size;
}

/**
 * Share of the first k positions holding a relevant id
 */
export function precisionAtK(rankedIds: readonly string[], relevantIds: ReadonlySet<string>, k: number): number {
  if (k <= 0) {
    return 0;
  }
  return countRelevant(topK(rankedIds, k), relevantIds) / k;
}

export function meanReciprocalRank(rankedIds: readonly string[], relevantIds: ReadonlySet<string>): number {
  const rank = rankedIds.findIndex(id => relevantIds.has(id));
  return rank === -1 ? 0 : 1 / (rank + 1);
}

/**
 * Sum of precision at each rank holding a new relevant id, over the total
 * number of relevant ids (found or not)
 */
export function averagePrecision(rankedIds: readonly string[], relevantIds: ReadonlySet<string>): number {
  if (relevantIds.size === 0) {
    return 0;
  }

  const found = new Set<string>();
  let precisionSum = 0;

  rankedIds.forEach((id, position) => {
    if (relevantIds.has(id) && !found.has(id)) {
      found.add(id);
      precisionSum += found.size / (position + 1);
    }
  });

  return precisionSum / relevantIds.size;
}

function discountedGain(gains: readonly number[]): number {
  return gains.reduce((sum, gain, position) => sum + gain / Math.log2(position + 2), 0);
}

/**
 * Normalized discounted cumulative gain over graded relevance. The ideal
 * ranking orders every scored id by descending relevance.
 */
export function ndcgAtK(
  rankedIds: readonly string[],
  relevanceScores: ReadonlyMap<string, number>,
  k: number
): number {
  if (k <= 0 || relevanceScores.size === 0) {
    return 0;
  }

  const idealGains = [...relevanceScores.values()]
    .map(score => Math.max(0, score))
    .sort((a, b) => b - a)
    .slice(0, k);
  const idealDcg = discountedGain(idealGains);

  if (idealDcg === 0) {
    return 0;
  }

  // A repeated id earns gain only at its first position
  const seen = new Set<string>();
  const actualGains = rankedIds.slice(0, k).map(id => {
    if (seen.has(id)) {
      return 0;
    }
    seen.add(id);
    return Math.max(0, relevanceScores.get(id) ?? 0);
  });

  return discountedGain(actualGains) / idealDcg;
}

function similarity(distance: number): number {
  return Math.min(1, Math.max(0, 1 - distance));
}

/**
 * Score one query's results. Ground-truth metrics (mrr, average_precision,
 * recall@k, precision@k) appear only when relevantIds is supplied, even
 * if empty. ndcg@k always grades each retrieved id by its similarity
 * (clamped `1 - distance`), so it measures how well the ranking follows
 * the distances.
 */
export function calculateAllMetrics(
  retrievedDocs: ReadonlyArray<Pick<QueryResult, 'id' | 'distance'>>,
  relevantIds?: Iterable<string>,
  kValues: readonly number[] = DEFAULT_K_VALUES
): MetricsReport {
  const rankedIds = retrievedDocs.map(doc => doc.id);
  const distances = retrievedDocs.map(doc => doc.distance);
  const similarities = distances.map(similarity);

  const metrics: MetricsReport = {
    total_retrieved: retrievedDocs.length,
    avg_relevance_score: similarities.length
      ? similarities.reduce((sum, value) => sum + value, 0) / similarities.length
      : 0,
    min_distance: distances.length ? Math.min(...distances) : 1,
    max_distance: distances.length ? Math.max(...distances) : 1,
  };

  const relevant = relevantIds === undefined ? undefined : new Set(relevantIds);

  const relevanceScores = new Map<string, number>();
  retrievedDocs.forEach((doc, position) => {
    if (!relevanceScores.has(doc.id)) {
      relevanceScores.set(doc.id, similarities[position]);
    }
  });

  if (relevant) {
    metrics.mrr = meanReciprocalRank(rankedIds, relevant);
    metrics.average_precision = averagePrecision(rankedIds, relevant);
  }

  for (const k of kValues) {
    if (relevant) {
      metrics[`recall@${k}`] = recallAtK(rankedIds, relevant, k);
      metrics[`precision@${k}`] = precisionAtK(rankedIds, relevant, k);
    }
    metrics[`ndcg@${k}`] = ndcgAtK(rankedIds, relevanceScores, k);
  }

  return metrics;
}
