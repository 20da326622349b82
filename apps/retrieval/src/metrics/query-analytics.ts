/**
 * In-memory query history with response-time and usage summaries
 */

import type { JurisdictionFilter, RetrievalMode } from '../store/types.js';
import type { MetricsReport } from './retrieval-metrics.js';

export interface QueryLogEntry {
  query: string;
  numResults: number;
  jurisdiction?: JurisdictionFilter;
  responseTimeMs: number;
  metrics: MetricsReport;
  mode: RetrievalMode;
}

interface RecordedQuery extends QueryLogEntry {
  timestamp: string;
}

export interface QuerySummaryStatistics {
  totalQueries: number;
  avgResponseTimeMs: number;
  medianResponseTimeMs: number;
  p95ResponseTimeMs: number;
  jurisdictionDistribution: Record<string, number>;
  avgResultsPerQuery: number;
  degradedRate: number;
}

/**
 * Percentile with linear interpolation between the closest ranks
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class QueryAnalytics {
  private history: RecordedQuery[] = [];

  logQuery(entry: QueryLogEntry): void {
    this.history.push({ ...entry, timestamp: new Date().toISOString() });
  }

  get size(): number {
    return this.history.length;
  }

  getSummaryStatistics(): QuerySummaryStatistics | null {
    if (this.history.length === 0) {
      return null;
    }

    const responseTimes = this.history.map(entry => entry.responseTimeMs);
    const jurisdictionDistribution: Record<string, number> = {};

    for (const entry of this.history) {
      const key = entry.jurisdiction ?? 'all';
      jurisdictionDistribution[key] = (jurisdictionDistribution[key] ?? 0) + 1;
    }

    const degraded = this.history.filter(entry => entry.mode !== 'vector').length;

    return {
      totalQueries: this.history.length,
      avgResponseTimeMs: mean(responseTimes),
      medianResponseTimeMs: percentile(responseTimes, 50),
      p95ResponseTimeMs: percentile(responseTimes, 95),
      jurisdictionDistribution,
      avgResultsPerQuery: mean(this.history.map(entry => entry.numResults)),
      degradedRate: degraded / this.history.length,
    };
  }

  clear(): void {
    this.history = [];
  }
}
