/**
 * Retrieval Evaluation Harness
 *
 * Runs labelled queries from a JSONL fixture file against a vector store
 * and scores each ranking:
 *
 * - Recall / Precision @k: how many of the expected documents are retrieved
 * - Mean Reciprocal Rank: 1/rank of the first expected document
 * - Average Precision and NDCG@k: ranking quality over all expected documents
 * - Degraded / empty rates: how often search fell back or found nothing
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import {
  calculateAllMetrics,
  DEFAULT_K_VALUES,
  type MetricsReport,
} from '../metrics/retrieval-metrics.js';
import { QueryAnalytics, type QuerySummaryStatistics } from '../metrics/query-analytics.js';
import { JURISDICTIONS, type RetrievalMode, type SearchResponse, type JurisdictionFilter } from '../store/types.js';

const log = createLogger('evaluation.harness');

export const fixtureSchema = z.object({
  query: z.string().min(1),
  relevantIds: z.array(z.string()),
  jurisdiction: z.union([z.enum(JURISDICTIONS), z.literal('all')]).optional(),
  description: z.string().optional(),
});

export type EvalFixture = z.infer<typeof fixtureSchema>;

/** The part of the store the harness drives */
export interface SearchableStore {
  search(query: string, jurisdiction?: JurisdictionFilter, limit?: number): Promise<SearchResponse>;
}

export interface FixtureResult {
  fixture: EvalFixture;
  retrievedIds: string[];
  mode: RetrievalMode;
  degraded: boolean;
  metrics: MetricsReport;
  responseTimeMs: number;
}

export interface EvaluationSummary {
  totalQueries: number;
  meanMetrics: MetricsReport;
  degradedRate: number;
  emptyRate: number;
  analytics: QuerySummaryStatistics | null;
}

export interface EvaluationReport {
  results: FixtureResult[];
  summary: EvaluationSummary;
}

export class RetrievalEvaluationHarness {
  private readonly kValues: readonly number[];

  constructor(
    private readonly store: SearchableStore,
    kValues: readonly number[] = DEFAULT_K_VALUES
  ) {
    this.kValues = kValues;
  }

  /**
   * Load fixtures from a JSONL file, skipping lines that fail validation
   */
  async loadFixtures(fixturePath: string): Promise<EvalFixture[]> {
    let content: string;
    try {
      content = await fs.readFile(fixturePath, 'utf-8');
    } catch (error) {
      log.error({ error, fixturePath }, 'Failed to load evaluation fixtures');
      throw error;
    }

    const fixtures: EvalFixture[] = [];
    const lines = content.split('\n');

    for (const [index, line] of lines.entries()) {
      if (!line.trim()) {
        continue;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        log.warn({ line: index + 1, error: String(error) }, 'Skipping unparsable fixture line');
        continue;
      }

      const parsed = fixtureSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn({ line: index + 1, issues: parsed.error.issues }, 'Skipping invalid fixture line');
        continue;
      }

      fixtures.push(parsed.data);
    }

    log.info({ fixturesLoaded: fixtures.length, fixturePath }, 'Loaded evaluation fixtures');
    return fixtures;
  }

  async evaluate(fixtures: EvalFixture[]): Promise<EvaluationReport> {
    const analytics = new QueryAnalytics();
    const limit = Math.max(0, ...this.kValues);
    const results: FixtureResult[] = [];

    for (const fixture of fixtures) {
      const startTime = Date.now();
      const response = await this.store.search(fixture.query, fixture.jurisdiction, limit);
      const responseTimeMs = Date.now() - startTime;

      const metrics = calculateAllMetrics(response.results, fixture.relevantIds, this.kValues);

      analytics.logQuery({
        query: fixture.query,
        numResults: response.results.length,
        jurisdiction: fixture.jurisdiction,
        responseTimeMs,
        metrics,
        mode: response.mode,
      });

      results.push({
        fixture,
        retrievedIds: response.results.map(result => result.id),
        mode: response.mode,
        degraded: response.degraded,
        metrics,
        responseTimeMs,
      });
    }

    const summary = summarize(results, analytics);

    log.info({
      totalQueries: summary.totalQueries,
      mrr: summary.meanMetrics.mrr,
      degradedRate: summary.degradedRate,
      emptyRate: summary.emptyRate,
    }, 'Evaluation complete');

    return { results, summary };
  }
}

function summarize(results: FixtureResult[], analytics: QueryAnalytics): EvaluationSummary {
  if (results.length === 0) {
    return { totalQueries: 0, meanMetrics: {}, degradedRate: 0, emptyRate: 0, analytics: null };
  }

  const totals: Record<string, { sum: number; count: number }> = {};
  for (const result of results) {
    for (const [name, value] of Object.entries(result.metrics)) {
      const total = totals[name] ?? { sum: 0, count: 0 };
      total.sum += value;
      total.count++;
      totals[name] = total;
    }
  }

  const meanMetrics: MetricsReport = {};
  for (const [name, total] of Object.entries(totals)) {
    meanMetrics[name] = total.sum / total.count;
  }

  return {
    totalQueries: results.length,
    meanMetrics,
    degradedRate: results.filter(result => result.degraded).length / results.length,
    emptyRate: results.filter(result => result.retrievedIds.length === 0).length / results.length,
    analytics: analytics.getSummaryStatistics(),
  };
}
