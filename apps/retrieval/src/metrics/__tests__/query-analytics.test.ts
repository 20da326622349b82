import { describe, it, expect, beforeEach } from 'vitest';
import { percentile, QueryAnalytics, type QueryLogEntry } from '../query-analytics.js';

function entry(overrides: Partial<QueryLogEntry> = {}): QueryLogEntry {
  return {
    query: 'security deposit',
    numResults: 5,
    jurisdiction: 'state',
    responseTimeMs: 100,
    metrics: {},
    mode: 'vector',
    ...overrides,
  };
}

describe('percentile', () => {
  it('should interpolate between the closest ranks', () => {
    const values = [40, 10, 30, 20];
    expect(percentile(values, 50)).toBeCloseTo(25, 10);
    expect(percentile(values, 95)).toBeCloseTo(38.5, 10);
    expect(percentile(values, 0)).toBe(10);
    expect(percentile(values, 100)).toBe(40);
  });

  it('should return the only value of a single sample', () => {
    expect(percentile([7], 95)).toBe(7);
  });

  it('should return 0 for no samples', () => {
    expect(percentile([], 50)).toBe(0);
  });
});

describe('QueryAnalytics', () => {
  let analytics: QueryAnalytics;

  beforeEach(() => {
    analytics = new QueryAnalytics();
  });

  it('should return null before any query is logged', () => {
    expect(analytics.getSummaryStatistics()).toBeNull();
  });

  it('should summarize response times and result counts', () => {
    analytics.logQuery(entry({ responseTimeMs: 10, numResults: 5 }));
    analytics.logQuery(entry({ responseTimeMs: 20, numResults: 3 }));
    analytics.logQuery(entry({ responseTimeMs: 30, numResults: 1 }));
    analytics.logQuery(entry({ responseTimeMs: 40, numResults: 0 }));

    expect(analytics.getSummaryStatistics()).toMatchObject({
      totalQueries: 4,
      avgResponseTimeMs: 25,
      medianResponseTimeMs: 25,
      avgResultsPerQuery: 2.25,
    });
    expect(analytics.getSummaryStatistics()?.p95ResponseTimeMs).toBeCloseTo(38.5, 10);
  });

  it('should count queries per jurisdiction, treating a missing one as all', () => {
    analytics.logQuery(entry({ jurisdiction: 'federal' }));
    analytics.logQuery(entry({ jurisdiction: 'state' }));
    analytics.logQuery(entry({ jurisdiction: 'federal' }));
    analytics.logQuery(entry({ jurisdiction: undefined }));

    expect(analytics.getSummaryStatistics()?.jurisdictionDistribution).toEqual({ federal: 2, state: 1, all: 1 });
  });

  it('should report the share of degraded searches', () => {
    analytics.logQuery(entry({ mode: 'vector' }));
    analytics.logQuery(entry({ mode: 'fallback' }));
    analytics.logQuery(entry({ mode: 'keyword' }));
    analytics.logQuery(entry({ mode: 'vector' }));

    expect(analytics.getSummaryStatistics()?.degradedRate).toBe(0.5);
  });

  it('should forget everything on clear', () => {
    analytics.logQuery(entry());
    expect(analytics.size).toBe(1);

    analytics.clear();

    expect(analytics.size).toBe(0);
    expect(analytics.getSummaryStatistics()).toBeNull();
  });
});
