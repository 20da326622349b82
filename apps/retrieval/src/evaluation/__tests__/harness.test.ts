import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { RetrievalEvaluationHarness, type SearchableStore } from '../harness.js';
import { normalizeMetadata } from '../../store/metadata.js';
import type { JurisdictionFilter, QueryResult, SearchResponse } from '../../store/types.js';

function result(id: string, distance: number): QueryResult {
  return { id, text: `Opinion ${id}`, metadata: normalizeMetadata({ case_name: id }), distance };
}

/** Replays canned responses and records what the harness asked for */
class ScriptedStore implements SearchableStore {
  readonly requests: Array<{ query: string; jurisdiction?: JurisdictionFilter; limit?: number }> = [];

  constructor(private readonly responses: Record<string, SearchResponse>) {}

  async search(query: string, jurisdiction?: JurisdictionFilter, limit?: number): Promise<SearchResponse> {
    this.requests.push({ query, jurisdiction, limit });
    return this.responses[query] ?? { results: [], mode: 'vector', degraded: false };
  }
}

describe('RetrievalEvaluationHarness.loadFixtures', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retrieval-eval-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should keep valid lines and skip invalid ones', async () => {
    const file = path.join(dir, 'mixed.jsonl');
    await fs.writeFile(file, [
      JSON.stringify({ query: 'deposit deadline', relevantIds: ['state_1'], jurisdiction: 'state' }),
      'not json',
      JSON.stringify({ query: 'missing ids' }),
      JSON.stringify({ query: 'bad filter', relevantIds: [], jurisdiction: 'tribal' }),
      '',
      JSON.stringify({ query: 'overtime', relevantIds: ['state_2'], description: 'wage law' }),
    ].join('\n'));

    const fixtures = await new RetrievalEvaluationHarness(new ScriptedStore({})).loadFixtures(file);

    expect(fixtures).toEqual([
      { query: 'deposit deadline', relevantIds: ['state_1'], jurisdiction: 'state' },
      { query: 'overtime', relevantIds: ['state_2'], description: 'wage law' },
    ]);
  });

  it('should throw when the file cannot be read', async () => {
    const harness = new RetrievalEvaluationHarness(new ScriptedStore({}));

    await expect(harness.loadFixtures(path.join(dir, 'missing.jsonl'))).rejects.toThrow();
  });

  it('should load the bundled fixtures', async () => {
    const file = fileURLToPath(new URL('../../../fixtures/eval.jsonl', import.meta.url));

    const fixtures = await new RetrievalEvaluationHarness(new ScriptedStore({})).loadFixtures(file);

    expect(fixtures).toHaveLength(4);
    expect(fixtures[3].jurisdiction).toBe('all');
  });
});

describe('RetrievalEvaluationHarness.evaluate', () => {
  const store = new ScriptedStore({
    'deposit deadline': {
      results: [result('state_1', 0.1), result('state_2', 0.7)],
      mode: 'vector',
      degraded: false,
    },
    'cell phone search': {
      results: [result('fed_2', 0.3), result('fed_1', 0.4)],
      mode: 'keyword',
      degraded: true,
      error: { kind: 'rate_limited', message: 'Slow down' },
    },
  });

  it('should score each fixture and average the metrics', async () => {
    const harness = new RetrievalEvaluationHarness(store, [1, 2]);

    const report = await harness.evaluate([
      { query: 'deposit deadline', relevantIds: ['state_1'], jurisdiction: 'state' },
      { query: 'cell phone search', relevantIds: ['fed_1'] },
      { query: 'no match', relevantIds: ['fed_3'], jurisdiction: 'federal' },
    ]);

    expect(store.requests.map(request => [request.query, request.jurisdiction, request.limit])).toEqual([
      ['deposit deadline', 'state', 2],
      ['cell phone search', undefined, 2],
      ['no match', 'federal', 2],
    ]);

    expect(report.results.map(r => r.metrics.mrr)).toEqual([1, 0.5, 0]);
    expect(report.results[1]).toMatchObject({ retrievedIds: ['fed_2', 'fed_1'], mode: 'keyword', degraded: true });

    expect(report.summary.totalQueries).toBe(3);
    expect(report.summary.meanMetrics.mrr).toBeCloseTo(0.5, 12);
    expect(report.summary.meanMetrics['recall@1']).toBeCloseTo(1 / 3, 12);
    expect(report.summary.meanMetrics['recall@2']).toBeCloseTo(2 / 3, 12);
    expect(report.summary.meanMetrics.total_retrieved).toBeCloseTo(4 / 3, 12);
    expect(report.summary.degradedRate).toBeCloseTo(1 / 3, 12);
    expect(report.summary.emptyRate).toBeCloseTo(1 / 3, 12);
    expect(report.summary.analytics).toMatchObject({
      totalQueries: 3,
      jurisdictionDistribution: { state: 1, all: 1, federal: 1 },
      degradedRate: 1 / 3,
    });
  });

  it('should summarize an empty fixture list', async () => {
    const report = await new RetrievalEvaluationHarness(store).evaluate([]);

    expect(report).toEqual({
      results: [],
      summary: { totalQueries: 0, meanMetrics: {}, degradedRate: 0, emptyRate: 0, analytics: null },
    });
  });
});
