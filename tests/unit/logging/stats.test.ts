import { describe, it, expect } from 'vitest';
import { computeStats, formatStatsTable } from '../../../src/logging/stats.js';
import type { DecisionLogEntry } from '../../../src/logging/types.js';

function makeEntry(overrides: Partial<DecisionLogEntry> = {}): DecisionLogEntry {
  return {
    requestId: 'test-id',
    timestamp: '2026-02-08T12:00:00.000Z',
    inputHash: 'abc123',
    classification: 'shell',
    confidence: 0.9,
    method: 'heuristic',
    latencyMs: 2,
    ...overrides,
  };
}

describe('computeStats', () => {
  it('returns zeros for empty entries', () => {
    const stats = computeStats([]);
    expect(stats.totalRequests).toBe(0);
    expect(stats.avgConfidence).toBe(0);
    expect(stats.fallbackPercent).toBe(0);
    expect(stats.classificationDistribution).toEqual({ shell: 0, prompt: 0 });
  });

  it('counts classifications and methods', () => {
    const stats = computeStats([
      makeEntry({ classification: 'shell', method: 'model' }),
      makeEntry({ classification: 'prompt', method: 'fallback' }),
      makeEntry({ classification: 'prompt', method: 'error' }),
      makeEntry({ classification: 'shell', method: 'empty' }),
    ]);
    expect(stats.totalRequests).toBe(4);
    expect(stats.classificationDistribution).toEqual({ shell: 2, prompt: 2 });
    expect(stats.methodDistribution).toEqual({ empty: 1, heuristic: 0, model: 1, fallback: 1, error: 1 });
  });

  it('computes the fallback share of model-path calls', () => {
    const stats = computeStats([
      makeEntry({ method: 'model' }),
      makeEntry({ method: 'model' }),
      makeEntry({ method: 'model' }),
      makeEntry({ method: 'fallback' }),
      makeEntry({ method: 'heuristic' }),
    ]);
    expect(stats.fallbackPercent).toBe(25);
  });

  it('averages confidence and latency', () => {
    const stats = computeStats([
      makeEntry({ confidence: 0.9, latencyMs: 10 }),
      makeEntry({ confidence: 0.6, latencyMs: 21 }),
    ]);
    expect(stats.avgConfidence).toBeCloseTo(0.75, 10);
    expect(stats.avgLatencyMs).toBe(16);
  });

  it('reports the period covered', () => {
    const stats = computeStats([
      makeEntry({ timestamp: '2026-02-10T00:00:00.000Z' }),
      makeEntry({ timestamp: '2026-02-01T00:00:00.000Z' }),
    ]);
    expect(stats.periodStart).toBe('2026-02-01T00:00:00.000Z');
    expect(stats.periodEnd).toBe('2026-02-10T00:00:00.000Z');
  });
});

describe('formatStatsTable', () => {
  it('renders totals and distributions', () => {
    const table = formatStatsTable(computeStats([
      makeEntry({ classification: 'shell', method: 'heuristic' }),
      makeEntry({ classification: 'prompt', method: 'heuristic', confidence: 0.6 }),
    ]));
    const lines = table.split('\n');
    expect(lines).toContain('Total requests:       2');
    expect(lines).toContain('Avg confidence:       0.750');
    expect(lines).toContain('  shell             1 (50.0%)');
    expect(lines).toContain('  heuristic         2 (100.0%)');
    expect(lines).toContain('Period:               2026-02-08 to 2026-02-08');
  });
});
