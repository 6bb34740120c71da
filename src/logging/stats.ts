import type { DecisionLogEntry, AggregateStats } from './types.js';
import type { ClassificationMethod, InputKind } from '../classifier/types.js';

function emptyMethodDistribution(): Record<ClassificationMethod, number> {
  return { empty: 0, heuristic: 0, model: 0, fallback: 0, error: 0 };
}

export function computeStats(entries: DecisionLogEntry[]): AggregateStats {
  if (entries.length === 0) {
    const now = new Date().toISOString();
    return {
      totalRequests: 0,
      classificationDistribution: { shell: 0, prompt: 0 },
      methodDistribution: emptyMethodDistribution(),
      fallbackPercent: 0,
      avgConfidence: 0,
      avgLatencyMs: 0,
      periodStart: now,
      periodEnd: now,
    };
  }

  const classDist: Record<InputKind, number> = { shell: 0, prompt: 0 };
  const methodDist = emptyMethodDistribution();
  let totalConfidence = 0;
  let totalLatencyMs = 0;

  for (const entry of entries) {
    classDist[entry.classification]++;
    methodDist[entry.method]++;
    totalConfidence += entry.confidence;
    totalLatencyMs += entry.latencyMs;
  }

  const modelAttempts = methodDist.model + methodDist.fallback;
  const fallbackPercent = modelAttempts > 0
    ? (methodDist.fallback / modelAttempts) * 100
    : 0;

  const timestamps = entries.map(e => e.timestamp).sort();

  return {
    totalRequests: entries.length,
    classificationDistribution: classDist,
    methodDistribution: methodDist,
    fallbackPercent,
    avgConfidence: totalConfidence / entries.length,
    avgLatencyMs: Math.round(totalLatencyMs / entries.length),
    periodStart: timestamps[0] ?? '',
    periodEnd: timestamps[timestamps.length - 1] ?? '',
  };
}

export function formatStatsTable(stats: AggregateStats): string {
  const lines: string[] = [];
  const pct = (count: number): string =>
    stats.totalRequests > 0 ? ((count / stats.totalRequests) * 100).toFixed(1) : '0.0';

  lines.push('');
  lines.push('=== shellsense - Classification Stats ===');
  lines.push('');
  lines.push(`Total requests:       ${stats.totalRequests.toLocaleString('en-US')}`);
  lines.push(`Avg confidence:       ${stats.avgConfidence.toFixed(3)}`);
  lines.push(`Model fallbacks:      ${stats.fallbackPercent.toFixed(1)}%`);
  lines.push('');
  lines.push('Classification Distribution:');
  for (const [kind, count] of Object.entries(stats.classificationDistribution)) {
    lines.push(`  ${kind.padEnd(12)} ${String(count).padStart(6)} (${pct(count)}%)`);
  }

  lines.push('');
  lines.push('Method Distribution:');
  for (const [method, count] of Object.entries(stats.methodDistribution)) {
    lines.push(`  ${method.padEnd(12)} ${String(count).padStart(6)} (${pct(count)}%)`);
  }

  lines.push('');
  lines.push(`Avg latency:          ${stats.avgLatencyMs.toLocaleString('en-US')}ms`);
  lines.push(`Period:               ${stats.periodStart.slice(0, 10)} to ${stats.periodEnd.slice(0, 10)}`);
  lines.push('');

  return lines.join('\n');
}
