import type { RoutingRecord, RoutingSummary } from '../types/network.js';

function percentile(values: number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.min(sorted.length - 1, Math.floor(p * sorted.length));
  return sorted[idx] ?? 0;
}

export function summarizeRouting(records: readonly RoutingRecord[]): RoutingSummary {
  const successes = records.filter((record) => record.status === 'SUCCESS');
  const latencies = successes
    .map((record) => record.totalLatencyMs)
    .filter((v): v is number => typeof v === 'number');

  const hopCounts = new Map<string, number>();
  for (const record of successes) {
    for (const name of record.path ?? []) {
      hopCounts.set(name, (hopCounts.get(name) ?? 0) + 1);
    }
  }

  let busiestNode: string | null = null;
  let busiestCount = 0;
  for (const [name, count] of hopCounts) {
    if (count > busiestCount) {
      busiestNode = name;
      busiestCount = count;
    }
  }

  const totalAttempts = records.length;
  return {
    totalAttempts,
    delivered: successes.length,
    failed: totalAttempts - successes.length,
    successRate: totalAttempts === 0 ? 0 : successes.length / totalAttempts,
    avgLatencyMs: latencies.length === 0 ? 0 : latencies.reduce((sum, l) => sum + l, 0) / latencies.length,
    p95LatencyMs: percentile(latencies, 0.95),
    busiestNode,
  };
}
