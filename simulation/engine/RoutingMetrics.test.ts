import { describe, expect, it } from 'vitest';
import type { RoutingRecord } from '../types/network.js';
import { summarizeRouting } from './RoutingMetrics.js';

function record(path: string[] | null, totalLatencyMs: number | null): RoutingRecord {
  return {
    timestamp: '2026-01-15T09:30:00.000Z',
    messageId: `msg-${Math.random()}`,
    sourceName: path?.[0] ?? 'A',
    destinationName: path?.[path.length - 1] ?? 'Z',
    payload: 'p',
    status: path ? 'SUCCESS' : 'FAILED',
    path,
    totalLatencyMs,
  };
}

describe('summarizeRouting', () => {
  it('returns zeros for an empty log', () => {
    expect(summarizeRouting([])).toEqual({
      totalAttempts: 0,
      delivered: 0,
      failed: 0,
      successRate: 0,
      avgLatencyMs: 0,
      p95LatencyMs: 0,
      busiestNode: null,
    });
  });

  it('aggregates delivered and failed attempts', () => {
    const summary = summarizeRouting([
      record(['A', 'B', 'C'], 20),
      record(['B', 'C'], 10),
      record(null, null),
      record(['A', 'B'], 30),
    ]);

    expect(summary).toEqual({
      totalAttempts: 4,
      delivered: 3,
      failed: 1,
      successRate: 0.75,
      avgLatencyMs: 20,
      p95LatencyMs: 30,
      busiestNode: 'B',
    });
  });
});
