import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RoutingRecord } from '../types/network.js';
import { toCsv, writeReport } from './ReportWriter.js';

const SUCCESS: RoutingRecord = {
  timestamp: '2026-01-15T09:30:00.000Z',
  messageId: 'msg-1',
  sourceName: 'NodeA',
  destinationName: 'NodeC',
  payload: 'Successful test message',
  status: 'SUCCESS',
  path: ['NodeA', 'NodeC'],
  totalLatencyMs: 50,
};

const FAILURE: RoutingRecord = {
  timestamp: '2026-01-15T09:31:00.000Z',
  messageId: 'msg-2',
  sourceName: 'NodeA',
  destinationName: 'NodeB',
  payload: 'Failed test message',
  status: 'FAILED',
  path: null,
  totalLatencyMs: null,
};

describe('toCsv', () => {
  it('writes a header and one row per record', () => {
    expect(toCsv([SUCCESS, FAILURE]).split('\r\n')).toEqual([
      'timestamp,message_id,source_node,intended_destination,payload,status,path_taken,total_latency_ms',
      '2026-01-15T09:30:00.000Z,msg-1,NodeA,NodeC,Successful test message,SUCCESS,NodeA -> NodeC,50',
      '2026-01-15T09:31:00.000Z,msg-2,NodeA,NodeB,Failed test message,FAILED,No path found,N/A',
      '',
    ]);
  });

  it('quotes cells with commas, quotes or line breaks', () => {
    const csv = toCsv([{ ...SUCCESS, payload: 'say "hi", then\nleave' }]);
    const row = csv.slice(csv.indexOf('\r\n') + 2, -2);
    expect(row).toBe(
      '2026-01-15T09:30:00.000Z,msg-1,NodeA,NodeC,"say ""hi"", then\nleave",SUCCESS,NodeA -> NodeC,50',
    );
  });
});

describe('writeReport', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'netsim-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates parent directories and writes the CSV', async () => {
    const file = join(dir, 'nested', 'report.csv');

    await expect(writeReport([SUCCESS], file)).resolves.toBe(true);
    expect(await readFile(file, 'utf8')).toBe(toCsv([SUCCESS]));
  });

  it('writes nothing when there are no records', async () => {
    const file = join(dir, 'empty.csv');

    await expect(writeReport([], file)).resolves.toBe(false);
    await expect(stat(file)).rejects.toThrow();
  });
});
