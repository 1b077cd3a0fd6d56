import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { RoutingRecord } from '../types/network.js';

export const REPORT_HEADERS = [
  'timestamp',
  'message_id',
  'source_node',
  'intended_destination',
  'payload',
  'status',
  'path_taken',
  'total_latency_ms',
] as const;

export const NO_PATH_MARKER = 'No path found';

export const NOT_APPLICABLE_MARKER = 'N/A';

function escapeCell(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function toReportRow(record: RoutingRecord): string[] {
  return [
    record.timestamp,
    record.messageId,
    record.sourceName,
    record.destinationName,
    record.payload,
    record.status,
    record.path ? record.path.join(' -> ') : NO_PATH_MARKER,
    record.totalLatencyMs === null ? NOT_APPLICABLE_MARKER : String(record.totalLatencyMs),
  ];
}

export function toCsv(records: readonly RoutingRecord[]): string {
  const rows = [[...REPORT_HEADERS], ...records.map(toReportRow)];
  return rows.map((row) => row.map(escapeCell).join(',')).join('\r\n') + '\r\n';
}

/**
 * Writes the routing log as CSV. Returns false without touching the filesystem when there
 * is nothing to report.
 */
export async function writeReport(records: readonly RoutingRecord[], filePath: string): Promise<boolean> {
  if (records.length === 0) {
    return false;
  }
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, toCsv(records), 'utf8');
  return true;
}
