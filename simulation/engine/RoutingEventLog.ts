import type { RoutingRecord } from '../types/network.js';

export interface RoutingEventSink {
  record(entry: RoutingRecord): void;
}

export class NoopEventSink implements RoutingEventSink {
  record(_entry: RoutingRecord): void {}
}

// In-memory log of routing attempts, read back by the report writer and metrics.
export class RoutingEventLog implements RoutingEventSink {
  private records: RoutingRecord[] = [];

  get size(): number {
    return this.records.length;
  }

  record(entry: RoutingRecord): void {
    this.records.push(entry);
  }

  getRecords(): readonly RoutingRecord[] {
    return this.records;
  }

  clear(): void {
    this.records = [];
  }
}
