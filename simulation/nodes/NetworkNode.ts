import type { Message } from '../types/network.js';
import { generateId } from '../utils/id.js';

function assertLatency(latencyMs: number): void {
  if (!Number.isFinite(latencyMs) || latencyMs < 0) {
    throw new RangeError(`Link latency must be a non-negative number, got ${latencyMs}`);
  }
}

// A vertex in the simulated network.
// Neighbours are referenced by id only; the owning Network resolves ids back to nodes.
// Every link lives in both endpoints' adjacency maps and is only ever changed through
// connect/setLatency, which write both directions together.
export class NetworkNode {
  readonly id: string;

  readonly name: string;

  private active = true;

  private readonly adjacency = new Map<string, number>();

  constructor(name: string, id: string = generateId()) {
    this.id = id;
    this.name = name;
  }

  get isActive(): boolean {
    return this.active;
  }

  activate(): void {
    this.active = true;
  }

  deactivate(): void {
    this.active = false;
  }

  /**
   * Links this node and `other` in both directions. An existing link is left as it is:
   * the first latency wins and the call returns false.
   */
  connect(other: NetworkNode, latencyMs: number): boolean {
    assertLatency(latencyMs);
    if (other.id === this.id || this.adjacency.has(other.id)) {
      return false;
    }
    this.adjacency.set(other.id, latencyMs);
    other.adjacency.set(this.id, latencyMs);
    return true;
  }

  setLatency(other: NetworkNode, latencyMs: number): boolean {
    assertLatency(latencyMs);
    if (!this.adjacency.has(other.id) || !other.adjacency.has(this.id)) {
      return false;
    }
    this.adjacency.set(other.id, latencyMs);
    other.adjacency.set(this.id, latencyMs);
    return true;
  }

  isConnectedTo(other: NetworkNode): boolean {
    return this.adjacency.has(other.id);
  }

  latencyTo(other: NetworkNode): number | undefined {
    return this.adjacency.get(other.id);
  }

  neighborIds(): string[] {
    return [...this.adjacency.keys()];
  }

  links(): ReadonlyMap<string, number> {
    return this.adjacency;
  }

  // Terminal check once the router has carried the message to the last hop.
  accept(message: Message): boolean {
    return message.destinationId === this.id;
  }
}
