import type { NetworkNode } from '../nodes/NetworkNode.js';
import type { Message, RoutingRecord } from '../types/network.js';
import { createMessage } from './messages.js';
import { findShortestPath, type PathResult } from './PathFinder.js';
import type { RoutingEventSink } from './RoutingEventLog.js';

export type RouteOutcome =
  | { ok: false; reason: 'unknown_node' }
  | { ok: true; delivered: boolean; message: Message; route: PathResult };

// Stateless route/deliver protocol: every call computes a fresh path against the live
// topology and reports exactly one record, unless an endpoint id is unknown.
export class MessageRouter {
  constructor(
    private readonly nodes: ReadonlyMap<string, NetworkNode>,
    private readonly getSink: () => RoutingEventSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  route(sourceId: string, destinationId: string, payload: string): RouteOutcome {
    const source = this.nodes.get(sourceId);
    const destination = this.nodes.get(destinationId);
    if (!source || !destination) {
      return { ok: false, reason: 'unknown_node' };
    }

    const message = createMessage(source.id, destination.id, payload);
    const route = findShortestPath(this.nodes, source.id, destination.id);

    if (!route.found) {
      this.report(message, source, destination, route, false);
      return { ok: true, delivered: false, message, route };
    }

    const lastHop = route.path[route.path.length - 1];
    const delivered = lastHop ? lastHop.accept(message) : false;
    this.report(message, source, destination, route, delivered);
    return { ok: true, delivered, message, route };
  }

  private report(
    message: Message,
    source: NetworkNode,
    destination: NetworkNode,
    route: PathResult,
    delivered: boolean,
  ): void {
    const entry: RoutingRecord = {
      timestamp: this.clock().toISOString(),
      messageId: message.id,
      sourceName: source.name,
      destinationName: destination.name,
      payload: message.payload,
      status: delivered ? 'SUCCESS' : 'FAILED',
      path: route.found ? route.path.map((node) => node.name) : null,
      totalLatencyMs: delivered ? route.latencyMs : null,
    };
    this.getSink().record(entry);
  }
}
