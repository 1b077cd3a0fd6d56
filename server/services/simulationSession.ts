import { Network } from '../../simulation/engine/Network.js';
import { RoutingEventLog } from '../../simulation/engine/RoutingEventLog.js';
import { summarizeRouting } from '../../simulation/engine/RoutingMetrics.js';
import type { BuildIssue, NetworkConfig, RoutingSummary } from '../types.js';

export interface NeighborStatus {
  name: string;
  latencyMs: number;
}

export interface NodeStatus {
  id: string;
  name: string;
  active: boolean;
  neighbors: NeighborStatus[];
}

// One live network plus the routing log its attempts are written to.
// Shared by the HTTP routes and the console; every call runs to completion synchronously.
export class SimulationSession {
  readonly network: Network;

  readonly events: RoutingEventLog;

  readonly buildIssues: readonly BuildIssue[];

  constructor(network: Network, events: RoutingEventLog, buildIssues: readonly BuildIssue[] = []) {
    this.network = network;
    this.events = events;
    this.buildIssues = buildIssues;
    this.network.attachSink(events);
  }

  static fromConfig(config: NetworkConfig, clock?: () => Date): SimulationSession {
    const events = new RoutingEventLog();
    const { network, issues } = Network.fromConfig(config, { sink: events, clock });
    return new SimulationSession(network, events, issues);
  }

  getStatus(): NodeStatus[] {
    return this.network.nodes().map((node) => ({
      id: node.id,
      name: node.name,
      active: node.isActive,
      neighbors: [...node.links()].flatMap(([neighborId, latencyMs]) => {
        const neighbor = this.network.getNode(neighborId);
        return neighbor ? [{ name: neighbor.name, latencyMs }] : [];
      }),
    }));
  }

  getSummary(): RoutingSummary {
    return summarizeRouting(this.events.getRecords());
  }
}
