import { NetworkNode } from '../nodes/NetworkNode.js';
import type {
  BuildIssue,
  NetworkConfig,
  TopologyLink,
  TopologySnapshot,
} from '../types/network.js';
import { MessageRouter, type RouteOutcome } from './MessageRouter.js';
import { findShortestPath, noPath, type PathResult } from './PathFinder.js';
import { NoopEventSink, type RoutingEventSink } from './RoutingEventLog.js';

export type LinkUpdateOutcome =
  | { ok: true }
  | { ok: false; reason: 'unknown_node' | 'no_link' };

export type ActivationOutcome =
  | { ok: true; node: NetworkNode }
  | { ok: false; reason: 'unknown_node' };

export type NamedRouteOutcome =
  | Extract<RouteOutcome, { ok: true }>
  | { ok: false; reason: 'unknown_node'; name: string };

export interface NetworkOptions {
  sink?: RoutingEventSink;
  clock?: () => Date;
}

// Owns every node of the simulation. Nodes reference each other by id and are resolved here.
// Node names are unique within a network: addNode and build both refuse a second node with
// a name that is already taken.
export class Network {
  private readonly nodesById = new Map<string, NetworkNode>();

  private readonly nodesByName = new Map<string, NetworkNode>();

  private sink: RoutingEventSink;

  private readonly router: MessageRouter;

  constructor(options: NetworkOptions = {}) {
    this.sink = options.sink ?? new NoopEventSink();
    this.router = new MessageRouter(this.nodesById, () => this.sink, options.clock);
  }

  static fromConfig(config: NetworkConfig, options: NetworkOptions = {}): { network: Network; issues: BuildIssue[] } {
    const network = new Network(options);
    const issues = network.build(config);
    return { network, issues };
  }

  get size(): number {
    return this.nodesById.size;
  }

  attachSink(sink: RoutingEventSink): void {
    this.sink = sink;
  }

  addNode(node: NetworkNode): boolean {
    if (this.nodesById.has(node.id) || this.nodesByName.has(node.name)) {
      return false;
    }
    this.nodesById.set(node.id, node);
    this.nodesByName.set(node.name, node);
    return true;
  }

  getNode(nodeId: string): NetworkNode | undefined {
    return this.nodesById.get(nodeId);
  }

  findNodeByName(name: string): NetworkNode | undefined {
    return this.nodesByName.get(name);
  }

  nodes(): NetworkNode[] {
    return [...this.nodesById.values()];
  }

  /**
   * Two passes: every distinct node name first, then the links between them. A link whose
   * endpoint cannot be resolved is skipped and reported; the rest of the config still loads.
   */
  build(config: NetworkConfig): BuildIssue[] {
    const issues: BuildIssue[] = [];

    for (const nodeConfig of config.nodes) {
      if (this.nodesByName.has(nodeConfig.name)) {
        issues.push({
          reason: 'duplicate_node',
          nodeName: nodeConfig.name,
          message: `Duplicate node name '${nodeConfig.name}' ignored`,
        });
        continue;
      }
      this.addNode(new NetworkNode(nodeConfig.name));
    }

    for (const link of config.links) {
      const [fromName, toName, latencyMs] = link;
      const missing = [fromName, toName].filter((name) => !this.nodesByName.has(name));
      const from = this.nodesByName.get(fromName);
      const to = this.nodesByName.get(toName);
      if (!from || !to) {
        issues.push({
          reason: 'unknown_node',
          link,
          message: `Link ${fromName} <-> ${toName} skipped: unknown node ${missing.map((name) => `'${name}'`).join(', ')}`,
        });
        continue;
      }
      from.connect(to, latencyMs);
    }

    return issues;
  }

  setActive(name: string, active: boolean): ActivationOutcome {
    const node = this.nodesByName.get(name);
    if (!node) {
      return { ok: false, reason: 'unknown_node' };
    }
    if (active) {
      node.activate();
    } else {
      node.deactivate();
    }
    return { ok: true, node };
  }

  setLinkLatency(fromName: string, toName: string, latencyMs: number): LinkUpdateOutcome {
    const from = this.nodesByName.get(fromName);
    const to = this.nodesByName.get(toName);
    if (!from || !to) {
      return { ok: false, reason: 'unknown_node' };
    }
    if (!from.setLatency(to, latencyMs)) {
      return { ok: false, reason: 'no_link' };
    }
    return { ok: true };
  }

  findPath(fromName: string, toName: string): PathResult {
    const from = this.nodesByName.get(fromName);
    const to = this.nodesByName.get(toName);
    if (!from || !to) {
      return noPath();
    }
    return this.findPathById(from.id, to.id);
  }

  findPathById(sourceId: string, destinationId: string): PathResult {
    return findShortestPath(this.nodesById, sourceId, destinationId);
  }

  routeMessage(sourceId: string, destinationId: string, payload: string): boolean {
    const outcome = this.router.route(sourceId, destinationId, payload);
    return outcome.ok && outcome.delivered;
  }

  sendMessage(fromName: string, toName: string, payload: string): NamedRouteOutcome {
    const from = this.nodesByName.get(fromName);
    if (!from) {
      return { ok: false, reason: 'unknown_node', name: fromName };
    }
    const to = this.nodesByName.get(toName);
    if (!to) {
      return { ok: false, reason: 'unknown_node', name: toName };
    }
    const outcome = this.router.route(from.id, to.id, payload);
    return outcome.ok ? outcome : { ok: false, reason: outcome.reason, name: toName };
  }

  getTopology(): TopologySnapshot {
    const links: TopologyLink[] = [];
    const seen = new Set<string>();
    for (const node of this.nodesById.values()) {
      seen.add(node.id);
      for (const [neighborId, latencyMs] of node.links()) {
        if (seen.has(neighborId)) {
          continue;
        }
        links.push({ sourceId: node.id, targetId: neighborId, latencyMs });
      }
    }

    return {
      nodes: this.nodes().map((node) => ({ id: node.id, name: node.name, active: node.isActive })),
      links,
    };
  }
}
