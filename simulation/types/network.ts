export type LinkTuple = [fromName: string, toName: string, latencyMs: number];

export interface NodeConfig {
  name: string;
}

export interface NetworkConfig {
  nodes: NodeConfig[];
  links: LinkTuple[];
}

export interface Message {
  readonly id: string;
  readonly sourceId: string;
  readonly destinationId: string;
  readonly payload: string;
}

export type RoutingStatus = 'SUCCESS' | 'FAILED';

export interface RoutingRecord {
  timestamp: string;
  messageId: string;
  sourceName: string;
  destinationName: string;
  payload: string;
  status: RoutingStatus;
  path: string[] | null;
  totalLatencyMs: number | null;
}

export type BuildIssueReason = 'unknown_node' | 'duplicate_node';

export interface BuildIssue {
  reason: BuildIssueReason;
  message: string;
  link?: LinkTuple;
  nodeName?: string;
}

export interface TopologyNode {
  id: string;
  name: string;
  active: boolean;
}

export interface TopologyLink {
  sourceId: string;
  targetId: string;
  latencyMs: number;
}

export interface TopologySnapshot {
  nodes: TopologyNode[];
  links: TopologyLink[];
}

export interface RoutingSummary {
  totalAttempts: number;
  delivered: number;
  failed: number;
  successRate: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
  busiestNode: string | null;
}
