import type {
  BuildIssue,
  LinkTuple,
  NetworkConfig,
  NodeConfig,
  RoutingRecord,
  RoutingSummary,
  TopologySnapshot,
} from '../simulation/types/network.js';

export type { BuildIssue, LinkTuple, NetworkConfig, NodeConfig, RoutingRecord, RoutingSummary, TopologySnapshot };

export interface SendMessagePayload {
  from: string;
  to: string;
  payload: string;
}

export interface LinkLatencyPayload {
  from: string;
  to: string;
  latencyMs: number;
}

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export type ConfigValidation = { ok: true; config: NetworkConfig } | { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function isLatency(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function validateLink(value: unknown, path: string, errors: string[]): value is LinkTuple {
  if (!Array.isArray(value)) {
    errors.push(`${path} must be an array of [from, to, latencyMs]`);
    return false;
  }
  if (value.length !== 3) {
    errors.push(`${path} must have exactly 3 items, got ${value.length}`);
    return false;
  }
  const [from, to, latencyMs] = value;
  let valid = true;
  if (typeof from !== 'string') {
    errors.push(`${path}[0] must be a string`);
    valid = false;
  }
  if (typeof to !== 'string') {
    errors.push(`${path}[1] must be a string`);
    valid = false;
  }
  if (!isLatency(latencyMs)) {
    errors.push(`${path}[2] must be a non-negative integer`);
    valid = false;
  }
  return valid;
}

export function validateNetworkConfig(value: unknown): ConfigValidation {
  if (!isRecord(value)) return { ok: false, errors: ['config must be an object with nodes and links'] };

  const errors: string[] = [];
  const nodes: NodeConfig[] = [];
  const links: LinkTuple[] = [];

  if (!Array.isArray(value.nodes)) {
    errors.push('nodes is required and must be an array');
  } else {
    value.nodes.forEach((node: unknown, index) => {
      if (!isRecord(node) || typeof node.name !== 'string') {
        errors.push(`nodes[${index}].name must be a string`);
        return;
      }
      nodes.push({ name: node.name });
    });
  }

  if (!Array.isArray(value.links)) {
    errors.push('links is required and must be an array');
  } else {
    value.links.forEach((link: unknown, index) => {
      if (validateLink(link, `links[${index}]`, errors)) {
        links.push([link[0], link[1], link[2]]);
      }
    });
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, config: { nodes, links } };
}

export function isSendMessagePayload(value: unknown): value is SendMessagePayload {
  if (!isRecord(value)) return false;
  return typeof value.from === 'string' && typeof value.to === 'string' && typeof value.payload === 'string';
}

export function isLinkLatencyPayload(value: unknown): value is LinkLatencyPayload {
  if (!isRecord(value)) return false;
  return typeof value.from === 'string' && typeof value.to === 'string' && typeof value.latencyMs === 'number';
}
