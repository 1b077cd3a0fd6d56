import type { NetworkNode } from '../nodes/NetworkNode.js';
import { MinHeap } from '../utils/MinHeap.js';

export type PathResult =
  | { found: true; path: NetworkNode[]; latencyMs: number }
  | { found: false; path: []; latencyMs: number };

export function noPath(): PathResult {
  return { found: false, path: [], latencyMs: Number.POSITIVE_INFINITY };
}

/**
 * Dijkstra over the active part of the graph. Inactive nodes, the endpoints included,
 * are treated as absent for the duration of the call. Latencies are assumed non-negative,
 * so the destination's distance is final the first time it leaves the frontier.
 */
export function findShortestPath(
  nodes: ReadonlyMap<string, NetworkNode>,
  sourceId: string,
  destinationId: string,
): PathResult {
  const source = nodes.get(sourceId);
  const destination = nodes.get(destinationId);
  if (!source || !destination || !source.isActive || !destination.isActive) {
    return noPath();
  }

  const distances = new Map<string, number>();
  const previous = new Map<string, string | null>();
  for (const nodeId of nodes.keys()) {
    distances.set(nodeId, Number.POSITIVE_INFINITY);
    previous.set(nodeId, null);
  }
  distances.set(sourceId, 0);

  const frontier = new MinHeap<string>();
  frontier.push(0, sourceId);

  while (!frontier.isEmpty()) {
    const entry = frontier.pop();
    if (!entry) {
      break;
    }
    const { priority: distance, value: currentId } = entry;
    const current = nodes.get(currentId);
    if (!current || !current.isActive) {
      continue;
    }
    // stale
    if (distance > (distances.get(currentId) ?? Number.POSITIVE_INFINITY)) {
      continue;
    }
    if (currentId === destinationId) {
      break;
    }

    for (const [neighborId, latencyMs] of current.links()) {
      const neighbor = nodes.get(neighborId);
      if (!neighbor || !neighbor.isActive) {
        continue;
      }
      const candidate = distance + latencyMs;
      if (candidate < (distances.get(neighborId) ?? Number.POSITIVE_INFINITY)) {
        distances.set(neighborId, candidate);
        previous.set(neighborId, currentId);
        frontier.push(candidate, neighborId);
      }
    }
  }

  const path: NetworkNode[] = [];
  let cursor: string | null = destinationId;
  while (cursor !== null) {
    const node = nodes.get(cursor);
    if (!node) {
      return noPath();
    }
    path.unshift(node);
    cursor = previous.get(cursor) ?? null;
  }

  if (path[0]?.id !== sourceId) {
    return noPath();
  }

  return {
    found: true,
    path,
    latencyMs: distances.get(destinationId) ?? Number.POSITIVE_INFINITY,
  };
}
