import type { RoutingSummary } from '../types.js';
import type { NodeStatus } from './simulationSession.js';

function esc(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function line(name: string, labels: Record<string, string>, value: number): string {
  const entries = Object.entries(labels);
  const labelText = entries.map(([k, v]) => `${k}="${esc(v)}"`).join(',');
  const rendered = Number.isFinite(value) ? value : 0;
  return entries.length === 0 ? `${name} ${rendered}` : `${name}{${labelText}} ${rendered}`;
}

function metricMeta(name: string, type: 'gauge' | 'counter', help: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

export function toPrometheusText(summary: RoutingSummary, nodes: readonly NodeStatus[]): string {
  const out: string[] = [];

  out.push(...metricMeta('netsim_node_up', 'gauge', 'Node availability, 1 when online and 0 when offline.'));
  for (const node of nodes) {
    out.push(line('netsim_node_up', { node_id: node.id, node_name: node.name }, node.active ? 1 : 0));
  }

  out.push(...metricMeta('netsim_node_links', 'gauge', 'Number of direct links per node.'));
  for (const node of nodes) {
    out.push(line('netsim_node_links', { node_id: node.id, node_name: node.name }, node.neighbors.length));
  }

  out.push(...metricMeta('netsim_routing_attempts_total', 'counter', 'Routing attempts by outcome.'));
  out.push(line('netsim_routing_attempts_total', { status: 'success' }, summary.delivered));
  out.push(line('netsim_routing_attempts_total', { status: 'failed' }, summary.failed));

  out.push(...metricMeta('netsim_routing_success_ratio', 'gauge', 'Delivered attempts over all attempts.'));
  out.push(line('netsim_routing_success_ratio', {}, summary.successRate));

  out.push(...metricMeta('netsim_route_latency_avg_ms', 'gauge', 'Average total latency of delivered messages.'));
  out.push(line('netsim_route_latency_avg_ms', {}, summary.avgLatencyMs));

  out.push(...metricMeta('netsim_route_latency_p95_ms', 'gauge', 'p95 total latency of delivered messages.'));
  out.push(line('netsim_route_latency_p95_ms', {}, summary.p95LatencyMs));

  out.push(...metricMeta('netsim_busiest_node_info', 'gauge', 'Node that appears on the most delivered paths.'));
  out.push(
    line('netsim_busiest_node_info', { node_name: summary.busiestNode ?? 'none' }, summary.busiestNode ? 1 : 0),
  );

  return `${out.join('\n')}\n`;
}
