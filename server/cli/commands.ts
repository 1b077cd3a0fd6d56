import { writeReport } from '../../simulation/engine/ReportWriter.js';
import type { SimulationSession } from '../services/simulationSession.js';
import { isLatency } from '../types.js';

export interface CommandResult {
  lines: string[];
  exit?: boolean;
}

export const HELP_LINES = [
  'Available commands:',
  '  status                        Show every node, its state and its links',
  '  path <from> <to>              Show the fastest path between two nodes',
  '  route <from> <to> <payload>   Send a message along the fastest path',
  '  offline <name>                Take a node offline',
  '  online <name>                 Bring a node back online',
  '  latency <from> <to> <ms>      Change the latency of an existing link',
  '  report [file]                 Write the routing report as CSV',
  '  help                          Show this list',
  '  exit                          Leave the console',
];

function usage(text: string): CommandResult {
  return { lines: [`Usage: ${text}`] };
}

function notFound(name: string): CommandResult {
  return { lines: [`Error: Node '${name}' not found.`] };
}

function formatRoute(names: string[], latencyMs: number): string {
  return `${names.join(' -> ')} (Total Latency: ${latencyMs}ms)`;
}

function status(session: SimulationSession): CommandResult {
  const lines: string[] = [];
  for (const node of session.getStatus()) {
    lines.push(`${node.name} (${node.id}) - ${node.active ? 'ONLINE' : 'OFFLINE'}`);
    const neighbors = node.neighbors.map((n) => `${n.name} (${n.latencyMs}ms)`);
    lines.push(`  Neighbors: ${neighbors.length > 0 ? neighbors.join(', ') : 'None'}`);
  }
  return { lines: lines.length > 0 ? lines : ['Network has no nodes.'] };
}

function path(session: SimulationSession, args: string[]): CommandResult {
  const [from, to] = args;
  if (!from || !to || args.length !== 2) return usage('path <from> <to>');
  for (const name of [from, to]) {
    if (!session.network.findNodeByName(name)) return notFound(name);
  }

  const result = session.network.findPath(from, to);
  if (!result.found) return { lines: [`No path found between ${from} and ${to}.`] };
  return {
    lines: [`Fastest Path: ${formatRoute(result.path.map((node) => node.name), result.latencyMs)}`],
  };
}

function route(session: SimulationSession, args: string[]): CommandResult {
  const [from, to, ...rest] = args;
  if (!from || !to || rest.length === 0) return usage('route <from> <to> <payload>');

  const outcome = session.network.sendMessage(from, to, rest.join(' '));
  if (!outcome.ok) return notFound(outcome.name);
  if (!outcome.delivered || !outcome.route.found) {
    return { lines: [`Message from ${from} to ${to} could not be delivered.`] };
  }
  return {
    lines: [`Message delivered: ${formatRoute(outcome.route.path.map((node) => node.name), outcome.route.latencyMs)}`],
  };
}

function setActive(session: SimulationSession, args: string[], active: boolean): CommandResult {
  const [name] = args;
  if (!name || args.length !== 1) return usage(`${active ? 'online' : 'offline'} <name>`);

  const outcome = session.network.setActive(name, active);
  if (!outcome.ok) return notFound(name);
  return { lines: [`Node ${name} is now ${active ? 'ONLINE' : 'OFFLINE'}.`] };
}

function latency(session: SimulationSession, args: string[]): CommandResult {
  const [from, to, raw] = args;
  if (!from || !to || !raw || args.length !== 3) return usage('latency <from> <to> <ms>');
  const latencyMs = Number(raw);
  if (!/^\d+$/.test(raw) || !isLatency(latencyMs)) {
    return { lines: ['Error: Latency must be a non-negative integer.'] };
  }

  const outcome = session.network.setLinkLatency(from, to, latencyMs);
  if (!outcome.ok) {
    if (outcome.reason === 'no_link') return { lines: [`Error: No direct link between ${from} and ${to}.`] };
    const missing = session.network.findNodeByName(from) ? to : from;
    return notFound(missing);
  }
  return { lines: [`Latency between ${from} and ${to} set to ${latencyMs}ms.`] };
}

async function report(session: SimulationSession, args: string[], defaultPath: string): Promise<CommandResult> {
  const target = args[0] ?? defaultPath;
  const written = await writeReport(session.events.getRecords(), target);
  if (!written) return { lines: ['No events to report.'] };
  return { lines: [`Report written to ${target} (${session.events.size} records).`] };
}

/**
 * Runs one console line against the session and returns what to print. Domain failures
 * come back as output lines; only I/O errors from `report` reject.
 */
export async function executeCommand(
  line: string,
  session: SimulationSession,
  options: { reportPath: string },
): Promise<CommandResult> {
  const [command, ...args] = line.trim().split(/\s+/).filter((part) => part.length > 0);
  if (!command) return { lines: [] };

  switch (command.toLowerCase()) {
    case 'status':
      return status(session);
    case 'path':
      return path(session, args);
    case 'route':
      return route(session, args);
    case 'offline':
      return setActive(session, args, false);
    case 'online':
      return setActive(session, args, true);
    case 'latency':
      return latency(session, args);
    case 'report':
      return report(session, args, options.reportPath);
    case 'help':
      return { lines: HELP_LINES };
    case 'exit':
    case 'quit':
      return { lines: [], exit: true };
    default:
      return { lines: [`Unknown command: ${command}. Type 'help' for a list of commands.`] };
  }
}
