import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SimulationSession } from '../services/simulationSession.js';
import { startServer, type TestServer } from '../testing/startServer.js';

function createSession(): SimulationSession {
  return SimulationSession.fromConfig({
    nodes: [{ name: 'A' }, { name: 'B' }, { name: 'C' }, { name: 'D' }],
    links: [
      ['A', 'B', 10],
      ['B', 'C', 10],
      ['A', 'C', 50],
    ],
  });
}

describe('network routes', () => {
  let session: SimulationSession;
  let server: TestServer;

  async function send(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${server.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    session = createSession();
    server = await startServer(session);
  });

  afterEach(async () => {
    await server.close();
    vi.restoreAllMocks();
  });

  describe('GET /network/path', () => {
    it('returns the fastest path', async () => {
      expect(await send('GET', '/network/path?from=A&to=C')).toEqual({
        status: 200,
        body: { found: true, path: ['A', 'B', 'C'], latencyMs: 20 },
      });
    });

    it('reports an unreachable node as not found', async () => {
      expect(await send('GET', '/network/path?from=A&to=D')).toEqual({
        status: 200,
        body: { found: false, path: [], latencyMs: null },
      });
    });

    it('answers 404 for an unknown node', async () => {
      expect(await send('GET', '/network/path?from=A&to=Ghost')).toEqual({
        status: 404,
        body: { error: "Node 'Ghost' not found" },
      });
    });

    it('answers 400 for a missing query parameter', async () => {
      expect(await send('GET', '/network/path?from=A')).toEqual({
        status: 400,
        body: { error: 'Expected query parameter: to' },
      });
    });
  });

  describe('POST /network/messages', () => {
    it('delivers a message and records the attempt', async () => {
      const res = await send('POST', '/network/messages', { from: 'A', to: 'C', payload: 'ping' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ delivered: true, found: true, path: ['A', 'B', 'C'], latencyMs: 20 });
      expect(session.events.getRecords()).toHaveLength(1);
      expect(session.events.getRecords()[0]?.payload).toBe('ping');
    });

    it('records a failed delivery', async () => {
      const res = await send('POST', '/network/messages', { from: 'A', to: 'D', payload: 'ping' });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ delivered: false, found: false, path: [], latencyMs: null });
      expect(session.events.getRecords()[0]?.status).toBe('FAILED');
    });

    it('answers 404 for an unknown node without recording', async () => {
      expect(await send('POST', '/network/messages', { from: 'A', to: 'Ghost', payload: 'ping' })).toEqual({
        status: 404,
        body: { error: "Node 'Ghost' not found" },
      });
      expect(session.events.size).toBe(0);
    });

    it('answers 400 for an incomplete body', async () => {
      expect(await send('POST', '/network/messages', { from: 'A' })).toEqual({
        status: 400,
        body: { error: 'Expected { from, to, payload }' },
      });
    });

    it('answers 400 for malformed JSON', async () => {
      const res = await fetch(`${server.baseUrl}/network/messages`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"from": "A",',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: expect.any(String) });
    });
  });

  describe('PUT /network/nodes/:name/active', () => {
    it('takes a node offline and reroutes around it', async () => {
      const id = session.network.findNodeByName('B')?.id;
      expect(await send('PUT', '/network/nodes/B/active', { active: false })).toEqual({
        status: 200,
        body: { id, name: 'B', active: false },
      });
      expect(await send('GET', '/network/path?from=A&to=C')).toEqual({
        status: 200,
        body: { found: true, path: ['A', 'C'], latencyMs: 50 },
      });
    });

    it('answers 404 for an unknown node', async () => {
      expect(await send('PUT', '/network/nodes/Ghost/active', { active: true })).toEqual({
        status: 404,
        body: { error: "Node 'Ghost' not found" },
      });
    });

    it('answers 400 without a boolean flag', async () => {
      expect(await send('PUT', '/network/nodes/B/active', { active: 'no' })).toEqual({
        status: 400,
        body: { error: 'Expected { active: boolean }' },
      });
    });
  });

  describe('PUT /network/links', () => {
    it('changes the latency of a direct link', async () => {
      expect(await send('PUT', '/network/links', { from: 'C', to: 'A', latencyMs: 5 })).toEqual({
        status: 200,
        body: { from: 'C', to: 'A', latencyMs: 5 },
      });
      expect((await send('GET', '/network/path?from=A&to=C')).body).toEqual({
        found: true,
        path: ['A', 'C'],
        latencyMs: 5,
      });
    });

    it('answers 409 when the nodes share no direct link', async () => {
      expect(await send('PUT', '/network/links', { from: 'A', to: 'D', latencyMs: 5 })).toEqual({
        status: 409,
        body: { error: 'No direct link between A and D' },
      });
    });

    it('answers 404 for an unknown node', async () => {
      expect(await send('PUT', '/network/links', { from: 'A', to: 'Ghost', latencyMs: 5 })).toEqual({
        status: 404,
        body: { error: 'Unknown node in link A <-> Ghost' },
      });
    });

    it('answers 400 for a latency that is negative or too large', async () => {
      const expected = { status: 400, body: { error: 'latencyMs must be a non-negative integer' } };
      expect(await send('PUT', '/network/links', { from: 'A', to: 'B', latencyMs: -5 })).toEqual(expected);
      expect(await send('PUT', '/network/links', { from: 'A', to: 'B', latencyMs: 1e308 })).toEqual(expected);
      const b = session.network.findNodeByName('B');
      expect(b && session.network.findNodeByName('A')?.latencyTo(b)).toBe(10);
    });
  });

  it('answers 404 for an unknown route', async () => {
    expect(await send('GET', '/network/nowhere')).toEqual({
      status: 404,
      body: { error: 'Route not found: GET /network/nowhere' },
    });
  });
});
