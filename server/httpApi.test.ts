import { createServer, type Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createHttpHandler } from './httpApi.ts';
import { createLogger } from './logger.ts';
import { createPersistence, initDb } from './persistence.ts';

type Db = ReturnType<typeof initDb>;

describe('http api', () => {
  let db: Db;
  let server: Server;
  let baseUrl = '';
  let logLines: string[] = [];

  beforeEach(async () => {
    db = initDb(':memory:');
    logLines = [];
    const handler = createHttpHandler({
      getStatus: () => ({ tick: 7, sessions: 1 }),
      persistence: createPersistence(db),
      config: {
        boardSize: 10,
        localState: false,
        relativeActions: false,
        benchmarkMatches: 3,
        leaderboardLimit: 2,
        seed: 4
      },
      logger: createLogger('info', line => logLines.push(line))
    });
    server = createServer(handler);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
    db.close();
  });

  const post = (pathname: string, body: unknown) =>
    fetch(`${baseUrl}${pathname}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body)
    });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, tick: 7, sessions: 1 });
  });

  it('saves, ranks and prunes leaderboard entries', async () => {
    for (const [name, score] of [['a', 1], ['b', 5], ['c', 3]] as const) {
      const res = await post('/api/leaderboard', { name, ranking_data: { score, step: 40 } });
      expect(res.status).toBe(200);
    }
    const res = await fetch(`${baseUrl}/api/leaderboard`);
    expect(await res.json()).toEqual({
      ok: true,
      entries: [
        { name: 'b', ranking_data: { score: 5, step: 40 } },
        { name: 'c', ranking_data: { score: 3, step: 40 } }
      ]
    });

    const limited = await fetch(`${baseUrl}/api/leaderboard?limit=1`);
    expect(await limited.json()).toEqual({
      ok: true,
      entries: [{ name: 'b', ranking_data: { score: 5, step: 40 } }]
    });
  });

  it('rejects invalid leaderboard bodies', async () => {
    const missingName = await post('/api/leaderboard', { ranking_data: { score: 1, step: 1 } });
    expect(missingName.status).toBe(400);
    expect(await missingName.json()).toEqual({ ok: false, message: 'leaderboard name is required' });

    const notObject = await post('/api/leaderboard', '[1, 2]');
    expect(notObject.status).toBe(400);
    expect(await notObject.json()).toEqual({ ok: false, message: 'body must be a JSON object' });

    const broken = await post('/api/leaderboard', '{');
    expect(broken.status).toBe(400);
  });

  it('runs a benchmark and optionally saves it', async () => {
    const bad = await post('/api/benchmark', { agent: 'smart' });
    expect(bad.status).toBe(400);
    expect(await bad.json()).toEqual({ ok: false, message: 'agent must be "random" or "greedy"' });

    const badCount = await post('/api/benchmark', { agent: 'greedy', matches: 0 });
    expect(await badCount.json()).toEqual({ ok: false, message: 'matches must be a positive integer' });

    const res = await post('/api/benchmark', { agent: 'greedy', matches: 2, name: ' greedy-2 ', save: true });
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ ok: true, id: 1, entry: { name: 'greedy-2' } });
    expect(body).toHaveProperty('matches.length', 2);

    const board = await fetch(`${baseUrl}/api/leaderboard`);
    expect(await board.json()).toMatchObject({ entries: [{ name: 'greedy-2' }] });
  });

  it('rejects an unsaveable name before running the benchmark', async () => {
    const res = await post('/api/benchmark', { agent: 'greedy', matches: 1000, name: 'n'.repeat(25), save: true });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, message: 'leaderboard name exceeds 24 characters' });
    expect(logLines).toEqual([]);
  });

  it('uses the configured match count and skips saving by default', async () => {
    const res = await post('/api/benchmark', { agent: 'random' });
    const body: unknown = await res.json();
    expect(body).toMatchObject({ ok: true, id: null, entry: { name: 'random' } });
    expect(body).toHaveProperty('matches.length', 3);
  });

  it('answers 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);
    expect(res.status).toBe(404);
  });
});
