import type { IncomingMessage, ServerResponse } from 'node:http';
import { runBenchmark, toLeaderboardEntry } from '../src/benchmark.ts';
import { createBaselineBot, isBaselineBotKind } from '../src/bots/baselineBots.ts';
import { GameEngine } from '../src/engine.ts';
import { validateLeaderboardEntry } from '../src/leaderboard.ts';
import { createRng, hashSeed } from '../src/rng.ts';
import type { ServerConfig } from './config.ts';
import type { Logger } from './logger.ts';
import type { Persistence } from './persistence.ts';

const MAX_BODY_BYTES = 64 * 1024;
const MAX_BENCHMARK_MATCHES = 1000;

export interface HttpApiDeps {
  getStatus: () => { tick: number; sessions: number };
  persistence: Persistence;
  config: Pick<
    ServerConfig,
    'boardSize' | 'localState' | 'relativeActions' | 'benchmarkMatches' | 'leaderboardLimit' | 'seed'
  >;
  logger: Logger;
}

export function createHttpHandler(deps: HttpApiDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    handleRequest(req, res, deps).catch((err: unknown) => {
      deps.logger.error('http', `${req.method ?? '?'} ${req.url ?? '?'} failed: ${errorMessage(err)}`);
      if (!res.headersSent) sendJson(res, 500, { ok: false, message: 'internal error' });
    });
  };
}

function applyCors(req: IncomingMessage, res: ServerResponse): void {
  const origin = req.headers.origin;
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  } else {
    res.setHeader('Access-Control-Allow-Origin', '*');
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  deps: HttpApiDeps
): Promise<void> {
  applyCors(req, res);
  if (req.method === 'OPTIONS') {
    res.statusCode = 204;
    res.end();
    return;
  }
  const url = new URL(req.url ?? '/', 'http://localhost');
  if (req.method === 'GET' && url.pathname === '/health') {
    const status = deps.getStatus();
    sendJson(res, 200, { ok: true, tick: status.tick, sessions: status.sessions });
    return;
  }

  if (req.method === 'GET' && url.pathname === '/api/leaderboard') {
    const parsedLimit = Number(url.searchParams.get('limit') ?? Number.NaN);
    const limit = Number.isFinite(parsedLimit)
      ? Math.min(deps.config.leaderboardLimit, Math.max(1, Math.floor(parsedLimit)))
      : deps.config.leaderboardLimit;
    sendJson(res, 200, { ok: true, entries: deps.persistence.listLeaderboard(limit) });
    return;
  }

  if (req.method === 'POST' && url.pathname === '/api/leaderboard') {
    const body = await readJsonBody(req, MAX_BODY_BYTES).catch((err: unknown) => {
      sendJson(res, 400, { ok: false, message: errorMessage(err) });
      return null;
    });
    if (!body) return;
    try {
      validateLeaderboardEntry(body);
    } catch (err) {
      sendJson(res, 400, { ok: false, message: errorMessage(err) });
      return;
    }
    const id = deps.persistence.saveEntry(body, { boardSize: deps.config.boardSize });
    deps.persistence.pruneLeaderboard(deps.config.leaderboardLimit);
    deps.logger.info('http', `leaderboard entry ${id} saved for ${body.name}`);
    sendJson(res, 200, { ok: true, id });
    return;
  }

  if (req.method === 'POST' && url.pathname === '/api/benchmark') {
    const body = await readJsonBody(req, MAX_BODY_BYTES).catch((err: unknown) => {
      sendJson(res, 400, { ok: false, message: errorMessage(err) });
      return null;
    });
    if (!body) return;
    handleBenchmark(body, res, deps);
    return;
  }

  res.statusCode = 404;
  res.end('Not found');
}

function handleBenchmark(body: Record<string, unknown>, res: ServerResponse, deps: HttpApiDeps): void {
  const kind = body['agent'];
  if (!isBaselineBotKind(kind)) {
    sendJson(res, 400, { ok: false, message: 'agent must be "random" or "greedy"' });
    return;
  }
  const rawMatches = body['matches'];
  let matches = deps.config.benchmarkMatches;
  if (rawMatches !== undefined) {
    if (typeof rawMatches !== 'number' || !Number.isInteger(rawMatches) || rawMatches < 1) {
      sendJson(res, 400, { ok: false, message: 'matches must be a positive integer' });
      return;
    }
    matches = Math.min(MAX_BENCHMARK_MATCHES, rawMatches);
  }
  const rawName = body['name'];
  const name = typeof rawName === 'string' && rawName.trim() ? rawName.trim() : kind;
  const save = body['save'] === true;
  if (save) {
    try {
      validateLeaderboardEntry({ name, ranking_data: { score: 0, step: 0 } });
    } catch (err) {
      sendJson(res, 400, { ok: false, message: errorMessage(err) });
      return;
    }
  }

  const seed = deps.config.seed ?? Math.floor(Math.random() * 1e9);
  const engine = new GameEngine(
    {
      boardSize: deps.config.boardSize,
      localState: deps.config.localState,
      relativeActions: deps.config.relativeActions,
      player: 'agent'
    },
    { rng: createRng(hashSeed(seed, 0)) }
  );
  const summary = runBenchmark({ matches, engine, agent: createBaselineBot(kind, seed) });
  const entry = toLeaderboardEntry(name, summary);
  deps.logger.info(
    'http',
    `benchmark ${kind} x${matches}: mean score ${summary.meanScore.toFixed(2)}, best ${summary.bestScore}`
  );

  let id: number | null = null;
  if (save) {
    try {
      id = deps.persistence.saveEntry(entry, { matches, boardSize: engine.config.boardSize });
      deps.persistence.pruneLeaderboard(deps.config.leaderboardLimit);
    } catch (err) {
      sendJson(res, 400, { ok: false, message: errorMessage(err) });
      return;
    }
  }
  sendJson(res, 200, {
    ok: true,
    entry,
    id,
    meanScore: summary.meanScore,
    bestScore: summary.bestScore,
    meanSteps: summary.meanSteps,
    matches: summary.matches
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}

async function readJsonBody(req: IncomingMessage, limitBytes: number): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > limitBytes) {
      throw new Error('payload too large');
    }
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString('utf8');
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('body must be a JSON object');
  }
  return { ...parsed };
}
