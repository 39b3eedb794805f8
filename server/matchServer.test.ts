import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, type ServerConfig } from './config.ts';
import { createLogger } from './logger.ts';
import { boardFillingPath, cellRng, directionBetween } from '../src/test/fixtures.ts';
import { MatchServer, type MatchServerOptions } from './matchServer.ts';
import type { ServerMessage } from './protocol.ts';

function createServer(overrides: Partial<ServerConfig> = {}, options: MatchServerOptions = {}) {
  const sent: Array<{ connId: number; payload: ServerMessage }> = [];
  const server = new MatchServer(
    { ...DEFAULT_CONFIG, boardSize: 10, seed: 1, ...overrides },
    { sendJsonTo: (connId, payload) => sent.push({ connId, payload }) },
    createLogger('error', () => {}),
    'test-hash',
    options
  );
  const take = () => sent.splice(0).map(item => item.payload);
  return { server, take };
}

describe('match server', () => {
  it('sends the welcome and the first observation on hello', () => {
    const { server, take } = createServer();
    server.handleHello(1, { type: 'hello', version: 1, mode: 'agent' });
    const [welcome, observation] = take();
    expect(welcome?.type).toBe('welcome');
    expect(observation).toMatchObject({ type: 'observation', reward: 0, done: false, steps: 0, length: 3, score: 0 });
    expect(server.getSessionCount()).toBe(1);
  });

  it('steps an agent into the wall and reports the end', () => {
    const { server, take } = createServer();
    server.handleHello(1, { type: 'hello', version: 1, mode: 'agent' });
    take();

    server.handleStep(1, 'UP');
    server.handleStep(1, 2);
    const [first, second] = take();
    expect(first).toMatchObject({ type: 'observation', steps: 1, done: false });
    expect(second).toMatchObject({ type: 'observation', steps: 2, done: false });

    server.handleStep(1, 'UP');
    const [last, over] = take();
    expect(last).toMatchObject({ type: 'observation', steps: 3, done: true, reward: -1 });
    expect(over).toMatchObject({ type: 'over', steps: 3, reason: 'wall' });

    server.handleStep(1, 'UP');
    expect(take()).toEqual([
      { type: 'error', message: 'match is over; call reset() before stepping again' }
    ]);

    server.handleReset(1);
    expect(take()[0]).toMatchObject({ type: 'observation', steps: 0, done: false, reward: 0 });
  });

  it('ends a match that fills the board and keeps serving the session', () => {
    const path = boardFillingPath();
    const { server, take } = createServer(
      { boardSize: 8 },
      { rngFor: () => cellRng(8, path.slice(3)) }
    );
    server.handleHello(1, { type: 'hello', version: 1, mode: 'agent' });
    take();

    for (let i = 3; i < path.length; i++) {
      const from = path[i - 1];
      const to = path[i];
      if (!from || !to) throw new Error('path too short');
      server.handleStep(1, directionBetween(from, to));
    }
    const sent = take();
    expect(sent).toHaveLength(62);
    expect(sent[59]).toMatchObject({ type: 'observation', steps: 60, done: false, length: 63 });
    expect(sent[60]).toMatchObject({ type: 'observation', steps: 61, done: true, length: 64, score: 61 });
    expect(sent[61]).toEqual({ type: 'over', score: 61, steps: 61, reason: 'full' });

    server.handleStep(1, 'UP');
    expect(take()).toEqual([
      { type: 'error', message: 'match is over; call reset() before stepping again' }
    ]);
    server.handleReset(1);
    expect(take()[0]).toMatchObject({ type: 'observation', steps: 0, done: false, length: 3 });
  });

  it('rejects steps over the per-second limit', () => {
    const { server, take } = createServer({ maxStepsPerSecond: 2 });
    server.handleHello(1, { type: 'hello', version: 1, mode: 'agent' });
    take();
    server.handleStep(1, null);
    server.handleStep(1, null);
    take();
    server.handleStep(1, null);
    expect(take()).toEqual([{ type: 'error', message: 'step rate limit exceeded' }]);
  });

  it('moves human sessions on the tick at their speed', () => {
    const { server, take } = createServer();
    server.handleHello(2, { type: 'hello', version: 1, mode: 'human', speed: 'EASY' });
    take();

    server.handleInput(2, 'down');
    server.tick(50);
    expect(take()).toEqual([]);

    server.tick(40);
    const [observation] = take();
    expect(observation).toMatchObject({ type: 'observation', steps: 1, done: false });
    expect(server.getTickId()).toBe(2);
  });

  it('keeps step and input to their own modes', () => {
    const { server, take } = createServer();
    server.handleHello(1, { type: 'hello', version: 1, mode: 'agent' });
    server.handleHello(2, { type: 'hello', version: 1, mode: 'human' });
    take();

    server.handleInput(1, 'UP');
    server.handleStep(2, 'UP');
    expect(take()).toEqual([
      { type: 'error', message: 'input requires human mode' },
      { type: 'error', message: 'step requires agent mode' }
    ]);
  });

  it('ends the match on quit and forgets the session on disconnect', () => {
    const { server, take } = createServer();
    server.handleHello(2, { type: 'hello', version: 1, mode: 'human' });
    take();

    server.handleQuit(2);
    expect(take()).toEqual([{ type: 'over', score: 0, steps: 0, reason: 'quit' }]);
    server.handleQuit(2);
    expect(take()).toEqual([]);

    server.tick(1000);
    expect(take()).toEqual([]);

    server.handleDisconnect(2);
    expect(server.getSessionCount()).toBe(0);
  });
});
