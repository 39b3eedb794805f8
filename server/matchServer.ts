import { performance } from 'node:perf_hooks';
import { parseAction } from '../src/actions.ts';
import { BoardFullError, InvalidStateError } from '../src/errors.ts';
import { moveDelayMs } from '../src/pacing.ts';
import type { RandomSource } from '../src/rng.ts';
import { isAbsoluteAction, type Action } from '../src/types.ts';
import type { ServerConfig } from './config.ts';
import type { Logger } from './logger.ts';
import type { HelloMsg, ObservationMsg, ServerMessage, WireAction } from './protocol.ts';
import { SessionRegistry, type Session } from './sessionRegistry.ts';

/** Anything that can deliver a message to a connection. */
export interface MessageSink {
  sendJsonTo: (connId: number, payload: ServerMessage) => void;
}

export interface MatchServerOptions {
  /** Food placement source per connection; defaults to one derived from `config.seed`. */
  rngFor?: (connId: number) => RandomSource;
}

/**
 * Hosts one match per connection. Agent sessions move when they send `step`;
 * human sessions move on the tick loop at the pace of their speed level.
 */
export class MatchServer {
  private sessions: SessionRegistry;
  private sink: MessageSink;
  private logger: Logger;
  /** Scheduler rate in hertz. */
  private tickRateHz: number;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Target time for the next tick in ms. */
  private nextTickAt = 0;
  private tickId = 0;

  constructor(
    config: ServerConfig,
    sink: MessageSink,
    logger: Logger,
    cfgHash: string,
    options: MatchServerOptions = {}
  ) {
    this.sink = sink;
    this.logger = logger;
    this.tickRateHz = config.tickRateHz;
    const registryOptions = {
      boardSize: config.boardSize,
      localState: config.localState,
      relativeActions: config.relativeActions,
      defaultSpeed: config.speed,
      maxStepsPerSecond: config.maxStepsPerSecond,
      cfgHash
    };
    this.sessions = new SessionRegistry(
      config.seed !== undefined ? { ...registryOptions, seed: config.seed } : registryOptions,
      options.rngFor
        ? { send: (connId, payload) => this.sink.sendJsonTo(connId, payload), rngFor: options.rngFor }
        : { send: (connId, payload) => this.sink.sendJsonTo(connId, payload) }
    );
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.nextTickAt = performance.now();
    this.loop();
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  getTickId(): number {
    return this.tickId;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  handleHello(connId: number, msg: HelloMsg): void {
    const session = this.sessions.open(connId, msg);
    this.logger.info(
      'match',
      `session ${connId} opened (${session.mode}, ${session.name}${session.speed ? `, ${session.speed}` : ''})`
    );
    this.sendObservation(session, 0);
  }

  handleReset(connId: number): void {
    const session = this.sessions.get(connId);
    if (!session) return;
    this.sessions.resetMatch(session);
    this.logger.debug('match', `session ${connId} reset`);
    this.sendObservation(session, 0);
  }

  handleStep(connId: number, raw: WireAction): void {
    const session = this.sessions.get(connId);
    if (!session) return;
    if (session.mode !== 'agent') {
      this.sink.sendJsonTo(connId, { type: 'error', message: 'step requires agent mode' });
      return;
    }
    if (!this.sessions.admitStep(session)) {
      this.sink.sendJsonTo(connId, { type: 'error', message: 'step rate limit exceeded' });
      return;
    }
    this.advance(session, parseAction(raw, session.engine.config.relativeActions));
  }

  handleInput(connId: number, raw: WireAction): void {
    const session = this.sessions.get(connId);
    if (!session) return;
    if (session.mode !== 'human') {
      this.sink.sendJsonTo(connId, { type: 'error', message: 'input requires human mode' });
      return;
    }
    const action = parseAction(raw, false);
    session.input.press(isAbsoluteAction(action) ? action : null, session.engine.heading);
  }

  /** Quit ends the match immediately, like closing the game window mid-play. */
  handleQuit(connId: number): void {
    const session = this.sessions.get(connId);
    if (!session || session.engine.done) return;
    session.engine.quit();
    this.finishMatch(session);
  }

  handleDisconnect(connId: number): void {
    const session = this.sessions.get(connId);
    if (!session) return;
    this.sessions.close(connId);
    this.logger.info('match', `session ${connId} closed after ${session.matchesPlayed} match(es)`);
  }

  /**
   * Advance every due human session. Exposed for tests; the loop calls it.
   * @param dtMs - Time since the previous tick.
   */
  tick(dtMs: number): void {
    this.tickId += 1;
    for (const session of this.sessions.humanSessions()) {
      if (session.engine.done || !session.speed) continue;
      session.elapsedMs += dtMs;
      if (session.elapsedMs < moveDelayMs(session.speed, session.engine.length)) continue;
      session.elapsedMs = 0;
      this.advance(session, session.input.current);
    }
  }

  private loop(): void {
    if (!this.running) return;
    const now = performance.now();
    const interval = 1000 / this.tickRateHz;
    if (now >= this.nextTickAt) {
      this.tick(interval);
      this.nextTickAt += interval;
    }
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  private advance(session: Session, action: Action | null): void {
    const engine = session.engine;
    const lengthBefore = engine.length;
    try {
      engine.play(action);
    } catch (err) {
      if (err instanceof InvalidStateError || err instanceof BoardFullError) {
        this.logger.warn('match', `session ${session.connId}: ${err.message}`);
        this.sink.sendJsonTo(session.connId, { type: 'error', message: err.message });
        return;
      }
      throw err;
    }
    if (engine.scored) {
      this.logger.debug('match', `session ${session.connId} ate food (length ${lengthBefore} -> ${engine.length})`);
    }
    this.sendObservation(session, engine.reward());
    if (engine.done) this.finishMatch(session);
  }

  private finishMatch(session: Session): void {
    const engine = session.engine;
    const reason = engine.endReason ?? 'quit';
    session.matchesPlayed += 1;
    this.logger.info(
      'match',
      `session ${session.connId} over: ${reason}, score ${engine.score}, steps ${engine.steps}`
    );
    this.sink.sendJsonTo(session.connId, {
      type: 'over',
      score: engine.score,
      steps: engine.steps,
      reason
    });
  }

  private sendObservation(session: Session, reward: number): void {
    const engine = session.engine;
    const msg: ObservationMsg = {
      type: 'observation',
      grid: engine.state(),
      reward,
      done: engine.done,
      steps: engine.steps,
      length: engine.length,
      score: engine.score,
      food: engine.food
    };
    this.sink.sendJsonTo(session.connId, msg);
  }
}
