import { GameEngine } from '../src/engine.ts';
import type { GameConfigInput } from '../src/config.ts';
import { InputBuffer, type SpeedLevel } from '../src/pacing.ts';
import { createRng, hashSeed, type RandomSource } from '../src/rng.ts';
import type { PlayerMode } from '../src/types.ts';
import { PROTOCOL_VERSION, type HelloMsg, type ServerMessage, type WelcomeMsg } from './protocol.ts';

/** Game and rate-limit settings applied to every session. */
export interface SessionRegistryOptions {
  boardSize: number;
  localState: boolean;
  relativeActions: boolean;
  /** Speed for human sessions whose hello does not name one. */
  defaultSpeed: SpeedLevel;
  maxStepsPerSecond: number;
  /** Base seed; each session derives its own stream from it and its id. */
  seed?: number;
  cfgHash: string;
}

export interface SessionRegistryDeps {
  send: (connId: number, payload: ServerMessage) => void;
  now?: () => number;
  /** Overrides the seeded food source for a connection. */
  rngFor?: (connId: number) => RandomSource;
}

/** One connection's match state. */
export interface Session {
  connId: number;
  mode: PlayerMode;
  name: string;
  /** Pacing for human sessions; null for agents. */
  speed: SpeedLevel | null;
  engine: GameEngine;
  /** Last usable key press of a human player. */
  input: InputBuffer;
  /** Time accumulated toward the next paced move. */
  elapsedMs: number;
  stepSecondStartMs: number;
  stepsThisSecond: number;
  droppedSteps: number;
  matchesPlayed: number;
}

/** Sessions keyed by connection id. */
export class SessionRegistry {
  private byConn = new Map<number, Session>();
  private options: SessionRegistryOptions;
  private send: SessionRegistryDeps['send'];
  private now: () => number;
  private rngFor: ((connId: number) => RandomSource) | null;

  constructor(options: SessionRegistryOptions, deps: SessionRegistryDeps) {
    this.options = options;
    this.send = deps.send;
    this.now = deps.now ?? (() => Date.now());
    this.rngFor = deps.rngFor ?? null;
  }

  get size(): number {
    return this.byConn.size;
  }

  /**
   * Create (or replace) the session for a connection and send the welcome.
   * @param connId - Connection id.
   * @param hello - Hello message that opened the session.
   * @returns The new session.
   */
  open(connId: number, hello: HelloMsg): Session {
    this.close(connId);
    const mode = hello.mode;
    const game: GameConfigInput = {
      boardSize: this.options.boardSize,
      localState: this.options.localState,
      // humans press absolute arrow keys
      relativeActions: mode === 'agent' && this.options.relativeActions,
      player: mode
    };
    let rng: RandomSource | undefined;
    if (this.rngFor) {
      rng = this.rngFor(connId);
    } else if (this.options.seed !== undefined) {
      rng = createRng(hashSeed(this.options.seed, connId));
    }
    const engine = new GameEngine(game, rng ? { rng } : {});
    const speed = mode === 'human' ? hello.speed ?? this.options.defaultSpeed : null;
    const session: Session = {
      connId,
      mode,
      name: hello.name?.trim() || `${mode}-${connId}`,
      speed,
      engine,
      input: new InputBuffer(engine.heading),
      elapsedMs: 0,
      stepSecondStartMs: this.now(),
      stepsThisSecond: 0,
      droppedSteps: 0,
      matchesPlayed: 0
    };
    this.byConn.set(connId, session);

    const welcome: WelcomeMsg = {
      type: 'welcome',
      sessionId: connId,
      protocolVersion: PROTOCOL_VERSION,
      boardSize: engine.config.boardSize,
      actionSpace: engine.actionSpace,
      relativeActions: engine.config.relativeActions,
      localState: engine.config.localState,
      mode,
      speed,
      cfgHash: this.options.cfgHash
    };
    this.send(connId, welcome);
    return session;
  }

  get(connId: number): Session | null {
    return this.byConn.get(connId) ?? null;
  }

  close(connId: number): void {
    this.byConn.delete(connId);
  }

  /** Sessions advanced by the server tick loop. */
  humanSessions(): Session[] {
    const out: Session[] = [];
    for (const session of this.byConn.values()) {
      if (session.mode === 'human') out.push(session);
    }
    return out;
  }

  /**
   * Start a new match for a session and clear its pacing state.
   * @param session - Session to reset.
   */
  resetMatch(session: Session): void {
    session.engine.reset();
    session.input.reset(session.engine.heading);
    session.elapsedMs = 0;
  }

  /**
   * Count an agent step against the per-second budget.
   * @param session - Agent session.
   * @returns False when the step must be dropped.
   */
  admitStep(session: Session): boolean {
    const now = this.now();
    if (now - session.stepSecondStartMs >= 1000) {
      session.stepSecondStartMs = now;
      session.stepsThisSecond = 0;
    }
    if (session.stepsThisSecond >= this.options.maxStepsPerSecond) {
      session.droppedSteps += 1;
      return false;
    }
    session.stepsThisSecond += 1;
    return true;
  }
}
