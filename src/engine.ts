// engine.ts
// One match of grid snake: step protocol, collisions, rewards and observations.

import { actionSpaceSize, relativeToAbsolute } from './actions.ts';
import { INITIAL_LENGTH, normalizeGameConfig, type GameConfig, type GameConfigInput } from './config.ts';
import { InvalidStateError } from './errors.ts';
import { FoodGenerator } from './food.ts';
import {
  buildObservation,
  createEmptyGrid,
  evaluateLocalSafety,
  isInBounds,
  type DangerHints
} from './observation.ts';
import { createRng, type RandomSource } from './rng.ts';
import { Snake } from './snake.ts';
import {
  isAbsoluteAction,
  isRelativeAction,
  type AbsoluteAction,
  type Action,
  type Direction,
  type EndReason,
  type GamePhase,
  type ObservationGrid,
  type Position
} from './types.ts';

/** Result of one `step` call. */
export interface StepResult {
  observation: ObservationGrid;
  reward: number;
  done: boolean;
  info: null;
}

/** Read-only view of an engine, enough for agents and renderers. */
export interface EngineView {
  readonly config: GameConfig;
  readonly actionSpace: number;
  readonly food: Position;
  readonly steps: number;
  readonly length: number;
  readonly score: number;
  readonly heading: Direction;
  readonly body: readonly Position[];
  readonly done: boolean;
  dangerHints(): DangerHints;
}

export interface GameEngineOptions {
  /** Random source for food placement. Defaults to a randomly seeded xorshift. */
  rng?: RandomSource;
}

/**
 * Single-match simulation. Not reentrant: each call fully resolves before the
 * next is accepted, and a terminal engine rejects simulation until `reset`.
 */
export class GameEngine implements EngineView {
  readonly config: GameConfig;
  private readonly rng: RandomSource;
  private snake: Snake;
  private foodGenerator: FoodGenerator;
  private foodPos: Position;
  private stepCount = 0;
  private scoredThisStep = false;
  private gameOver = false;
  private reason: EndReason | null = null;

  constructor(config: GameConfigInput = {}, options: GameEngineOptions = {}, warn?: (msg: string) => void) {
    this.config = normalizeGameConfig(config, warn);
    this.rng = options.rng ?? createRng(Math.floor(Math.random() * 0x100000000));
    this.snake = new Snake(this.config.boardSize);
    this.foodGenerator = new FoodGenerator(this.config.boardSize, this.rng, this.config.foodMaxAttempts);
    this.foodPos = this.foodGenerator.generateFood(this.snake.body);
  }

  /** 3 in relative mode, 5 in absolute mode. */
  get actionSpace(): number {
    return actionSpaceSize(this.config.relativeActions);
  }

  get food(): Position {
    return { ...this.foodPos };
  }

  get steps(): number {
    return this.stepCount;
  }

  get length(): number {
    return this.snake.length;
  }

  /** Food eaten this match. */
  get score(): number {
    return this.snake.length - INITIAL_LENGTH;
  }

  get heading(): Direction {
    return this.snake.heading;
  }

  get body(): readonly Position[] {
    return this.snake.body.map(part => ({ ...part }));
  }

  get done(): boolean {
    return this.gameOver;
  }

  /** Whether the last step ate food. */
  get scored(): boolean {
    return this.scoredThisStep;
  }

  get endReason(): EndReason | null {
    return this.reason;
  }

  get phase(): GamePhase {
    if (this.gameOver) return 'terminal';
    return this.stepCount === 0 ? 'ready' : 'running';
  }

  /**
   * Start a new match with a fresh snake and food generator.
   * @returns Initial observation.
   */
  reset(): ObservationGrid {
    this.stepCount = 0;
    this.snake = new Snake(this.config.boardSize);
    this.foodGenerator = new FoodGenerator(this.config.boardSize, this.rng, this.config.foodMaxAttempts);
    this.foodPos = this.foodGenerator.generateFood(this.snake.body);
    this.scoredThisStep = false;
    this.gameOver = false;
    this.reason = null;
    return this.state();
  }

  /**
   * Advance the match by one tick.
   * @param action - Requested action; null and invalid actions keep the heading.
   * @throws InvalidStateError when the match is already over.
   */
  play(action: Action | null): void {
    if (this.gameOver) {
      throw new InvalidStateError('match is over; call reset() before stepping again');
    }
    // placement may throw BoardFullError; nothing has changed yet at that point
    this.foodPos = this.foodGenerator.generateFood(this.snake.body);
    this.scoredThisStep = false;
    this.stepCount += 1;

    if (this.snake.move(this.resolveAction(action), this.foodPos)) {
      this.scoredThisStep = true;
      this.foodGenerator.consume();
    }

    const collision = this.checkCollision();
    if (collision) {
      this.finish(collision);
    } else if (this.snake.length >= this.config.boardSize * this.config.boardSize) {
      // no cell left for the next food
      this.finish('full');
    } else if (
      this.config.player === 'agent' &&
      this.stepCount > this.config.stepBudgetPerLength * this.snake.length
    ) {
      this.finish('stall');
    }
  }

  /**
   * Agent-facing step: play, then report observation, reward and termination.
   * @param action - Requested action.
   */
  step(action: Action | null): StepResult {
    this.play(action);
    return {
      observation: this.state(),
      reward: this.reward(),
      done: this.gameOver,
      info: null
    };
  }

  /** End the match at once, as a human quitting mid-game does. */
  quit(): void {
    if (this.gameOver) return;
    this.finish('quit');
  }

  /**
   * Observation grid for the current state. All EMPTY once the match is over;
   * callers check `done` rather than inferring it from the grid.
   */
  state(): ObservationGrid {
    if (this.gameOver) return createEmptyGrid(this.config.boardSize);
    return buildObservation(this.snake, this.foodPos, this.config.boardSize, this.config.localState);
  }

  /** Reward for the most recent step. */
  reward(): number {
    if (this.gameOver) return this.config.rewards.gameOver;
    if (this.scoredThisStep) return this.snake.length;
    return this.config.rewards.move;
  }

  /**
   * Wall or self collision of the current head.
   * @returns What was hit, or null.
   */
  checkCollision(): 'wall' | 'body' | null {
    const head = this.snake.head;
    if (!isInBounds(head, this.config.boardSize)) return 'wall';
    if (this.snake.occupiesBehindHead(head)) return 'body';
    return null;
  }

  dangerHints(): DangerHints {
    return evaluateLocalSafety(this.snake, this.config.boardSize);
  }

  private resolveAction(action: Action | null): AbsoluteAction {
    if (this.config.relativeActions) {
      const relative = isRelativeAction(action) ? action : 'FORWARD';
      return relativeToAbsolute(this.snake.heading, relative);
    }
    return isAbsoluteAction(action) ? action : 'IDLE';
  }

  private finish(reason: EndReason): void {
    this.gameOver = true;
    this.reason = reason;
  }
}
