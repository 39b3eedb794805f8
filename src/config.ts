// config.ts
// Game configuration passed into each engine. There is no process-wide
// configuration state: every engine gets its own normalized copy.

import type { PlayerMode } from './types.ts';

/** Reward constants returned by the engine. */
export interface RewardConfig {
  /** Reward for a step that neither scores nor ends the match. */
  move: number;
  /** Reward for the step that ends the match. */
  gameOver: number;
}

export interface GameConfig {
  /** Board edge length in cells. */
  boardSize: number;
  /** Mark cells next to the head that would be fatal as DANGEROUS. */
  localState: boolean;
  /** Interpret actions as LEFT/FORWARD/RIGHT relative to the heading. */
  relativeActions: boolean;
  player: PlayerMode;
  /** Autonomous matches end once steps exceed this many steps per segment. */
  stepBudgetPerLength: number;
  rewards: RewardConfig;
  /**
   * Rejected random draws before food placement falls back to scanning the
   * free cells. Zero means `boardSize² × 4`.
   */
  foodMaxAttempts: number;
}

export const MIN_BOARD_SIZE = 8;
/** Boards above this size still work, with a warning. */
export const LARGE_BOARD_WARNING = 50;
export const INITIAL_LENGTH = 3;

export const DEFAULT_REWARDS: RewardConfig = {
  move: -0.005,
  gameOver: -1
};

export const DEFAULT_GAME_CONFIG: GameConfig = {
  boardSize: 30,
  localState: false,
  relativeActions: false,
  player: 'agent',
  stepBudgetPerLength: 50,
  rewards: { ...DEFAULT_REWARDS },
  foodMaxAttempts: 0
};

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Coerce a loosely typed value into a clamped integer.
 * @param name - Field name used in warnings.
 * @param value - Raw input value.
 * @param fallback - Value used when the input is missing or invalid.
 * @param min - Inclusive lower bound.
 * @param max - Inclusive upper bound.
 * @param warn - Optional sink for normalisation warnings.
 * @returns Normalized integer.
 */
export function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseInt(value, 10);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clampInt(Math.floor(parsed), min, max);
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

function coerceReward(
  name: string,
  value: unknown,
  fallback: number,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

/** Partial input accepted by {@link normalizeGameConfig}. */
export type GameConfigInput = Partial<Omit<GameConfig, 'rewards'>> & {
  rewards?: Partial<RewardConfig>;
};

/**
 * Fill defaults and clamp every field of a game configuration.
 * @param input - Partial configuration.
 * @param warn - Optional sink for normalisation warnings.
 * @returns A complete configuration.
 */
export function normalizeGameConfig(
  input: GameConfigInput = {},
  warn?: (msg: string) => void
): GameConfig {
  const boardSize = coerceInt(
    'boardSize',
    input.boardSize,
    DEFAULT_GAME_CONFIG.boardSize,
    MIN_BOARD_SIZE,
    Number.MAX_SAFE_INTEGER,
    warn
  );
  if (boardSize > LARGE_BOARD_WARNING) {
    warn?.(`boardSize ${boardSize} is above ${LARGE_BOARD_WARNING}; matches may run slower.`);
  }
  const stepBudgetPerLength = coerceInt(
    'stepBudgetPerLength',
    input.stepBudgetPerLength,
    DEFAULT_GAME_CONFIG.stepBudgetPerLength,
    1,
    100000,
    warn
  );
  const foodMaxAttempts = coerceInt(
    'foodMaxAttempts',
    input.foodMaxAttempts,
    DEFAULT_GAME_CONFIG.foodMaxAttempts,
    0,
    10_000_000,
    warn
  );
  let player = DEFAULT_GAME_CONFIG.player;
  if (input.player === 'human' || input.player === 'agent') {
    player = input.player;
  } else if (input.player !== undefined) {
    warn?.(`player "${String(input.player)}" is invalid; using ${player}.`);
  }
  const rewards: RewardConfig = {
    move: coerceReward('rewards.move', input.rewards?.move, DEFAULT_REWARDS.move, warn),
    gameOver: coerceReward(
      'rewards.gameOver',
      input.rewards?.gameOver,
      DEFAULT_REWARDS.gameOver,
      warn
    )
  };
  return {
    boardSize,
    localState: Boolean(input.localState),
    relativeActions: Boolean(input.relativeActions),
    player,
    stepBudgetPerLength,
    rewards,
    foodMaxAttempts
  };
}
