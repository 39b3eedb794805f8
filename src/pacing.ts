// pacing.ts
// Move pacing for human play. The engine has no notion of time; a tick loop
// uses these helpers to decide when to call `play` and with which key.

import { isForbiddenMove } from './actions.ts';
import { INITIAL_LENGTH } from './config.ts';
import type { AbsoluteAction, Direction } from './types.ts';

export type SpeedLevel = 'EASY' | 'MEDIUM' | 'HARD' | 'MEGA_HARDCORE';

export const SPEED_LEVELS: readonly SpeedLevel[] = ['EASY', 'MEDIUM', 'HARD', 'MEGA_HARDCORE'];

/** Milliseconds between moves for each level. */
export const SPEED_DELAYS_MS: Record<SpeedLevel, number> = {
  EASY: 80,
  MEDIUM: 60,
  HARD: 40,
  MEGA_HARDCORE: 65
};

/** Mega-hardcore speeds up by this many ms per food eaten. */
const MEGA_HARDCORE_STEP_MS = 2;
export const MIN_MOVE_DELAY_MS = 10;

export function isSpeedLevel(value: unknown): value is SpeedLevel {
  return SPEED_LEVELS.some((level) => level === value);
}

/**
 * Delay before the next move.
 * @param level - Selected speed level.
 * @param length - Current snake length; only mega-hardcore depends on it.
 * @returns Delay in milliseconds.
 */
export function moveDelayMs(level: SpeedLevel, length: number): number {
  const base = SPEED_DELAYS_MS[level];
  if (level !== 'MEGA_HARDCORE') return base;
  const grown = Math.max(0, length - INITIAL_LENGTH);
  return Math.max(MIN_MOVE_DELAY_MS, base - MEGA_HARDCORE_STEP_MS * grown);
}

/**
 * Remembers the last usable key press between moves, so a quick tap that
 * lands between two ticks still counts and stray input is ignored.
 */
export class InputBuffer {
  private lastKey: AbsoluteAction;

  constructor(initial: Direction) {
    this.lastKey = initial;
  }

  /**
   * Record a key press. Absent and forbidden presses keep the previous key.
   * @param action - Pressed key, or null when nothing was pressed.
   * @param heading - Current heading of the snake.
   */
  press(action: AbsoluteAction | null, heading: Direction): void {
    if (action === null) return;
    if (isForbiddenMove(action, heading)) return;
    this.lastKey = action;
  }

  get current(): AbsoluteAction {
    return this.lastKey;
  }

  reset(initial: Direction): void {
    this.lastKey = initial;
  }
}
