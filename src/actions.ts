import {
  ABSOLUTE_ACTIONS,
  OPPOSITE,
  RELATIVE_ACTIONS,
  isAbsoluteAction,
  isRelativeAction,
  type AbsoluteAction,
  type Action,
  type Direction,
  type RelativeAction
} from './types.ts';

/** Heading after a left turn. */
const TURN_LEFT: Record<Direction, Direction> = {
  LEFT: 'DOWN',
  RIGHT: 'UP',
  UP: 'LEFT',
  DOWN: 'RIGHT'
};

/** Heading after a right turn. */
const TURN_RIGHT: Record<Direction, Direction> = {
  LEFT: 'UP',
  RIGHT: 'DOWN',
  UP: 'RIGHT',
  DOWN: 'LEFT'
};

/**
 * Translate a relative action into an absolute direction.
 * @param heading - Current heading of the snake.
 * @param action - Relative action to apply.
 * @returns Absolute direction after the turn (FORWARD keeps the heading).
 */
export function relativeToAbsolute(heading: Direction, action: RelativeAction): Direction {
  switch (action) {
    case 'FORWARD':
      return heading;
    case 'LEFT':
      return TURN_LEFT[heading];
    case 'RIGHT':
      return TURN_RIGHT[heading];
  }
}

/**
 * Inverse of {@link relativeToAbsolute}. A reversal has no relative
 * counterpart and maps to FORWARD, which is what the engine would do with it.
 */
export function absoluteToRelative(heading: Direction, direction: Direction): RelativeAction {
  if (direction === heading) return 'FORWARD';
  if (TURN_LEFT[heading] === direction) return 'LEFT';
  if (TURN_RIGHT[heading] === direction) return 'RIGHT';
  return 'FORWARD';
}

/**
 * True when moving in `action` would reverse `heading`, or when the action is IDLE.
 * @param action - Requested absolute action.
 * @param heading - Last accepted direction.
 */
export function isForbiddenMove(action: AbsoluteAction, heading: Direction): boolean {
  if (action === 'IDLE') return true;
  return OPPOSITE[heading] === action;
}

/**
 * Action-space size for a mode.
 * @param relative - Whether actions are relative to the heading.
 * @returns 3 for relative actions, 5 for absolute ones.
 */
export function actionSpaceSize(relative: boolean): number {
  return relative ? RELATIVE_ACTIONS.length : ABSOLUTE_ACTIONS.length;
}

/**
 * Resolve wire input (a name, an action-space index or null) to an action.
 * Unknown input resolves to null so the engine's substitution policy applies.
 * @param raw - Value received from a client.
 * @param relative - Whether the engine runs in relative mode.
 * @returns Action or null.
 */
export function parseAction(raw: unknown, relative: boolean): Action | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw)) return null;
    const table: readonly Action[] = relative ? RELATIVE_ACTIONS : ABSOLUTE_ACTIONS;
    return table[raw] ?? null;
  }
  if (typeof raw !== 'string') return null;
  const name = raw.trim().toUpperCase();
  if (relative) return isRelativeAction(name) ? name : null;
  return isAbsoluteAction(name) ? name : null;
}
