/** Shared value types for the grid: positions, actions and cell values. */

/** Integer cell coordinate, 0-indexed from the top-left corner. */
export interface Position {
  x: number;
  y: number;
}

/** Cardinal direction of travel. */
export type Direction = 'LEFT' | 'RIGHT' | 'UP' | 'DOWN';

/** Absolute action: a direction, or IDLE to keep the current heading. */
export type AbsoluteAction = Direction | 'IDLE';

/** Action interpreted against the current heading. */
export type RelativeAction = 'LEFT' | 'FORWARD' | 'RIGHT';

/** Any action name accepted by the engine. */
export type Action = AbsoluteAction | RelativeAction;

/** Who drives the match; only autonomous players have a step budget. */
export type PlayerMode = 'human' | 'agent';

/** Absolute actions in index order (action-space index → action). */
export const ABSOLUTE_ACTIONS: readonly AbsoluteAction[] = ['LEFT', 'RIGHT', 'UP', 'DOWN', 'IDLE'];

/** Relative actions in index order (action-space index → action). */
export const RELATIVE_ACTIONS: readonly RelativeAction[] = ['LEFT', 'FORWARD', 'RIGHT'];

/** Directions in the order agents and danger hints enumerate them. */
export const DIRECTIONS: readonly Direction[] = ['LEFT', 'RIGHT', 'UP', 'DOWN'];

/** Unit vector per direction. Screen coordinates: UP decreases y. */
export const DIRECTION_VECTORS: Record<Direction, Position> = {
  LEFT: { x: -1, y: 0 },
  RIGHT: { x: 1, y: 0 },
  UP: { x: 0, y: -1 },
  DOWN: { x: 0, y: 1 }
};

export const OPPOSITE: Record<Direction, Direction> = {
  LEFT: 'RIGHT',
  RIGHT: 'LEFT',
  UP: 'DOWN',
  DOWN: 'UP'
};

/** Categorical value of one observation grid cell. */
export const CELL = {
  EMPTY: 0,
  FOOD: 1,
  BODY: 2,
  HEAD: 3,
  DANGEROUS: 4
} as const;

export type CellValue = (typeof CELL)[keyof typeof CELL];

/** Row-major observation grid: `grid[y][x]`. */
export type ObservationGrid = CellValue[][];

/** Why a match ended. `full` means the snake covers the whole board. */
export type EndReason = 'wall' | 'body' | 'stall' | 'quit' | 'full';

/** Lifecycle phase of an engine. */
export type GamePhase = 'ready' | 'running' | 'terminal';

export function isDirection(value: unknown): value is Direction {
  return value === 'LEFT' || value === 'RIGHT' || value === 'UP' || value === 'DOWN';
}

export function isAbsoluteAction(value: unknown): value is AbsoluteAction {
  return isDirection(value) || value === 'IDLE';
}

export function isRelativeAction(value: unknown): value is RelativeAction {
  return value === 'LEFT' || value === 'FORWARD' || value === 'RIGHT';
}

/**
 * Compare two positions by value.
 * @param a - First position.
 * @param b - Second position.
 * @returns True when both coordinates match.
 */
export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Step one cell in a direction.
 * @param p - Starting cell.
 * @param direction - Direction of travel.
 * @returns The adjacent cell (may be off-board).
 */
export function movePosition(p: Position, direction: Direction): Position {
  const v = DIRECTION_VECTORS[direction];
  return { x: p.x + v.x, y: p.y + v.y };
}

/** Stable string key for set/map lookups. */
export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}
