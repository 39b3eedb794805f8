// observation.ts
// Observation grid handed to agents and renderers.

import type { Snake } from './snake.ts';
import {
  CELL,
  DIRECTIONS,
  movePosition,
  type CellValue,
  type Direction,
  type ObservationGrid,
  type Position
} from './types.ts';

/** Per-direction flag: true when moving that way next step is fatal. */
export type DangerHints = Record<Direction, boolean>;

/**
 * Build a grid of EMPTY cells.
 * @param boardSize - Board edge length.
 * @returns Fresh `boardSize × boardSize` grid.
 */
export function createEmptyGrid(boardSize: number): ObservationGrid {
  const grid: ObservationGrid = [];
  for (let y = 0; y < boardSize; y++) {
    grid.push(new Array<CellValue>(boardSize).fill(CELL.EMPTY));
  }
  return grid;
}

export function isInBounds(p: Position, boardSize: number): boolean {
  return p.x >= 0 && p.x <= boardSize - 1 && p.y >= 0 && p.y <= boardSize - 1;
}

function setCell(grid: ObservationGrid, p: Position, value: CellValue): void {
  const row = grid[p.y];
  if (!row || p.x < 0 || p.x >= row.length) return;
  row[p.x] = value;
}

/**
 * Which neighbours of the head are off-board or covered by the body.
 * Uses the same bounds and self-intersection rule as collision detection.
 * @param snake - Snake to evaluate.
 * @param boardSize - Board edge length.
 */
export function evaluateLocalSafety(snake: Snake, boardSize: number): DangerHints {
  const hints: DangerHints = { LEFT: false, RIGHT: false, UP: false, DOWN: false };
  for (const direction of DIRECTIONS) {
    const next = movePosition(snake.head, direction);
    hints[direction] = !isInBounds(next, boardSize) || snake.occupiesBehindHead(next);
  }
  return hints;
}

/**
 * Render the snake and food into a grid.
 *
 * Order: BODY, then HEAD, then DANGEROUS neighbours (when `localState`), then
 * FOOD, so food wins over anything drawn before it.
 */
export function buildObservation(
  snake: Snake,
  food: Position,
  boardSize: number,
  localState: boolean
): ObservationGrid {
  const grid = createEmptyGrid(boardSize);
  for (const part of snake.body) {
    setCell(grid, part, CELL.BODY);
  }
  setCell(grid, snake.head, CELL.HEAD);

  if (localState) {
    const hints = evaluateLocalSafety(snake, boardSize);
    for (const direction of DIRECTIONS) {
      if (hints[direction]) setCell(grid, movePosition(snake.head, direction), CELL.DANGEROUS);
    }
  }

  setCell(grid, food, CELL.FOOD);
  return grid;
}
