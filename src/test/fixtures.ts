import type { RandomSource } from '../rng.ts';
import type { Direction, Position } from '../types.ts';

/**
 * Random source that places food on the given cells in order, cycling when
 * exhausted. Each cell consumes two draws (x then y).
 * @param boardSize - Board edge length the engine uses.
 * @param cells - Cells to emit.
 */
export function cellRng(boardSize: number, cells: Position[]): RandomSource {
  const values = cells.flatMap(cell => [(cell.x + 0.5) / boardSize, (cell.y + 0.5) / boardSize]);
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

/** Random source that always returns the same value. */
export function constantRng(value: number): RandomSource {
  return () => value;
}

/**
 * Route on an 8x8 board that starts behind the initial snake head at (2,2)
 * and visits every other cell once. The first three cells are the starting
 * body, tail first.
 */
export function boardFillingPath(): Position[] {
  const path: Position[] = [
    { x: 0, y: 2 },
    { x: 1, y: 2 },
    { x: 2, y: 2 },
    { x: 2, y: 1 },
    { x: 1, y: 1 },
    { x: 0, y: 1 }
  ];
  for (let x = 0; x < 8; x++) path.push({ x, y: 0 });
  for (let x = 7; x >= 3; x--) path.push({ x, y: 1 });
  for (let x = 3; x < 8; x++) path.push({ x, y: 2 });
  for (let y = 3; y < 8; y++) {
    for (let i = 0; i < 8; i++) path.push({ x: y % 2 === 1 ? 7 - i : i, y });
  }
  return path;
}

/** Direction of travel between two adjacent cells. */
export function directionBetween(from: Position, to: Position): Direction {
  if (to.x > from.x) return 'RIGHT';
  if (to.x < from.x) return 'LEFT';
  return to.y > from.y ? 'DOWN' : 'UP';
}
