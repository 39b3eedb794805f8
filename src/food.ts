import { BoardFullError } from './errors.ts';
import { randomInt, type RandomSource } from './rng.ts';
import { positionKey, type Position } from './types.ts';

/** Multiplier on the cell count used when no attempt cap is configured. */
const DEFAULT_ATTEMPTS_PER_CELL = 4;

/**
 * Keeps track of the single food cell on the board.
 *
 * Placement draws uniform random cells and rejects those on the body. Rejection
 * sampling slows down as the body covers more of the board, so after
 * `maxAttempts` misses the generator scans for free cells and picks one of
 * them uniformly instead; with no free cell left it throws `BoardFullError`.
 */
export class FoodGenerator {
  /** Current food cell; only meaningful while `isFoodOnScreen` is set. */
  pos: Position;
  /** False once the food is eaten, until the next `generateFood`. */
  isFoodOnScreen = false;
  private readonly boardSize: number;
  private readonly rng: RandomSource;
  private readonly maxAttempts: number;

  constructor(boardSize: number, rng: RandomSource, maxAttempts = 0) {
    this.boardSize = boardSize;
    this.rng = rng;
    this.maxAttempts = maxAttempts > 0
      ? maxAttempts
      : boardSize * boardSize * DEFAULT_ATTEMPTS_PER_CELL;
    this.pos = { x: 0, y: 0 };
  }

  /**
   * Return the food cell, placing a new one if the last was eaten.
   * Repeated calls without `consume` return the same cell.
   * @param body - Snake segments the food must avoid.
   * @returns Food cell.
   */
  generateFood(body: readonly Position[]): Position {
    if (this.isFoodOnScreen) return this.pos;

    const occupied = new Set(body.map(positionKey));
    let placed: Position | null = null;
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = {
        x: randomInt(this.rng, this.boardSize),
        y: randomInt(this.rng, this.boardSize)
      };
      if (!occupied.has(positionKey(candidate))) {
        placed = candidate;
        break;
      }
    }
    if (!placed) placed = this.pickFreeCell(occupied);

    this.pos = placed;
    this.isFoodOnScreen = true;
    return placed;
  }

  /** Mark the food as eaten so the next `generateFood` relocates it. */
  consume(): void {
    this.isFoodOnScreen = false;
  }

  private pickFreeCell(occupied: Set<string>): Position {
    const free: Position[] = [];
    for (let y = 0; y < this.boardSize; y++) {
      for (let x = 0; x < this.boardSize; x++) {
        const cell = { x, y };
        if (!occupied.has(positionKey(cell))) free.push(cell);
      }
    }
    const choice = free[randomInt(this.rng, free.length)];
    if (!choice) throw new BoardFullError(this.boardSize);
    return choice;
  }
}
