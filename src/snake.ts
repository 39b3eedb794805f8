// snake.ts
// Grid snake: body positions, heading, movement and growth.

import { isForbiddenMove } from './actions.ts';
import { INITIAL_LENGTH } from './config.ts';
import {
  movePosition,
  samePosition,
  type AbsoluteAction,
  type Direction,
  type Position
} from './types.ts';

/**
 * A snake on a square board. Head is `body[0]`, tail is the last element.
 *
 * The snake does not know where the walls are: it will happily report a head
 * outside the board, and the engine decides what that means.
 */
export class Snake {
  /** Segments from head to tail. */
  body: Position[];
  /** Last accepted direction of travel. */
  heading: Direction;
  /** Number of segments; grows by one per food eaten. */
  length: number;

  /**
   * Place a three-segment snake a quarter of the way into the board, facing right.
   * @param boardSize - Board edge length in cells.
   */
  constructor(boardSize: number) {
    const start = Math.floor(boardSize / 4);
    this.body = [];
    for (let i = 0; i < INITIAL_LENGTH; i++) {
      this.body.push({ x: start - i, y: start });
    }
    this.heading = 'RIGHT';
    this.length = this.body.length;
  }

  get head(): Position {
    // body is never empty after construction
    return this.body[0] ?? { x: 0, y: 0 };
  }

  /**
   * True for IDLE or for the direct reversal of the current heading.
   * @param action - Requested absolute action.
   */
  isMoveInvalid(action: AbsoluteAction): boolean {
    return isForbiddenMove(action, this.heading);
  }

  /**
   * Advance one cell. Invalid actions keep the current heading.
   * @param action - Requested absolute action.
   * @param foodPos - Current food cell.
   * @returns True when the new head landed on the food.
   */
  move(action: AbsoluteAction, foodPos: Position): boolean {
    if (action !== 'IDLE' && !this.isMoveInvalid(action)) {
      this.heading = action;
    }
    const next = movePosition(this.head, this.heading);
    this.body.unshift(next);

    const ateFood = samePosition(next, foodPos);
    if (!ateFood) {
      this.body.pop();
    }
    this.length = this.body.length;
    return ateFood;
  }

  /**
   * Whether a cell is covered by a segment other than the head.
   * @param p - Cell to test.
   */
  occupiesBehindHead(p: Position): boolean {
    for (let i = 1; i < this.body.length; i++) {
      const segment = this.body[i];
      if (segment && samePosition(segment, p)) return true;
    }
    return false;
  }
}
