import { absoluteToRelative } from '../actions.ts';
import type { Agent } from '../benchmark.ts';
import type { EngineView } from '../engine.ts';
import { createRng, hashSeed, randomInt, type RandomSource } from '../rng.ts';
import {
  ABSOLUTE_ACTIONS,
  DIRECTIONS,
  RELATIVE_ACTIONS,
  movePosition,
  type Action,
  type Direction,
  type Position
} from '../types.ts';

/** Names of the built-in agents. */
export type BaselineBotKind = 'random' | 'greedy';

export const BASELINE_BOT_KINDS: readonly BaselineBotKind[] = ['random', 'greedy'];

export function isBaselineBotKind(value: unknown): value is BaselineBotKind {
  return value === 'random' || value === 'greedy';
}

function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Express a chosen direction in the engine's action vocabulary.
 * @param view - Engine the action is for.
 * @param direction - Absolute direction to take.
 */
function toEngineAction(view: EngineView, direction: Direction): Action {
  if (!view.config.relativeActions) return direction;
  return absoluteToRelative(view.heading, direction);
}

/** Uniformly random actions over the full action space, IDLE included. */
export class RandomAgent implements Agent {
  readonly name = 'random';
  private rng: RandomSource;

  constructor(rng: RandomSource) {
    this.rng = rng;
  }

  act(view: EngineView): Action | null {
    const table: readonly Action[] = view.config.relativeActions ? RELATIVE_ACTIONS : ABSOLUTE_ACTIONS;
    return table[randomInt(this.rng, table.length)] ?? null;
  }
}

/**
 * Heads for the food by Manhattan distance and never takes a fatal step while
 * a safe one exists. Ties break in LEFT, RIGHT, UP, DOWN order.
 */
export class GreedyAgent implements Agent {
  readonly name = 'greedy';

  act(view: EngineView): Action | null {
    const hints = view.dangerHints();
    const head = view.body[0];
    if (!head) return null;
    const food = view.food;

    let best: Direction | null = null;
    let bestDistance = Infinity;
    for (const direction of DIRECTIONS) {
      // the neck is always flagged, so reversals are skipped here too
      if (hints[direction]) continue;
      const distance = manhattan(movePosition(head, direction), food);
      if (distance < bestDistance) {
        best = direction;
        bestDistance = distance;
      }
    }
    return toEngineAction(view, best ?? view.heading);
  }
}

/**
 * Build a baseline agent by name.
 * @param kind - Agent kind.
 * @param seed - Seed for agents that use randomness.
 */
export function createBaselineBot(kind: BaselineBotKind, seed: number): Agent {
  switch (kind) {
    case 'random':
      return new RandomAgent(createRng(hashSeed(seed, 1)));
    case 'greedy':
      return new GreedyAgent();
  }
}
