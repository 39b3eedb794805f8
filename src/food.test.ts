import { describe, it, expect } from 'vitest';
import { BoardFullError } from './errors.ts';
import { FoodGenerator } from './food.ts';
import { createRng } from './rng.ts';
import { cellRng, constantRng } from './test/fixtures.ts';
import type { Position } from './types.ts';

describe('food.ts', () => {
  it('places food off the body and keeps it until consumed', () => {
    const gen = new FoodGenerator(8, cellRng(8, [{ x: 1, y: 1 }, { x: 4, y: 5 }, { x: 6, y: 6 }]));
    const body = [{ x: 1, y: 1 }, { x: 0, y: 1 }];
    const first = gen.generateFood(body);
    expect(first).toEqual({ x: 4, y: 5 });
    expect(gen.isFoodOnScreen).toBe(true);
    expect(gen.generateFood(body)).toEqual({ x: 4, y: 5 });

    gen.consume();
    expect(gen.isFoodOnScreen).toBe(false);
    expect(gen.generateFood(body)).toEqual({ x: 6, y: 6 });
  });

  it('never lands on the body with a seeded source', () => {
    const gen = new FoodGenerator(8, createRng(7));
    const body: Position[] = [];
    for (let x = 0; x < 8; x++) body.push({ x, y: 3 });
    for (let i = 0; i < 200; i++) {
      const food = gen.generateFood(body);
      expect(food.y).not.toBe(3);
      expect(food.x).toBeGreaterThanOrEqual(0);
      expect(food.x).toBeLessThan(8);
      gen.consume();
    }
  });

  it('falls back to the only free cell after the attempt cap', () => {
    const body: Position[] = [];
    for (let y = 0; y < 8; y++) {
      for (let x = 0; x < 8; x++) {
        if (x !== 5 || y !== 6) body.push({ x, y });
      }
    }
    // constant draws always hit (0, 0), which is covered
    const gen = new FoodGenerator(8, constantRng(0), 10);
    expect(gen.generateFood(body)).toEqual({ x: 5, y: 6 });
  });

  it('throws when every cell is covered', () => {
    const body: Position[] = [];
    for (let y = 0; y < 8; y++) {
      for (let x = 0; x < 8; x++) body.push({ x, y });
    }
    const gen = new FoodGenerator(8, createRng(3), 5);
    expect(() => gen.generateFood(body)).toThrow(BoardFullError);
    expect(gen.isFoodOnScreen).toBe(false);
  });
});
