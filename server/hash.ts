import type { GameConfig } from '../src/config.ts';

/**
 * FNV-1a hash of the rules a session plays under, so clients can tell
 * whether two servers run comparable matches.
 * @param config - Normalized game configuration.
 * @returns 8-character hex digest.
 */
export function hashConfig(config: GameConfig): string {
  const json = JSON.stringify([
    config.boardSize,
    config.localState,
    config.relativeActions,
    config.stepBudgetPerLength,
    config.rewards.move,
    config.rewards.gameOver
  ]);
  let hash = 2166136261;
  for (let i = 0; i < json.length; i++) {
    hash ^= json.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}
