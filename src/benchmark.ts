// benchmark.ts
// Play a series of independent matches with one agent and aggregate the results.

import type { EngineView, GameEngine } from './engine.ts';
import type { LeaderboardEntry } from './leaderboard.ts';
import type { Action, EndReason } from './types.ts';

/** Anything that can pick an action from an engine view. */
export interface Agent {
  /** Display name used for logs and leaderboard defaults. */
  readonly name: string;
  /** Called after each reset, before the first action of a match. */
  onMatchStart?(view: EngineView): void;
  act(view: EngineView): Action | null;
}

export interface MatchResult {
  /** Food eaten: final length minus the starting length. */
  score: number;
  steps: number;
  reason: EndReason;
}

export interface BenchmarkSummary {
  matches: MatchResult[];
  meanScore: number;
  bestScore: number;
  meanSteps: number;
}

export interface BenchmarkOptions {
  /** Number of matches to play. */
  matches: number;
  /** Engine reused across matches; each match starts with `reset()`. */
  engine: GameEngine;
  agent: Agent;
  /** Quit a match after this many steps; needed for human-mode engines, which never stall out. */
  maxStepsPerMatch?: number;
  /** Called after each match with its zero-based index. */
  onMatchEnd?: (result: MatchResult, index: number) => void;
}

/**
 * Play one match from reset until the engine reports the end.
 * @param engine - Engine to drive.
 * @param agent - Agent choosing actions.
 * @param maxSteps - Step cap after which the match is quit.
 * @returns Final score, steps and end reason.
 */
export function playMatch(engine: GameEngine, agent: Agent, maxSteps = Infinity): MatchResult {
  engine.reset();
  agent.onMatchStart?.(engine);
  while (!engine.done) {
    if (engine.steps >= maxSteps) {
      engine.quit();
      break;
    }
    engine.step(agent.act(engine));
  }
  return {
    score: engine.score,
    steps: engine.steps,
    // a finished engine always carries a reason
    reason: engine.endReason ?? 'quit'
  };
}

export function summarize(matches: MatchResult[]): BenchmarkSummary {
  if (!matches.length) {
    return { matches, meanScore: 0, bestScore: 0, meanSteps: 0 };
  }
  let totalScore = 0;
  let totalSteps = 0;
  let bestScore = 0;
  for (const match of matches) {
    totalScore += match.score;
    totalSteps += match.steps;
    bestScore = Math.max(bestScore, match.score);
  }
  return {
    matches,
    meanScore: totalScore / matches.length,
    bestScore,
    meanSteps: totalSteps / matches.length
  };
}

/**
 * Run `matches` sequential matches and aggregate them.
 * @param options - Engine, agent and match count.
 * @returns Per-match results plus mean/best aggregates.
 */
export function runBenchmark(options: BenchmarkOptions): BenchmarkSummary {
  const count = Math.max(0, Math.floor(options.matches));
  const results: MatchResult[] = [];
  for (let i = 0; i < count; i++) {
    const result = playMatch(options.engine, options.agent, options.maxStepsPerMatch);
    results.push(result);
    options.onMatchEnd?.(result, i);
  }
  return summarize(results);
}

/**
 * Leaderboard row for a benchmark run. Mean values are truncated to integers.
 * @param name - Player or agent name.
 * @param summary - Benchmark aggregates.
 */
export function toLeaderboardEntry(name: string, summary: BenchmarkSummary): LeaderboardEntry {
  return {
    name,
    ranking_data: {
      score: Math.trunc(summary.meanScore),
      step: Math.trunc(summary.meanSteps)
    }
  };
}
