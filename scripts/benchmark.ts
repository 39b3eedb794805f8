import { runBenchmark, toLeaderboardEntry } from '../src/benchmark.ts';
import { BASELINE_BOT_KINDS, createBaselineBot, isBaselineBotKind } from '../src/bots/baselineBots.ts';
import { GameEngine } from '../src/engine.ts';
import { validateLeaderboardEntry } from '../src/leaderboard.ts';
import { createRng, hashSeed } from '../src/rng.ts';
import { parseConfig } from '../server/config.ts';
import { createLogger } from '../server/logger.ts';
import { createPersistence, initDb } from '../server/persistence.ts';

/** Read a `--flag value` or `--flag=value` argument. */
function argValue(argv: string[], flag: string): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === flag) return argv[i + 1];
    if (arg?.startsWith(`${flag}=`)) return arg.slice(flag.length + 1);
  }
  return undefined;
}

const argv = process.argv.slice(2);
const config = parseConfig(argv, process.env);
const logger = createLogger(config.logLevel);

const kind = argValue(argv, '--agent') ?? 'greedy';
if (!isBaselineBotKind(kind)) {
  console.error(`Usage: tsx scripts/benchmark.ts [--agent ${BASELINE_BOT_KINDS.join('|')}] [--matches N] [--save] [--export file.json]`);
  process.exit(1);
}
const matchesArg = Number.parseInt(argValue(argv, '--matches') ?? '', 10);
const matches = Number.isFinite(matchesArg) && matchesArg > 0 ? matchesArg : config.benchmarkMatches;
const name = argValue(argv, '--name') ?? kind;
const seed = config.seed ?? Math.floor(Math.random() * 1e9);
const save = argv.includes('--save');
if (save) {
  try {
    validateLeaderboardEntry({ name, ranking_data: { score: 0, step: 0 } });
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

const engine = new GameEngine(
  {
    boardSize: config.boardSize,
    localState: config.localState,
    relativeActions: config.relativeActions,
    player: 'agent'
  },
  { rng: createRng(hashSeed(seed, 0)) },
  (msg) => logger.warn('benchmark', msg)
);

const summary = runBenchmark({
  matches,
  engine,
  agent: createBaselineBot(kind, seed),
  onMatchEnd: (result, index) => {
    logger.debug(
      'benchmark',
      `match ${index + 1}/${matches}: score ${result.score}, steps ${result.steps}, ${result.reason}`
    );
  }
});

logger.info(
  'benchmark',
  `${kind} x${matches} on ${config.boardSize}x${config.boardSize} (seed ${seed}): ` +
    `mean score ${summary.meanScore.toFixed(2)}, best ${summary.bestScore}, ` +
    `mean steps ${summary.meanSteps.toFixed(1)}`
);

const exportPath = argValue(argv, '--export');
if (save || exportPath) {
  const db = initDb(config.dbPath);
  try {
    const persistence = createPersistence(db);
    if (save) {
      const id = persistence.saveEntry(toLeaderboardEntry(name, summary), {
        matches,
        boardSize: config.boardSize
      });
      persistence.pruneLeaderboard(config.leaderboardLimit);
      logger.info('benchmark', `saved leaderboard entry ${id} for ${name}`);
    }
    if (exportPath) {
      const count = persistence.exportLeaderboard(exportPath, config.leaderboardLimit);
      logger.info('benchmark', `exported ${count} leaderboard entries to ${exportPath}`);
    }
  } finally {
    db.close();
  }
}
