import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { coerceInt, DEFAULT_GAME_CONFIG, LARGE_BOARD_WARNING, MIN_BOARD_SIZE } from '../src/config.ts';
import { isSpeedLevel, type SpeedLevel } from '../src/pacing.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  host: string;
  port: number;
  /** Scheduler rate for human sessions; move pacing comes from `speed`. */
  tickRateHz: number;
  dbPath: string;
  logLevel: LogLevel;
  seed?: number;
  boardSize: number;
  localState: boolean;
  relativeActions: boolean;
  /** Default speed level for human sessions that do not pick one. */
  speed: SpeedLevel;
  /** Matches per server-side benchmark when the request does not say. */
  benchmarkMatches: number;
  /** Per-connection cap on agent steps. */
  maxStepsPerSecond: number;
  /** Rows kept and served by the leaderboard. */
  leaderboardLimit: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 5174,
  tickRateHz: 100,
  dbPath: './data/snake.db',
  logLevel: 'info',
  boardSize: DEFAULT_GAME_CONFIG.boardSize,
  localState: false,
  relativeActions: false,
  speed: 'MEDIUM',
  benchmarkMatches: 10,
  maxStepsPerSecond: 2000,
  leaderboardLimit: 100
};

export const DEFAULT_CONFIG_PATH = 'server/config.toml';

type Env = Record<string, string | undefined>;

/** Loosely typed config input, as read from TOML, env or flags. */
export type ConfigInput = { [K in keyof ServerConfig]?: unknown };

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const CONFIG_KEYS: Array<keyof ServerConfig> = [
  'host',
  'port',
  'tickRateHz',
  'dbPath',
  'logLevel',
  'seed',
  'boardSize',
  'localState',
  'relativeActions',
  'speed',
  'benchmarkMatches',
  'maxStepsPerSecond',
  'leaderboardLimit'
];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function parseBoolValue(raw: string | undefined): boolean | undefined {
  if (raw == null) return undefined;
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return undefined;
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

function coerceString(
  name: string,
  value: unknown,
  fallback: string,
  warn?: (msg: string) => void
): string {
  if (value === undefined) return fallback;
  if (typeof value === 'string' && value.trim()) return value;
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

function coerceBool(
  name: string,
  value: unknown,
  fallback: boolean,
  warn?: (msg: string) => void
): boolean {
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const parsed = parseBoolValue(value);
    if (parsed !== undefined) return parsed;
  }
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

export function normalizeConfig(
  input: ConfigInput,
  warn?: (msg: string) => void
): ServerConfig {
  const host = coerceString('host', input.host, DEFAULT_CONFIG.host, warn);
  // 0 asks the OS for a free port
  const port = coerceInt('port', input.port, DEFAULT_CONFIG.port, 0, 65535, warn);
  const tickRateHz = coerceInt(
    'tickRateHz',
    input.tickRateHz,
    DEFAULT_CONFIG.tickRateHz,
    1,
    1000,
    warn
  );
  const dbPath = coerceString('dbPath', input.dbPath, DEFAULT_CONFIG.dbPath, warn);
  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }
  const boardSize = coerceInt(
    'boardSize',
    input.boardSize,
    DEFAULT_CONFIG.boardSize,
    MIN_BOARD_SIZE,
    Number.MAX_SAFE_INTEGER,
    warn
  );
  if (boardSize > LARGE_BOARD_WARNING) {
    warn?.(`boardSize ${boardSize} is above ${LARGE_BOARD_WARNING}; matches may run slower.`);
  }
  const localState = coerceBool('localState', input.localState, DEFAULT_CONFIG.localState, warn);
  const relativeActions = coerceBool(
    'relativeActions',
    input.relativeActions,
    DEFAULT_CONFIG.relativeActions,
    warn
  );
  let speed = DEFAULT_CONFIG.speed;
  if (isSpeedLevel(input.speed)) {
    speed = input.speed;
  } else if (input.speed !== undefined) {
    warn?.(`speed "${String(input.speed)}" is invalid; using ${speed}.`);
  }
  const benchmarkMatches = coerceInt(
    'benchmarkMatches',
    input.benchmarkMatches,
    DEFAULT_CONFIG.benchmarkMatches,
    1,
    1000,
    warn
  );
  const maxStepsPerSecond = coerceInt(
    'maxStepsPerSecond',
    input.maxStepsPerSecond,
    DEFAULT_CONFIG.maxStepsPerSecond,
    1,
    1_000_000,
    warn
  );
  const leaderboardLimit = coerceInt(
    'leaderboardLimit',
    input.leaderboardLimit,
    DEFAULT_CONFIG.leaderboardLimit,
    1,
    10000,
    warn
  );

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number'
        ? input.seed
        : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const output: ServerConfig = {
    host,
    port,
    tickRateHz,
    dbPath,
    logLevel,
    boardSize,
    localState,
    relativeActions,
    speed,
    benchmarkMatches,
    maxStepsPerSecond,
    leaderboardLimit
  };
  if (seed !== undefined) output.seed = seed;
  return output;
}

/**
 * Read a TOML config file. A missing or empty file yields no overrides.
 * @param filePath - Path to the TOML file.
 * @param warn - Sink for parse warnings.
 * @returns Raw config values keyed like `ServerConfig`.
 */
export function loadConfigFile(filePath: string, warn?: (msg: string) => void): ConfigInput {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  if (!raw.trim()) return {};
  try {
    const parsed: Record<string, unknown> = parseToml(raw);
    const input: ConfigInput = {};
    for (const key of CONFIG_KEYS) {
      if (key in parsed) input[key] = parsed[key];
    }
    return input;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`failed to parse ${filePath}: ${message}`);
    return {};
  }
}

/**
 * Resolve the server configuration: defaults, then the TOML file, then
 * environment variables, then CLI flags.
 * @param argv - CLI arguments without the node/script prefix.
 * @param env - Environment variables.
 * @param warn - Sink for warnings; defaults to console.warn.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: (msg: string) => void = (msg) => console.warn(`[config] ${msg}`)
): ServerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['SERVER_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const input: ConfigInput = loadConfigFile(path.resolve(process.cwd(), configPath), warn);

  const host = getArgValue(argv, '--host') ?? env['HOST'];
  if (host) input.host = host;
  const port = parseIntValue(getArgValue(argv, '--port')) ?? parseIntValue(env['PORT']);
  if (port !== undefined) input.port = port;
  const tickRate =
    parseIntValue(getArgValue(argv, '--tick')) ?? parseIntValue(env['TICK_RATE']);
  if (tickRate !== undefined) input.tickRateHz = tickRate;
  const dbPath = getArgValue(argv, '--db-path') ?? env['DB_PATH'];
  if (dbPath) input.dbPath = dbPath;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const seed =
    parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['GAME_SEED']);
  if (seed !== undefined) input.seed = seed;
  const boardSize =
    parseIntValue(getArgValue(argv, '--board-size')) ?? parseIntValue(env['BOARD_SIZE']);
  if (boardSize !== undefined) input.boardSize = boardSize;
  const localState = hasFlag(argv, '--local-state') ? true : parseBoolValue(env['LOCAL_STATE']);
  if (localState !== undefined) input.localState = localState;
  const relative = hasFlag(argv, '--relative') ? true : parseBoolValue(env['RELATIVE_ACTIONS']);
  if (relative !== undefined) input.relativeActions = relative;
  const speed = getArgValue(argv, '--speed') ?? env['SPEED'];
  if (speed) input.speed = speed.toUpperCase();
  const benchmarkMatches =
    parseIntValue(getArgValue(argv, '--benchmark-matches')) ??
    parseIntValue(env['BENCHMARK_MATCHES']);
  if (benchmarkMatches !== undefined) input.benchmarkMatches = benchmarkMatches;
  const maxStepsPerSecond =
    parseIntValue(getArgValue(argv, '--steps-per-second')) ??
    parseIntValue(env['STEPS_PER_SECOND']);
  if (maxStepsPerSecond !== undefined) input.maxStepsPerSecond = maxStepsPerSecond;
  const leaderboardLimit =
    parseIntValue(getArgValue(argv, '--leaderboard-limit')) ??
    parseIntValue(env['LEADERBOARD_LIMIT']);
  if (leaderboardLimit !== undefined) input.leaderboardLimit = leaderboardLimit;
  return normalizeConfig(input, warn);
}
