import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import {
  parseLeaderboard,
  validateLeaderboardEntry,
  type LeaderboardEntry
} from '../src/leaderboard.ts';

/** Context stored alongside a leaderboard row. */
export interface LeaderboardMeta {
  matches: number;
  boardSize: number;
}

export interface Persistence {
  saveEntry: (entry: LeaderboardEntry, meta?: Partial<LeaderboardMeta>) => number;
  listLeaderboard: (limit: number) => LeaderboardEntry[];
  pruneLeaderboard: (keep: number) => number;
  exportLeaderboard: (filePath: string, limit: number) => number;
  importLeaderboard: (filePath: string) => number;
}

type DbType = ReturnType<typeof Database>;

interface LeaderboardRow {
  name: string;
  score: number;
  step: number;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS leaderboard (
  id INTEGER PRIMARY KEY,
  created_at INTEGER,
  name TEXT NOT NULL,
  score INTEGER NOT NULL,
  step INTEGER NOT NULL,
  matches INTEGER,
  board_size INTEGER
);

CREATE INDEX IF NOT EXISTS idx_leaderboard_rank ON leaderboard(score DESC, step ASC);
`;

export function initDb(dbPath: string): DbType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.exec(SCHEMA_SQL);
  return db;
}

export function createPersistence(db: DbType): Persistence {
  const insertEntry = db.prepare(
    `INSERT INTO leaderboard (created_at, name, score, step, matches, board_size)
     VALUES (@created_at, @name, @score, @step, @matches, @board_size)`
  );
  const listStmt = db.prepare<[number], LeaderboardRow>(
    `SELECT name, score, step FROM leaderboard ORDER BY score DESC, step ASC, id ASC LIMIT ?`
  );
  const pruneStmt = db.prepare(
    `DELETE FROM leaderboard WHERE id NOT IN (
       SELECT id FROM leaderboard ORDER BY score DESC, step ASC, id ASC LIMIT ?
     )`
  );

  const saveEntry = (entry: LeaderboardEntry, meta: Partial<LeaderboardMeta> = {}): number => {
    validateLeaderboardEntry(entry);
    const info = insertEntry.run({
      created_at: Date.now(),
      name: entry.name.trim(),
      score: entry.ranking_data.score,
      step: entry.ranking_data.step,
      matches: meta.matches ?? null,
      board_size: meta.boardSize ?? null
    });
    return Number(info.lastInsertRowid);
  };

  const listLeaderboard = (limit: number): LeaderboardEntry[] => {
    return listStmt.all(limit).map(row => ({
      name: row.name,
      ranking_data: { score: row.score, step: row.step }
    }));
  };

  const pruneLeaderboard = (keep: number): number => {
    return pruneStmt.run(Math.max(0, Math.floor(keep))).changes;
  };

  const exportLeaderboard = (filePath: string, limit: number): number => {
    const entries = listLeaderboard(limit);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
    return entries.length;
  };

  const importLeaderboard = (filePath: string): number => {
    const raw = fs.readFileSync(filePath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    const entries = parseLeaderboard(parsed);
    const insertAll = db.transaction((rows: LeaderboardEntry[]) => {
      for (const row of rows) saveEntry(row);
    });
    insertAll(entries);
    return entries.length;
  };

  return {
    saveEntry,
    listLeaderboard,
    pruneLeaderboard,
    exportLeaderboard,
    importLeaderboard
  };
}
