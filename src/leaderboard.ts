/** Leaderboard record format shared with file-backed leaderboard stores. */

const MAX_NAME_LENGTH = 24;

export interface RankingData {
  score: number;
  step: number;
}

/** One leaderboard row; field names follow the stored JSON format. */
export interface LeaderboardEntry {
  name: string;
  ranking_data: RankingData;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Order by score descending, then by fewer steps. Stable for full ties.
 * @param entries - Entries to sort; not mutated.
 * @returns New sorted array.
 */
export function sortLeaderboard(entries: readonly LeaderboardEntry[]): LeaderboardEntry[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => {
      const byScore = b.entry.ranking_data.score - a.entry.ranking_data.score;
      if (byScore !== 0) return byScore;
      const bySteps = a.entry.ranking_data.step - b.entry.ranking_data.step;
      if (bySteps !== 0) return bySteps;
      return a.index - b.index;
    })
    .map(item => item.entry);
}

/**
 * Insert an entry and keep the best `limit` rows.
 * @param entries - Current leaderboard.
 * @param entry - New entry.
 * @param limit - Maximum rows to keep.
 */
export function insertLeaderboardEntry(
  entries: readonly LeaderboardEntry[],
  entry: LeaderboardEntry,
  limit: number
): LeaderboardEntry[] {
  return sortLeaderboard([...entries, entry]).slice(0, Math.max(0, limit));
}

export function validateLeaderboardEntry(value: unknown): asserts value is LeaderboardEntry {
  if (!isRecord(value)) {
    throw new Error('leaderboard entry must be an object');
  }
  const name = value['name'];
  if (typeof name !== 'string' || !name.trim()) {
    throw new Error('leaderboard name is required');
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new Error(`leaderboard name exceeds ${MAX_NAME_LENGTH} characters`);
  }
  const ranking = value['ranking_data'];
  if (!isRecord(ranking)) {
    throw new Error('ranking_data must be an object');
  }
  if (!isNonNegativeInt(ranking['score'])) {
    throw new Error('ranking_data.score must be a non-negative integer');
  }
  if (!isNonNegativeInt(ranking['step'])) {
    throw new Error('ranking_data.step must be a non-negative integer');
  }
}

/**
 * Parse a stored leaderboard document and return it sorted.
 * @param raw - Parsed JSON value.
 * @throws Error when the document or any entry is malformed.
 */
export function parseLeaderboard(raw: unknown): LeaderboardEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error('leaderboard must be an array');
  }
  const items: unknown[] = raw;
  const entries: LeaderboardEntry[] = [];
  for (const item of items) {
    validateLeaderboardEntry(item);
    entries.push({
      name: item.name.trim(),
      ranking_data: { score: item.ranking_data.score, step: item.ranking_data.step }
    });
  }
  return sortLeaderboard(entries);
}
