/**
 * Leaderboard
 * Players ranked by balance plus the value of everything they still own
 */

import type { Database } from 'better-sqlite3'

export interface LeaderboardEntry {
  rank: number
  userId: string
  nickname: string
  total: number
}

export const DEFAULT_LEADERBOARD_LIMIT = 10
export const MAX_LEADERBOARD_LIMIT = 100

export function getTopPlayers(db: Database, limit: number = DEFAULT_LEADERBOARD_LIMIT): LeaderboardEntry[] {
  const rows = db.prepare(`
    SELECT
      u.id,
      u.nickname,
      u.balance + COALESCE(SUM(i.price), 0) AS total
    FROM users u
    LEFT JOIN inventory i ON i.user_id = u.id AND i.status = 'owned'
    GROUP BY u.id
    ORDER BY total DESC, u.created_at ASC
    LIMIT ?
  `).all(limit) as Array<{ id: string; nickname: string; total: number }>

  return rows.map((row, index) => ({
    rank: index + 1,
    userId: row.id,
    nickname: row.nickname,
    total: row.total,
  }))
}
