/**
 * SQLite Schema Definition
 *
 * Timestamps are epoch milliseconds so engine operations can run against an
 * injected clock.
 */

export const SCHEMA = `
-- Players
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  nickname TEXT UNIQUE NOT NULL,
  token TEXT UNIQUE,
  balance REAL NOT NULL DEFAULT 0 CHECK (balance >= 0),
  last_claim_at INTEGER,
  cases_opened INTEGER NOT NULL DEFAULT 0,
  cases_won INTEGER NOT NULL DEFAULT 0,
  daily_cases INTEGER NOT NULL DEFAULT 0,
  daily_reset TEXT NOT NULL,
  upgrades INTEGER NOT NULL DEFAULT 0,
  upgrade_wins INTEGER NOT NULL DEFAULT 0,
  max_balance REAL NOT NULL DEFAULT 0,
  best_drop_id TEXT,
  best_upgrade_id TEXT,
  created_at INTEGER NOT NULL
);

-- Owned item instances (snapshot of the catalog entry at grant time)
CREATE TABLE IF NOT EXISTS inventory (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id),
  item_id TEXT NOT NULL,
  name TEXT NOT NULL,
  rarity TEXT NOT NULL,
  price REAL NOT NULL,
  stattrak INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'owned'
    CHECK (status IN ('owned', 'sold', 'upgraded', 'failed')),
  source TEXT NOT NULL CHECK (source IN ('case', 'upgrade', 'giveaway')),
  case_id TEXT,
  acquired_at INTEGER NOT NULL,
  closed_at INTEGER
);

-- Ledger (audit log of every balance change)
CREATE TABLE IF NOT EXISTS transactions (
  id TEXT PRIMARY KEY,
  timestamp INTEGER NOT NULL,
  type TEXT NOT NULL,
  user_id TEXT NOT NULL REFERENCES users(id),
  amount REAL NOT NULL,
  balance_after REAL NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}'
);

-- Timed giveaways
CREATE TABLE IF NOT EXISTS giveaways (
  id TEXT PRIMARY KEY,
  entry_price REAL NOT NULL,
  reward_item_id TEXT NOT NULL,
  start_at INTEGER NOT NULL UNIQUE,
  resolved INTEGER NOT NULL DEFAULT 0,
  winner_id TEXT REFERENCES users(id),
  reward_entry_id TEXT,
  resolved_at INTEGER,
  cancelled_at INTEGER,    -- set when closed without a draw
  created_at INTEGER NOT NULL
);

-- One row per paid entry; the primary key rejects a second join
CREATE TABLE IF NOT EXISTS giveaway_entries (
  giveaway_id TEXT NOT NULL REFERENCES giveaways(id),
  user_id TEXT NOT NULL REFERENCES users(id),
  entry_price REAL NOT NULL,
  joined_at INTEGER NOT NULL,
  PRIMARY KEY (giveaway_id, user_id)
);

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_inventory_user ON inventory(user_id, status, acquired_at DESC);
CREATE INDEX IF NOT EXISTS idx_transactions_user ON transactions(user_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_transactions_type ON transactions(type, timestamp);
CREATE INDEX IF NOT EXISTS idx_giveaways_pending ON giveaways(resolved, start_at);
CREATE INDEX IF NOT EXISTS idx_giveaway_entries_user ON giveaway_entries(user_id, joined_at DESC);
`
