/**
 * SQLite Database Connection
 */

import Database from 'better-sqlite3'
import { randomUUID } from 'crypto'
import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import { SCHEMA } from './schema.js'
import { logger } from '../utils/logger.js'
import { DatabaseError } from '../utils/errors.js'

const IN_MEMORY = ':memory:'

/**
 * Initialize database connection and create schema
 */
export function initDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const dir = dirname(dbPath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
      logger.info({ dir }, 'Created database directory')
    }
  }

  try {
    const db = new Database(dbPath)

    // WAL is meaningless for in-memory databases
    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL')
    }

    db.pragma('foreign_keys = ON')

    db.exec(SCHEMA)

    logger.info({ dbPath }, 'Database initialized')

    return db
  } catch (error) {
    throw new DatabaseError(
      `Failed to initialize database: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    )
  }
}

/**
 * Close database connection
 */
export function closeDatabase(db: Database.Database): void {
  try {
    db.close()
    logger.info('Database connection closed')
  } catch (error) {
    logger.error({ error }, 'Error closing database')
  }
}

/**
 * Generate a UUID v4
 */
export function generateId(): string {
  return randomUUID()
}

/**
 * Run a function in a write transaction.
 *
 * Uses BEGIN IMMEDIATE so the write lock is taken before the first read;
 * nested calls become savepoints of the outer transaction.
 */
export function withTransaction<T>(
  db: Database.Database,
  fn: () => T
): T {
  const transaction = db.transaction(fn)
  return db.inTransaction ? transaction() : transaction.immediate()
}
