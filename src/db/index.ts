/**
 * Status database using node-sqlite3-wasm
 * Supports both file-based (production) and in-memory (testing) databases
 */
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { Database } from 'node-sqlite3-wasm'
import { initStatusSchema } from './schema'

export type StatusDatabase = Database

/** A row as the driver returns it, column name to value */
export type StatusRow = NonNullable<ReturnType<StatusDatabase['get']>>

export function openStatusDb(path: string): StatusDatabase {
  mkdirSync(dirname(path), { recursive: true })
  const db = new Database(path)
  initStatusSchema(db)
  return db
}

/**
 * Create an in-memory database for testing
 */
export function createTestDatabase(): StatusDatabase {
  const db = new Database(':memory:')
  initStatusSchema(db)
  return db
}
