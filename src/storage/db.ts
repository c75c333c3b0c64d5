/**
 * SQLite connection for analytics and feedback.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, toRuntimeConfig } from '../config/loader.js';
import { resolvePath } from '../config/app-config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

const SCHEMA_PATH = fileURLToPath(new URL('../../data/schema.sql', import.meta.url));

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

/**
 * Set a custom database instance (for testing).
 *
 * When set, `getDb()` will return this instance instead of creating a new one.
 * Use `resetDb()` to clear the custom instance.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   const testDb = new Database(':memory:');
 *   applySchema(testDb);
 *   setDb(testDb);
 * });
 *
 * afterEach(() => {
 *   resetDb();
 * });
 * ```
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Clear any custom database and close the singleton connection.
 */
export function resetDb(): void {
  customDb = null;
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Initialize and return the database connection.
 *
 * Returns (in priority order):
 * 1. Custom database set via `setDb()` (for testing)
 * 2. Existing singleton connection
 * 3. New connection to `dbPath`, or the configured path
 */
export function getDb(dbPath?: string): Database.Database {
  if (customDb) {
    return customDb;
  }

  if (db) {
    return db;
  }

  const resolvedPath = resolvePath(dbPath ?? toRuntimeConfig(loadConfig()).dbPath);

  const dir = dirname(resolvedPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  applySchema(db);
  log.debug('Database opened', { path: resolvedPath });

  return db;
}

/**
 * Close the database connection.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Create tables and indexes if they do not exist.
 */
export function applySchema(database: Database.Database): void {
  const schema = readFileSync(SCHEMA_PATH, 'utf-8');

  // Split by statement (semicolons at line ends), dropping comment lines
  const statements = schema
    .split(/;\s*\n/)
    .map((s) =>
      s
        .split('\n')
        .filter((line) => !line.trim().startsWith('--'))
        .join('\n')
        .trim(),
    )
    .filter((s) => s.length > 0);

  for (const statement of statements) {
    database.exec(statement);
  }
}
