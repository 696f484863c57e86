/**
 * SQLite Schema and Migrations for the compiled symbol table
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';

// Current schema version
export const SCHEMA_VERSION = 2;

/**
 * Schema version of an opened database; 0 when it has no schema yet
 */
export function getSchemaVersion(db: Database.Database): number {
  const table = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get();
  if (!table) return 0;
  return db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get()?.version ?? 0;
}

/**
 * Initialize database with schema
 */
export function initializeSchema(db: Database.Database): void {
  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  // Create schema version table
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    );
  `);

  const currentVersion = getSchemaVersion(db);

  if (currentVersion < SCHEMA_VERSION) {
    migrate(db, currentVersion, SCHEMA_VERSION);
  }
}

/**
 * Run migrations from one version to another
 */
function migrate(db: Database.Database, from: number, to: number): void {
  const migrations: Array<(db: Database.Database) => void> = [
    migrateV0toV1,
    migrateV1toV2,
  ];

  for (let v = from; v < to; v++) {
    migrations[v](db);
  }

  // Update schema version
  db.prepare('DELETE FROM schema_version').run();
  db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(to);
}

/**
 * Migration from v0 (fresh) to v1
 */
function migrateV0toV1(db: Database.Database): void {
  db.exec(`
    -- Module tree; the root module has no parent and an empty name
    CREATE TABLE IF NOT EXISTS modules (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      parent_id INTEGER REFERENCES modules(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      deprecation TEXT
    );

    -- Symbols bound in a module
    CREATE TABLE IF NOT EXISTS symbols (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      module_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      kind TEXT NOT NULL CHECK(kind IN ('single', 'multi')),
      deprecation TEXT,
      FOREIGN KEY (module_id) REFERENCES modules(id) ON DELETE CASCADE
    );

    -- Variants of a symbol in declaration order
    CREATE TABLE IF NOT EXISTS variants (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      symbol_id INTEGER NOT NULL,
      position INTEGER NOT NULL,
      modifiers TEXT NOT NULL,
      value TEXT NOT NULL,
      deprecation TEXT,
      FOREIGN KEY (symbol_id) REFERENCES symbols(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_modules_parent ON modules(parent_id);
    CREATE INDEX IF NOT EXISTS idx_symbols_module ON symbols(module_id);
    CREATE INDEX IF NOT EXISTS idx_variants_symbol ON variants(symbol_id, position);
  `);
}

/**
 * Migration from v1 to v2 - build metadata
 */
function migrateV1toV2(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS table_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

/**
 * Open (or create) a compiled table database
 */
export function openTableDb(path: string, options: { readonly?: boolean } = {}): Database.Database {
  if (path !== ':memory:' && !options.readonly) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  const db = new Database(path, { readonly: options.readonly ?? false });
  if (!options.readonly) {
    initializeSchema(db);
  }
  return db;
}
