/**
 * Corpora and the process-wide ROOT module
 *
 * ROOT aggregates each corpus under its name (`emoji`, `sym`). It is built on
 * first access, from the compiled table when it is present and no corpus file
 * is overridden, otherwise by compiling the corpus files.
 */

import { existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { getConfig, getDefaultTablePath } from '../config/index.js';
import { SCHEMA_VERSION, getSchemaVersion, loadTree, openTableDb } from '../db/index.js';
import { compileFile } from '../notation/index.js';
import { Module, binding } from '../symbols/module.js';
import type { CorpusName, GlyphbookConfig } from '../types.js';
import { CORPORA } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/corpus and dist/corpus both sit two levels below the package root
export const DATA_DIR = join(__dirname, '..', '..', 'data');

export type RootSource = 'table' | 'source';

let root: { module: Module; source: RootSource } | null = null;

/**
 * Path of a corpus file, honouring configured overrides
 */
export function corpusPath(name: CorpusName): string {
  const config = getConfig();
  const override = name === 'sym' ? config.symbols_path : config.emoji_path;
  return override ?? join(DATA_DIR, `${name}.txt`);
}

export function tablePath(): string {
  return getConfig().table_path ?? getDefaultTablePath();
}

/**
 * Compile one corpus from its file
 */
export function compileCorpus(name: CorpusName, path: string = corpusPath(name)): Module {
  return compileFile(path);
}

/**
 * Compile every corpus and aggregate them under their names
 */
export function compileRoot(): Module {
  return new Module(
    CORPORA.map(name => [name, binding({ kind: 'module', module: compileCorpus(name) })] as const)
  );
}

/**
 * Corpus files moved by config or environment
 */
function hasCorpusOverride(config: GlyphbookConfig): boolean {
  return config.symbols_path !== undefined || config.emoji_path !== undefined;
}

function readTable(path: string): Module {
  const db = openTableDb(path, { readonly: true });
  try {
    const version = getSchemaVersion(db);
    if (version !== SCHEMA_VERSION) {
      throw new Error(`schema version ${version}, expected ${SCHEMA_VERSION}`);
    }
    return loadTree(db);
  } finally {
    db.close();
  }
}

function buildRoot(): { module: Module; source: RootSource } {
  const config = getConfig();
  const table = tablePath();

  if (config.prefer_table && !hasCorpusOverride(config) && existsSync(table)) {
    try {
      return { module: readTable(table), source: 'table' };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Compiled table ${table} is unusable (${reason}), compiling corpora instead`);
    }
  }

  return { module: compileRoot(), source: 'source' };
}

/**
 * The root module, built once per process
 */
export function getRoot(): Module {
  root ??= buildRoot();
  return root.module;
}

/**
 * Where the current root came from, or null before the first getRoot()
 */
export function getRootSource(): RootSource | null {
  return root?.source ?? null;
}

/**
 * Drop the cached root; the next getRoot() rebuilds it
 */
export function resetRoot(): void {
  root = null;
}
