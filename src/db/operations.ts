/**
 * Compiled table operations - store and restore a frozen module tree
 */

import type Database from 'better-sqlite3';
import { ModifierSet } from '../symbols/modifiers.js';
import { Module, SymbolDef, binding, type Binding, type Variant } from '../symbols/module.js';
import type { TableStats } from '../types.js';

interface ModuleRow {
  id: number;
  parent_id: number | null;
  name: string;
  deprecation: string | null;
}

interface SymbolRow {
  id: number;
  module_id: number;
  name: string;
  kind: 'single' | 'multi';
  deprecation: string | null;
}

interface VariantRow {
  symbol_id: number;
  modifiers: string;
  value: string;
  deprecation: string | null;
}

/**
 * Replace the stored table with a module tree
 */
export function saveTree(db: Database.Database, root: Module): void {
  const insertModule = db.prepare<[number | null, string, string | null]>(
    'INSERT INTO modules (parent_id, name, deprecation) VALUES (?, ?, ?)'
  );
  const insertSymbol = db.prepare<[number, string, string, string | null]>(
    'INSERT INTO symbols (module_id, name, kind, deprecation) VALUES (?, ?, ?, ?)'
  );
  const insertVariant = db.prepare<[number, number, string, string, string | null]>(
    'INSERT INTO variants (symbol_id, position, modifiers, value, deprecation) VALUES (?, ?, ?, ?, ?)'
  );
  const setMeta = db.prepare<[string, string]>(
    'INSERT OR REPLACE INTO table_meta (key, value) VALUES (?, ?)'
  );

  const writeModule = (module: Module, parentId: number | null, name: string, deprecation: string | null): void => {
    const moduleId = Number(insertModule.run(parentId, name, deprecation).lastInsertRowid);

    for (const [childName, entry] of module) {
      if (entry.def.kind === 'module') {
        writeModule(entry.def.module, moduleId, childName, entry.deprecation);
        continue;
      }

      const symbol = entry.def.symbol;
      const symbolId = Number(
        insertSymbol.run(moduleId, childName, symbol.data.kind, entry.deprecation).lastInsertRowid
      );
      symbol.variants().forEach((variant, position) => {
        insertVariant.run(symbolId, position, variant.modifiers.toString(), variant.value, variant.deprecation);
      });
    }
  };

  const replace = db.transaction(() => {
    db.prepare('DELETE FROM variants').run();
    db.prepare('DELETE FROM symbols').run();
    db.prepare('DELETE FROM modules').run();
    writeModule(root, null, '', null);
    setMeta.run('built_at', String(Date.now()));
  });

  replace();
}

/**
 * Rebuild the frozen module tree from the stored table
 */
export function loadTree(db: Database.Database): Module {
  const modules = db.prepare<[], ModuleRow>('SELECT id, parent_id, name, deprecation FROM modules ORDER BY id').all();
  const symbols = db.prepare<[], SymbolRow>('SELECT id, module_id, name, kind, deprecation FROM symbols ORDER BY id').all();
  const variants = db
    .prepare<[], VariantRow>('SELECT symbol_id, modifiers, value, deprecation FROM variants ORDER BY symbol_id, position')
    .all();

  const root = modules.find(m => m.parent_id === null);
  if (!root) {
    throw new Error('Compiled table is empty. Run: glyphbook build');
  }

  const variantsBySymbol = new Map<number, Variant[]>();
  for (const row of variants) {
    const list = variantsBySymbol.get(row.symbol_id) ?? [];
    list.push({ modifiers: ModifierSet.fromRawDotted(row.modifiers), value: row.value, deprecation: row.deprecation });
    variantsBySymbol.set(row.symbol_id, list);
  }

  const build = (moduleId: number): Module => {
    const entries: Array<[string, Binding]> = [];

    for (const child of modules.filter(m => m.parent_id === moduleId)) {
      entries.push([child.name, binding({ kind: 'module', module: build(child.id) }, child.deprecation)]);
    }

    for (const row of symbols.filter(s => s.module_id === moduleId)) {
      const list = variantsBySymbol.get(row.id) ?? [];
      if (list.length === 0) {
        throw new Error(`Compiled table is corrupt: symbol ${row.name} has no variants`);
      }
      const symbol = row.kind === 'single' ? SymbolDef.single(list[0].value) : SymbolDef.multi(list);
      entries.push([row.name, binding({ kind: 'symbol', symbol }, row.deprecation)]);
    }

    return new Module(entries);
  };

  return build(root.id);
}

/**
 * Counts and build time of the stored table
 */
export function getTableStats(db: Database.Database): TableStats {
  const count = (table: 'modules' | 'symbols' | 'variants'): number =>
    db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

  const builtAt = db.prepare<[], { value: string }>("SELECT value FROM table_meta WHERE key = 'built_at'").get();

  return {
    // The root row is not a module of the tree
    modules: Math.max(0, count('modules') - 1),
    symbols: count('symbols'),
    variants: count('variants'),
    builtAt: builtAt ? Number(builtAt.value) : null,
  };
}
