/**
 * Path lookup over a module tree: `sym.arrow.r.double`
 */

import { ModifierSet } from './modifiers.js';
import type { Module, SymbolDef, Variant } from './module.js';

export type LookupResult =
  | {
      kind: 'symbol';
      path: string;
      value: string;
      codepoints: string[];
      deprecation: string | null;
    }
  | { kind: 'module'; path: string; names: string[]; deprecation: string | null };

/**
 * Render each scalar value as U+XXXX
 */
export function formatCodepoints(value: string): string[] {
  return Array.from(value, ch => {
    const code = ch.codePointAt(0) ?? 0;
    return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
  });
}

function splitPath(path: string): string[] {
  return path === '' ? [] : path.split('.');
}

/**
 * Walk the tree to a module or symbol; at the first symbol the remaining
 * segments are its modifiers. Misses return undefined.
 */
export function lookup(root: Module, path: string): LookupResult | undefined {
  const segments = splitPath(path);
  if (segments.includes('')) return undefined;
  let scope = root;
  let deprecation: string | null = null;

  for (let i = 0; i < segments.length; i++) {
    const entry = scope.get(segments[i]);
    if (!entry) return undefined;
    deprecation ??= entry.deprecation;

    if (entry.def.kind === 'module') {
      scope = entry.def.module;
      continue;
    }

    const symbol = entry.def.symbol;
    const modifiers = ModifierSet.tryParse(segments.slice(i + 1).join('.'));
    if (!modifiers) return undefined;
    const resolved = modifiers.isEmpty() ? symbol.defaultValue() : symbol.get(modifiers);
    if (!resolved) return undefined;

    return {
      kind: 'symbol',
      path,
      value: resolved.value,
      codepoints: formatCodepoints(resolved.value),
      deprecation: deprecation ?? resolved.deprecation,
    };
  }

  return { kind: 'module', path, names: scope.names(), deprecation };
}

/**
 * Find the symbol bound at a dotted name path (no modifiers)
 */
export function findSymbol(root: Module, path: string): { symbol: SymbolDef; deprecation: string | null } | undefined {
  const segments = splitPath(path);
  let scope = root;

  for (let i = 0; i < segments.length; i++) {
    const entry = scope.get(segments[i]);
    if (!entry) return undefined;
    if (entry.def.kind === 'symbol') {
      return i === segments.length - 1 ? { symbol: entry.def.symbol, deprecation: entry.deprecation } : undefined;
    }
    scope = entry.def.module;
  }
  return undefined;
}

/**
 * Find the module bound at a dotted name path; `''` is the root itself
 */
export function findModule(root: Module, path: string): Module | undefined {
  let scope = root;
  for (const segment of splitPath(path)) {
    const entry = scope.get(segment);
    if (!entry || entry.def.kind !== 'module') return undefined;
    scope = entry.def.module;
  }
  return scope;
}

export function variantPath(name: string, variant: Variant): string {
  return variant.modifiers.isEmpty() ? name : `${name}.${variant.modifiers}`;
}
