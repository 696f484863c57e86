/**
 * Conformance checks for compiled trees
 */

import { ModifierSet } from './modifiers.js';
import { compareNames, type Module, type SymbolDef } from './module.js';

export interface Ambiguity {
  path: string;
  request: string;
  variants: string[];
}

export interface ConformanceReport {
  ok: boolean;
  unsorted: string[];
  ambiguities: Ambiguity[];
}

function join(prefix: string, name: string): string {
  return prefix === '' ? name : `${prefix}.${name}`;
}

/**
 * Paths of every module whose names are not strictly increasing
 */
export function findUnsorted(module: Module, prefix = ''): string[] {
  const result: string[] = [];
  const names = module.names();
  if (names.some((name, i) => i > 0 && compareNames(names[i - 1], name) >= 0)) {
    result.push(prefix);
  }
  for (const [name, entry] of module) {
    if (entry.def.kind === 'module') {
      result.push(...findUnsorted(entry.def.module, join(prefix, name)));
    }
  }
  return result;
}

function* subsets(names: readonly string[], max: number, start = 0, current: string[] = []): Generator<string[]> {
  yield current;
  if (current.length === max) return;
  for (let i = start; i < names.length; i++) {
    yield* subsets(names, max, i + 1, [...current, names[i]]);
  }
}

/**
 * Requests for which two variants of a symbol tie for the best match
 */
export function symbolAmbiguities(path: string, symbol: SymbolDef): Ambiguity[] {
  const variants = symbol.variants();
  if (variants.length < 2) return [];

  const k = Math.max(...variants.map(v => v.modifiers.size));
  const result: Ambiguity[] = [];

  for (const names of subsets(symbol.modifierNames(), k)) {
    const request = ModifierSet.fromRawParts(names);
    const eligible = variants
      .filter(v => v.modifiers.requiredIsSubset(request) && request.isSubset(v.modifiers))
      .map(v => ({
        variant: v,
        common: v.modifiers.names().filter(n => request.contains(n)).length,
        total: v.modifiers.size,
      }));
    if (eligible.length < 2) continue;

    const bestCommon = Math.max(...eligible.map(e => e.common));
    const top = eligible.filter(e => e.common === bestCommon);
    const bestTotal = Math.min(...top.map(e => e.total));
    const tied = top.filter(e => e.total === bestTotal);
    if (tied.length > 1) {
      result.push({ path, request: request.toString(), variants: tied.map(e => e.variant.modifiers.toString()) });
    }
  }

  return result;
}

/**
 * Every ambiguous request of every symbol in the tree
 */
export function findAmbiguities(module: Module, prefix = ''): Ambiguity[] {
  const result: Ambiguity[] = [];
  for (const [name, entry] of module) {
    const path = join(prefix, name);
    if (entry.def.kind === 'module') {
      result.push(...findAmbiguities(entry.def.module, path));
    } else {
      result.push(...symbolAmbiguities(path, entry.def.symbol));
    }
  }
  return result;
}

export function checkConformance(module: Module): ConformanceReport {
  const unsorted = findUnsorted(module);
  const ambiguities = findAmbiguities(module);
  return { ok: unsorted.length === 0 && ambiguities.length === 0, unsorted, ambiguities };
}
