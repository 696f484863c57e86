/**
 * Module tree - the frozen, name-sorted namespace produced by the compiler
 */

import { ModifierSet } from './modifiers.js';

export interface Variant {
  readonly modifiers: ModifierSet;
  readonly value: string;
  readonly deprecation: string | null;
}

export type SymbolData =
  | { readonly kind: 'single'; readonly value: string }
  | { readonly kind: 'multi'; readonly variants: readonly Variant[] };

export interface Resolved {
  value: string;
  deprecation: string | null;
}

/**
 * A symbol, either a single value or a list of variants keyed by modifiers.
 * A multi symbol defaults to the variant that matches the empty set best.
 */
export class SymbolDef {
  readonly data: SymbolData;

  private constructor(data: SymbolData) {
    this.data = Object.freeze(data);
  }

  static single(value: string): SymbolDef {
    return new SymbolDef({ kind: 'single', value });
  }

  static multi(variants: readonly Variant[]): SymbolDef {
    return new SymbolDef({
      kind: 'multi',
      variants: Object.freeze(variants.map(v => Object.freeze({ ...v }))),
    });
  }

  /**
   * Resolve the value for a set of requested modifiers
   */
  get(modifiers: ModifierSet = ModifierSet.EMPTY): Resolved | undefined {
    return modifiers.bestMatchIn<Resolved>(
      this.variants().map(v => [v.modifiers, { value: v.value, deprecation: v.deprecation }] as const)
    );
  }

  /**
   * The value shown for the bare name: the best match for the empty set, or
   * the first variant when every variant requires a modifier.
   */
  defaultValue(): Resolved {
    const resolved = this.get(ModifierSet.EMPTY);
    if (resolved) return resolved;
    const [first] = this.variants();
    return { value: first.value, deprecation: first.deprecation };
  }

  /**
   * All variants in declaration order. A single symbol has one, under the empty set.
   */
  variants(): Variant[] {
    if (this.data.kind === 'single') {
      return [{ modifiers: ModifierSet.EMPTY, value: this.data.value, deprecation: null }];
    }
    return [...this.data.variants];
  }

  /**
   * Every modifier name used by any variant, in first-seen order
   */
  modifierNames(): string[] {
    const names = new Set<string>();
    for (const variant of this.variants()) {
      for (const name of variant.modifiers.names()) names.add(name);
    }
    return [...names];
  }
}

export type Def =
  | { readonly kind: 'symbol'; readonly symbol: SymbolDef }
  | { readonly kind: 'module'; readonly module: Module };

export interface Binding {
  readonly def: Def;
  readonly deprecation: string | null;
}

export function binding(def: Def, deprecation: string | null = null): Binding {
  return Object.freeze({ def, deprecation });
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * An immutable mapping from names to bindings, sorted by name
 */
export class Module implements Iterable<[string, Binding]> {
  private readonly entries: ReadonlyArray<readonly [string, Binding]>;

  constructor(entries: Iterable<readonly [string, Binding]>) {
    const sorted = [...entries].sort(([a], [b]) => compareNames(a, b));
    this.entries = Object.freeze(sorted.map(entry => Object.freeze(entry)));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Binary search for a binding by exact name
   */
  get(name: string): Binding | undefined {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const [key, value] = this.entries[mid];
      const order = compareNames(key, name);
      if (order === 0) return value;
      if (order < 0) lo = mid + 1;
      else hi = mid;
    }
    return undefined;
  }

  *iter(): IterableIterator<[string, Binding]> {
    for (const [name, entry] of this.entries) {
      yield [name, entry];
    }
  }

  [Symbol.iterator](): Iterator<[string, Binding]> {
    return this.iter();
  }

  names(): string[] {
    return this.entries.map(([name]) => name);
  }
}
