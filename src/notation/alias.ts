/**
 * Alias resolution
 *
 * `name @= target.path` re-derives a symbol from the variants of a sibling.
 * A variant is taken when the alias path covers its modifiers: the path is
 * removed and what is left becomes the variant's modifiers in the alias. A
 * plain alias only takes the variant the path names exactly; a deep alias
 * (`target.path.*`) also takes every variant with modifiers beyond the path.
 */

import { ModifierSet } from '../symbols/modifiers.js';
import { SymbolDef, binding, type Binding, type Variant } from '../symbols/module.js';
import { NotationError } from './errors.js';

export interface AliasDeclaration {
  line: number;
  name: string;
  target: string;
  path: string[];
  deep: boolean;
  deprecation: string | null;
}

/**
 * Strip the alias path from a variant's modifiers.
 * Returns the leftover modifiers, or null when the path is not covered.
 */
export function stripAliasPath(modifiers: ModifierSet, path: readonly string[]): ModifierSet | null {
  if (path.length === 0) return modifiers;

  const dotted = modifiers.toString();
  const prefix = path.join('.');
  if (dotted === prefix) return ModifierSet.EMPTY;
  if (dotted.startsWith(prefix + '.')) {
    return ModifierSet.fromRawDotted(dotted.slice(prefix.length + 1));
  }

  // Declared in a different order: consume path components wherever they occur
  const remaining = [...path];
  let leftover = ModifierSet.EMPTY;
  for (const modifier of modifiers) {
    const index = remaining.indexOf(modifier.name);
    if (index === -1) {
      leftover = leftover.insertRaw(modifier.optional ? `${modifier.name}?` : modifier.name);
    } else {
      remaining.splice(index, 1);
    }
  }
  return remaining.length === 0 ? leftover : null;
}

function resolveOne(alias: AliasDeclaration, target: Binding): Binding {
  const shown = [alias.target, ...alias.path].join('.');

  if (target.def.kind !== 'symbol') {
    throw new NotationError('AliasToNonexistentSymbol', `alias to nonexistent symbol: ${alias.target} is a module`);
  }

  const data = target.def.symbol.data;
  if (data.kind === 'single') {
    if (alias.path.length > 0) {
      throw new NotationError('AliasToNonexistentVariant', `alias to nonexistent variant: ${shown}`);
    }
    return binding({ kind: 'symbol', symbol: SymbolDef.single(data.value) }, alias.deprecation);
  }

  const variants: Variant[] = [];
  for (const variant of data.variants) {
    const leftover = stripAliasPath(variant.modifiers, alias.path);
    if (leftover === null || (!leftover.isEmpty() && !alias.deep)) continue;
    if (variants.some(v => v.modifiers.equals(leftover))) continue;
    variants.push({ modifiers: leftover, value: variant.value, deprecation: variant.deprecation });
  }

  if (variants.length === 0) {
    throw new NotationError('AliasToNonexistentVariant', `alias to nonexistent variant: ${shown}`);
  }

  if (variants.length === 1 && variants[0].modifiers.isEmpty()) {
    const [only] = variants;
    return binding({ kind: 'symbol', symbol: SymbolDef.single(only.value) }, alias.deprecation ?? only.deprecation);
  }

  return binding({ kind: 'symbol', symbol: SymbolDef.multi(variants) }, alias.deprecation);
}

/**
 * Resolve the aliases of one scope against its direct bindings
 */
export function resolveAliases(
  direct: ReadonlyMap<string, Binding>,
  aliases: readonly AliasDeclaration[],
  file = '<input>'
): Array<[string, Binding]> {
  const names = new Set(aliases.map(a => a.name));

  return aliases.map(alias => {
    try {
      if (names.has(alias.target)) {
        throw new NotationError('AliasToAlias', `alias to alias: ${alias.name} @= ${alias.target}`);
      }
      const target = direct.get(alias.target);
      if (!target) {
        throw new NotationError('AliasToNonexistentSymbol', `alias to nonexistent symbol: ${alias.target}`);
      }
      return [alias.name, resolveOne(alias, target)];
    } catch (error) {
      throw error instanceof NotationError ? error.at(file, alias.line) : error;
    }
  });
}
