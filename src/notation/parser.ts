/**
 * Notation Parser - recursive descent over declarations
 *
 * Lines are lexed and folded into declarations first: deprecation annotations
 * are attached to the declaration that follows them. The parser then builds
 * one module scope at a time, recursing into nested modules.
 */

import { ModifierSet } from '../symbols/modifiers.js';
import { Module, SymbolDef, binding, type Binding, type Variant } from '../symbols/module.js';
import { NotationError } from './errors.js';
import { tokenize, type Line } from './lexer.js';
import { resolveAliases, type AliasDeclaration } from './alias.js';

export interface ScopedDeprecation {
  modifiers: ModifierSet;
  message: string;
}

export type Declaration =
  | { kind: 'moduleStart'; line: number; name: string; deprecation: string | null }
  | { kind: 'moduleEnd'; line: number }
  | {
      kind: 'symbol';
      line: number;
      name: string;
      value: string | null;
      deprecation: string | null;
      variantDeprecations: ScopedDeprecation[];
    }
  | { kind: 'variant'; line: number; modifiers: ModifierSet; value: string }
  | (AliasDeclaration & { kind: 'alias' });

type PendingDeprecation = Extract<Line, { kind: 'deprecated' }>;

function locate(error: unknown, file: string, line: number): unknown {
  return error instanceof NotationError ? error.at(file, line) : error;
}

function unscoped(pending: PendingDeprecation[], what: string): string | null {
  if (pending.some(d => d.modifiers !== null)) {
    throw new NotationError('MalformedModifierAnnotation', `wrong deprecation format for ${what}`);
  }
  if (pending.length > 1) {
    throw new NotationError('DuplicateDeprecation', `duplicate deprecation for ${what}`);
  }
  return pending[0]?.message ?? null;
}

function forSymbol(pending: PendingDeprecation[]): [string | null, ScopedDeprecation[]] {
  let deprecation: string | null = null;
  const scoped: ScopedDeprecation[] = [];

  for (const d of pending) {
    if (d.modifiers === null) {
      if (deprecation !== null) {
        throw new NotationError('DuplicateDeprecation', 'duplicate deprecation for symbol');
      }
      deprecation = d.message;
      continue;
    }
    const modifiers = d.modifiers;
    if (scoped.some(s => s.modifiers.equals(modifiers))) {
      throw new NotationError('DuplicateDeprecation', `duplicate deprecation for modifier ${modifiers}`);
    }
    scoped.push({ modifiers, message: d.message });
  }

  return [deprecation, scoped];
}

/**
 * Lex every line and fold deprecation annotations into the declarations
 */
export function declarations(source: string, file = '<input>'): Declaration[] {
  const result: Declaration[] = [];
  let pending: PendingDeprecation[] = [];
  let pendingLine = 0;
  const lines = source.split(/\r?\n/);

  const dangling = (): NotationError =>
    new NotationError('DanglingDeprecation', 'dangling `@deprecated:`');

  lines.forEach((text, index) => {
    const line = index + 1;
    try {
      const lexed = tokenize(text);
      switch (lexed.kind) {
        case 'blank':
          break;
        case 'deprecated':
          pending.push(lexed);
          pendingLine = line;
          break;
        case 'moduleStart':
          result.push({ kind: 'moduleStart', line, name: lexed.name, deprecation: unscoped(pending, 'module') });
          pending = [];
          break;
        case 'moduleEnd':
          if (pending.length > 0) throw dangling();
          result.push({ kind: 'moduleEnd', line });
          break;
        case 'symbol': {
          const [deprecation, variantDeprecations] = forSymbol(pending);
          result.push({ kind: 'symbol', line, name: lexed.name, value: lexed.value, deprecation, variantDeprecations });
          pending = [];
          break;
        }
        case 'variant':
          if (pending.length > 0) throw dangling();
          result.push({ kind: 'variant', line, modifiers: lexed.modifiers, value: lexed.value });
          break;
        case 'alias':
          result.push({
            kind: 'alias',
            line,
            name: lexed.name,
            target: lexed.target,
            path: lexed.path,
            deep: lexed.deep,
            deprecation: unscoped(pending, 'alias'),
          });
          pending = [];
          break;
      }
    } catch (error) {
      throw locate(error, file, line);
    }
  });

  if (pending.length > 0) {
    throw dangling().at(file, pendingLine);
  }

  return result;
}

/**
 * Peekable cursor over the declaration list
 */
export class DeclarationCursor {
  private index = 0;

  constructor(private readonly items: readonly Declaration[]) {}

  peek(): Declaration | undefined {
    return this.items[this.index];
  }

  next(): Declaration | undefined {
    return this.items[this.index++];
  }

  get lastLine(): number {
    return this.items[this.items.length - 1]?.line ?? 0;
  }
}

function buildSymbol(cursor: DeclarationCursor, decl: Extract<Declaration, { kind: 'symbol' }>): SymbolDef {
  const variants: Variant[] = [];
  let next = cursor.peek();
  while (next?.kind === 'variant') {
    variants.push({ modifiers: next.modifiers, value: next.value, deprecation: null });
    cursor.next();
    next = cursor.peek();
  }

  if (variants.length === 0) {
    if (decl.value === null) {
      throw new NotationError('MissingValue', `symbol ${decl.name} needs a value or variants`);
    }
    if (decl.variantDeprecations.length > 0) {
      throw new NotationError('DanglingDeprecation', `symbol ${decl.name} has no variants to deprecate`);
    }
    return SymbolDef.single(decl.value);
  }

  if (decl.value !== null) {
    variants.unshift({ modifiers: ModifierSet.EMPTY, value: decl.value, deprecation: null });
  }

  for (const scoped of decl.variantDeprecations) {
    // An exact match first, then one that differs only in optional markers
    let index = variants.findIndex(v => v.modifiers.equals(scoped.modifiers));
    if (index === -1) index = variants.findIndex(v => v.modifiers.sameNames(scoped.modifiers));
    if (index === -1) {
      throw new NotationError(
        'DanglingDeprecation',
        `no variant ${decl.name}.${scoped.modifiers} for \`@deprecated(${scoped.modifiers}):\``
      );
    }
    variants[index] = { ...variants[index], deprecation: scoped.message };
  }

  return SymbolDef.multi(variants);
}

/**
 * Parse one scope up to its closing `}` (nested) or the end of input (top level)
 */
export function parseScope(cursor: DeclarationCursor, file = '<input>', nested = false): Module {
  const direct = new Map<string, Binding>();
  const aliases: AliasDeclaration[] = [];
  const seen = new Set<string>();

  const claim = (name: string): void => {
    if (seen.has(name)) {
      throw new NotationError('DuplicateDefinition', `duplicate definition: ${name}`);
    }
    seen.add(name);
  };

  for (;;) {
    const decl = cursor.next();
    if (decl === undefined) {
      if (nested) {
        throw new NotationError('UnexpectedDeclaration', 'unclosed module, expected `}`', file, cursor.lastLine);
      }
      break;
    }

    try {
      if (decl.kind === 'moduleEnd') {
        if (!nested) {
          throw new NotationError('UnexpectedDeclaration', 'unmatched `}`');
        }
        break;
      }

      switch (decl.kind) {
        case 'symbol':
          claim(decl.name);
          direct.set(decl.name, binding({ kind: 'symbol', symbol: buildSymbol(cursor, decl) }, decl.deprecation));
          break;
        case 'moduleStart': {
          claim(decl.name);
          const module = parseScope(cursor, file, true);
          direct.set(decl.name, binding({ kind: 'module', module }, decl.deprecation));
          break;
        }
        case 'alias':
          claim(decl.name);
          aliases.push(decl);
          break;
        case 'variant':
          throw new NotationError('UnexpectedDeclaration', `variant .${decl.modifiers} without a symbol`);
      }
    } catch (error) {
      throw locate(error, file, decl.line);
    }
  }

  const resolved = resolveAliases(direct, aliases, file);
  return new Module([...direct, ...resolved]);
}

/**
 * Parse a whole source text into a module
 */
export function parse(source: string, file = '<input>'): Module {
  return parseScope(new DeclarationCursor(declarations(source, file)), file);
}
