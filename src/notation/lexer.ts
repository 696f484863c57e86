/**
 * Notation Lexer - classifies a single source line
 *
 *   name {                          module start
 *   }                               module end
 *   name [value]                    symbol with optional default value
 *   .mod[.mod...] value             variant of the preceding symbol
 *   name @= target[.mod...][.*]     alias, `.*` makes it deep
 *   @deprecated: message            annotates the next declaration
 *   @deprecated(mod[.mod]): message annotates one variant of the next symbol
 */

import { ModifierSet } from '../symbols/modifiers.js';
import { NotationError } from './errors.js';
import { decodeValue } from './escapes.js';

export type Line =
  | { kind: 'blank' }
  | { kind: 'deprecated'; modifiers: ModifierSet | null; message: string }
  | { kind: 'moduleStart'; name: string }
  | { kind: 'moduleEnd' }
  | { kind: 'symbol'; name: string; value: string | null }
  | { kind: 'variant'; modifiers: ModifierSet; value: string }
  | { kind: 'alias'; name: string; target: string; path: string[]; deep: boolean };

const IDENT = /^[A-Za-z]+$/;
const MODIFIER = /^[A-Za-z]+\??$/;
const DEPRECATED = '@deprecated';
const ALIAS = '@=';
const DEEP = '.*';

/**
 * Identifiers are strictly ASCII letters
 */
export function validateIdent(text: string): string {
  if (!IDENT.test(text)) {
    throw new NotationError('InvalidIdentifier', `invalid identifier: ${JSON.stringify(text)}`);
  }
  return text;
}

function parseModifierPath(path: string): ModifierSet {
  let set = ModifierSet.EMPTY;
  for (const part of path.split('.')) {
    if (!MODIFIER.test(part)) {
      throw new NotationError('InvalidIdentifier', `invalid identifier: ${JSON.stringify(part)}`);
    }
    try {
      set = set.insertRaw(part);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new NotationError('InvalidIdentifier', `duplicate modifier ${JSON.stringify(part)} in .${path}`);
      }
      throw error;
    }
  }
  return set;
}

function stripComment(line: string): string {
  const comment = line.indexOf('//');
  return comment === -1 ? line : line.slice(0, comment);
}

function tokenizeDeprecation(head: string, tail: string | null): Line {
  const inner = head.slice(DEPRECATED.length, -1);

  let modifiers: ModifierSet | null = null;
  if (inner !== '') {
    if (!inner.startsWith('(') || !inner.endsWith(')') || inner.length < 3) {
      throw new NotationError('MalformedModifierAnnotation', `malformed modifier in deprecation: ${head}`);
    }
    const path = inner.slice(1, -1);
    const parsed = path.split('.').every(part => MODIFIER.test(part)) ? ModifierSet.tryParse(path) : null;
    if (!parsed) {
      throw new NotationError('MalformedModifierAnnotation', `malformed modifier in deprecation: ${head}`);
    }
    modifiers = parsed;
  }

  if (tail === null) {
    throw new NotationError('MissingDeprecationMessage', 'missing deprecation message');
  }
  return { kind: 'deprecated', modifiers, message: tail };
}

function tokenizeAlias(line: string): Line {
  const marker = line.indexOf(ALIAS);
  const name = validateIdent(line.slice(0, marker).trim());

  let target = line.slice(marker + ALIAS.length).trim();
  const deep = target.endsWith(DEEP);
  if (deep) target = target.slice(0, -DEEP.length);

  const [head, ...path] = target.split('.');
  validateIdent(head);
  path.forEach(validateIdent);

  return { kind: 'alias', name, target: head, path, deep };
}

/**
 * Classify one line of notation source
 */
export function tokenize(source: string): Line {
  const line = stripComment(source).trim();
  if (line === '') {
    return { kind: 'blank' };
  }

  const space = line.indexOf(' ');
  const head = space === -1 ? line : line.slice(0, space);
  const rest = space === -1 ? '' : line.slice(space + 1).trim();
  const tail = rest === '' ? null : rest;

  if (head.startsWith(DEPRECATED) && head.endsWith(':')) {
    return tokenizeDeprecation(head, tail);
  }

  if (tail === '{') {
    return { kind: 'moduleStart', name: validateIdent(head) };
  }

  if (head === '}' && tail === null) {
    return { kind: 'moduleEnd' };
  }

  if (head.startsWith('.')) {
    const modifiers = parseModifierPath(head.slice(1));
    if (tail === null) {
      throw new NotationError('MissingValue', `missing value for variant ${head}`);
    }
    return { kind: 'variant', modifiers, value: decodeValue(tail) };
  }

  if (head.includes(ALIAS) || tail?.startsWith(ALIAS)) {
    return tokenizeAlias(line);
  }

  return {
    kind: 'symbol',
    name: validateIdent(head),
    value: tail === null ? null : decodeValue(tail),
  };
}
