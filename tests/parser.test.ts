/**
 * Notation parser tests
 */

import { describe, it, expect } from 'vitest';
import { parse, declarations, DeclarationCursor } from '../src/notation/parser.js';
import { NotationError } from '../src/notation/errors.js';
import type { Module, SymbolDef } from '../src/symbols/module.js';
import { notationError } from './helpers.js';

function symbolOf(module: Module, name: string): SymbolDef {
  const entry = module.get(name);
  if (entry?.def.kind !== 'symbol') throw new Error(`${name} is not a symbol`);
  return entry.def.symbol;
}

function shape(symbol: SymbolDef): Array<[string, string, string | null]> {
  return symbol.variants().map(v => [v.modifiers.toString(), v.value, v.deprecation]);
}

describe('parse', () => {
  it('should produce a single symbol for a bare value', () => {
    const module = parse('wj \\u{2060}');
    expect(symbolOf(module, 'wj').data).toEqual({ kind: 'single', value: '\u2060' });
  });

  it('should put the default value first among the variants', () => {
    const module = parse('name v\n  .mod v2\n  .other v3\n');
    const symbol = symbolOf(module, 'name');
    expect(symbol.data.kind).toBe('multi');
    expect(shape(symbol)).toEqual([
      ['', 'v', null],
      ['mod', 'v2', null],
      ['other', 'v3', null],
    ]);
  });

  it('should allow symbols with variants and no default', () => {
    const symbol = symbolOf(parse('bar\n  .v |\n  .h ―'), 'bar');
    expect(shape(symbol)).toEqual([
      ['v', '|', null],
      ['h', '―', null],
    ]);
  });

  it('should sort names in byte order', () => {
    expect(parse('b 1\na 2\nC 3').names()).toEqual(['C', 'a', 'b']);
  });

  it('should parse nested modules with deprecations', () => {
    const module = parse('@deprecated: use b\na {\n  x 1\n  inner {\n    y 2\n  }\n}\nb 3');
    const entry = module.get('a');
    expect(entry?.deprecation).toBe('use b');
    if (entry?.def.kind !== 'module') throw new Error('a is not a module');
    expect(entry.def.module.names()).toEqual(['inner', 'x']);
    expect(module.get('b')?.deprecation).toBeNull();
  });

  it('should attach symbol deprecations to the binding', () => {
    const module = parse('@deprecated: use `dot.c` instead\nmiddot ·');
    expect(module.get('middot')?.deprecation).toBe('use `dot.c` instead');
  });

  it('should attach scoped deprecations to the matching variant', () => {
    const module = parse('@deprecated(not.r): gone\narrow\n  .r →\n  .r.not ↛');
    expect(shape(symbolOf(module, 'arrow'))).toEqual([
      ['r', '→', null],
      ['r.not', '↛', 'gone'],
    ]);
    expect(module.get('arrow')?.deprecation).toBeNull();
  });

  it('should deprecate variants with optional modifiers', () => {
    const marked = parse('@deprecated(filled?): old\nsquare ■\n  .filled? ■\n  .stroked □');
    expect(shape(symbolOf(marked, 'square'))).toEqual([
      ['', '■', null],
      ['filled?', '■', 'old'],
      ['stroked', '□', null],
    ]);

    const bare = parse('@deprecated(small.filled): old\nsquare ■\n  .filled?.small ▪');
    expect(shape(symbolOf(bare, 'square'))).toEqual([
      ['', '■', null],
      ['filled?.small', '▪', 'old'],
    ]);
  });

  it('should prefer the variant with the exact optional markers', () => {
    const module = parse('@deprecated(a?): old\nx\n  .a 1\n  .a? 2');
    expect(shape(symbolOf(module, 'x'))).toEqual([
      ['a', '1', null],
      ['a?', '2', 'old'],
    ]);
  });

  it('should ignore comments and blank lines', () => {
    const module = parse('// header\n\nx 1 // trailing\n  // between\n  .a 2\n');
    expect(shape(symbolOf(module, 'x'))).toEqual([
      ['', '1', null],
      ['a', '2', null],
    ]);
  });

  it('should handle CRLF line endings', () => {
    expect(shape(symbolOf(parse('x 1\r\n  .a 2\r\n'), 'x'))).toEqual([
      ['', '1', null],
      ['a', '2', null],
    ]);
  });
});

describe('parse errors', () => {
  it('should report an unmatched closing brace with its line', () => {
    const error = notationError(() => parse('a 1\n  .b 2\n}'));
    expect(error.kind).toBe('UnexpectedDeclaration');
    expect(error.line).toBe(3);
    expect(error.message).toBe('<input>:3: unmatched `}`');
  });

  it('should report an unclosed module', () => {
    const error = notationError(() => parse('m {\n  a 1\n', 'test.txt'));
    expect(error.kind).toBe('UnexpectedDeclaration');
    expect(error.message).toBe('test.txt:2: unclosed module, expected `}`');
  });

  it('should reject a variant with no symbol', () => {
    const error = notationError(() => parse('.a 1'));
    expect(error.kind).toBe('UnexpectedDeclaration');
    expect(error.line).toBe(1);
  });

  it('should reject a variant after a module', () => {
    expect(notationError(() => parse('m {\n}\n  .a 1')).kind).toBe('UnexpectedDeclaration');
  });

  it('should reject a symbol with neither value nor variants', () => {
    const error = notationError(() => parse('a 1\nb\n'));
    expect(error.kind).toBe('MissingValue');
    expect(error.line).toBe(2);
  });

  it('should reject a deprecation at the end of the file at its own line', () => {
    const error = notationError(() => parse('a 1\n@deprecated: old\n\n'));
    expect(error.kind).toBe('DanglingDeprecation');
    expect(error.line).toBe(2);
  });

  it('should reject a deprecation before a closing brace', () => {
    const error = notationError(() => parse('m {\n@deprecated: old\n}'));
    expect(error.kind).toBe('DanglingDeprecation');
    expect(error.line).toBe(3);
  });

  it('should reject a deprecation before a variant', () => {
    const error = notationError(() => parse('x 1\n@deprecated: old\n  .r 2'));
    expect(error.kind).toBe('DanglingDeprecation');
    expect(error.line).toBe(3);
  });

  it('should reject a scoped deprecation that matches no variant', () => {
    const withVariants = notationError(() => parse('@deprecated(q): a\nx 1\n  .r 2'));
    expect(withVariants.kind).toBe('DanglingDeprecation');
    expect(withVariants.line).toBe(2);

    expect(notationError(() => parse('@deprecated(q): a\nx 1')).kind).toBe('DanglingDeprecation');
  });

  it('should reject two deprecations for one declaration', () => {
    const error = notationError(() => parse('@deprecated: a\n@deprecated: b\nx 1'));
    expect(error.kind).toBe('DuplicateDeprecation');
    expect(error.line).toBe(3);

    expect(notationError(() => parse('@deprecated(r): a\n@deprecated(r): b\nx\n  .r 1')).kind).toBe(
      'DuplicateDeprecation'
    );
  });

  it('should reject scoped deprecations on modules and aliases', () => {
    const error = notationError(() => parse('@deprecated(r): a\nm {\n}'));
    expect(error.kind).toBe('MalformedModifierAnnotation');
    expect(error.line).toBe(2);

    expect(notationError(() => parse('x 1\n@deprecated(r): a\ny @= x')).kind).toBe('MalformedModifierAnnotation');
  });

  it('should reject duplicate names in one scope', () => {
    const error = notationError(() => parse('a 1\na 2'));
    expect(error.kind).toBe('DuplicateDefinition');
    expect(error.line).toBe(2);
  });

  it('should allow the same name in different scopes', () => {
    expect(parse('a 1\nm {\n  a 2\n}').names()).toEqual(['a', 'm']);
  });

  it('should locate lexer errors', () => {
    const error = notationError(() => parse('a 1\nb \\u{zz}', 'sym.txt'));
    expect(error.kind).toBe('InvalidCodepoint');
    expect(error.file).toBe('sym.txt');
    expect(error.line).toBe(2);
  });
});

describe('declarations', () => {
  it('should fold deprecations into the next declaration', () => {
    const result = declarations('@deprecated: old\nx 1\n  .a 2\n\nm {\n}');
    expect(result.map(d => [d.kind, d.line])).toEqual([
      ['symbol', 2],
      ['variant', 3],
      ['moduleStart', 5],
      ['moduleEnd', 6],
    ]);
    const [first] = result;
    expect(first.kind === 'symbol' && first.deprecation).toBe('old');
  });
});

describe('DeclarationCursor', () => {
  it('should peek without advancing', () => {
    const cursor = new DeclarationCursor(declarations('a 1\nb 2'));
    expect(cursor.peek()?.line).toBe(1);
    expect(cursor.next()?.line).toBe(1);
    expect(cursor.peek()?.line).toBe(2);
    expect(cursor.next()?.line).toBe(2);
    expect(cursor.next()).toBeUndefined();
    expect(cursor.lastLine).toBe(2);
  });
});

describe('NotationError', () => {
  it('should keep the first location it is given', () => {
    const error = new NotationError('MissingValue', 'missing', 'a.txt', 3).at('b.txt', 5);
    expect(error.message).toBe('a.txt:3: missing');
  });

  it('should format located messages', () => {
    const error = new NotationError('MissingValue', 'missing').at('b.txt', 5);
    expect(error.message).toBe('b.txt:5: missing');
    expect(error.reason).toBe('missing');
  });
});
