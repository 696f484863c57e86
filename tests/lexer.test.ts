/**
 * Notation lexer tests
 */

import { describe, it, expect } from 'vitest';
import { tokenize, validateIdent } from '../src/notation/lexer.js';
import { notationError } from './helpers.js';

describe('tokenize', () => {
  it('should treat empty and comment lines as blank', () => {
    expect(tokenize('')).toEqual({ kind: 'blank' });
    expect(tokenize('   // a comment')).toEqual({ kind: 'blank' });
  });

  it('should lex symbols with and without a value', () => {
    expect(tokenize('arrow')).toEqual({ kind: 'symbol', name: 'arrow', value: null });
    expect(tokenize('space \\u{20}')).toEqual({ kind: 'symbol', name: 'space', value: ' ' });
    expect(tokenize('eq = // equals')).toEqual({ kind: 'symbol', name: 'eq', value: '=' });
  });

  it('should lex variants', () => {
    const line = tokenize('  .r.double ⇒');
    expect(line.kind).toBe('variant');
    if (line.kind !== 'variant') return;
    expect(line.modifiers.toString()).toBe('r.double');
    expect(line.value).toBe('⇒');
  });

  it('should keep optional markers on variant modifiers', () => {
    const line = tokenize('.filled?.small ▪');
    expect(line.kind === 'variant' && line.modifiers.toString()).toBe('filled?.small');
  });

  it('should lex module boundaries', () => {
    expect(tokenize('greek {')).toEqual({ kind: 'moduleStart', name: 'greek' });
    expect(tokenize('}')).toEqual({ kind: 'moduleEnd' });
  });

  it('should lex aliases', () => {
    expect(tokenize('larrow @= arrow.l.*')).toEqual({
      kind: 'alias',
      name: 'larrow',
      target: 'arrow',
      path: ['l'],
      deep: true,
    });
    expect(tokenize('iff @= arrow.l.r.double')).toEqual({
      kind: 'alias',
      name: 'iff',
      target: 'arrow',
      path: ['l', 'r', 'double'],
      deep: false,
    });
    expect(tokenize('x@=y')).toEqual({ kind: 'alias', name: 'x', target: 'y', path: [], deep: false });
  });

  it('should lex deprecations', () => {
    expect(tokenize('@deprecated: use `dot.c` instead')).toEqual({
      kind: 'deprecated',
      modifiers: null,
      message: 'use `dot.c` instead',
    });

    const scoped = tokenize('@deprecated(l.not): use `arrow.l.slash`');
    expect(scoped.kind === 'deprecated' && scoped.modifiers?.toString()).toBe('l.not');
  });

  it('should accept optional markers in deprecation modifiers', () => {
    const scoped = tokenize('@deprecated(filled?.small): use `square.stroked`');
    expect(scoped.kind === 'deprecated' && scoped.modifiers?.toString()).toBe('filled?.small');
  });

  it('should reject deprecations without a message', () => {
    expect(notationError(() => tokenize('@deprecated:')).kind).toBe('MissingDeprecationMessage');
  });

  it('should reject malformed deprecation modifiers', () => {
    expect(notationError(() => tokenize('@deprecated(): x')).kind).toBe('MalformedModifierAnnotation');
    expect(notationError(() => tokenize('@deprecated(l..not): x')).kind).toBe('MalformedModifierAnnotation');
    expect(notationError(() => tokenize('@deprecated[l]: x')).kind).toBe('MalformedModifierAnnotation');
  });

  it('should reject variants without a value', () => {
    expect(notationError(() => tokenize('.r')).kind).toBe('MissingValue');
  });

  it('should reject invalid identifiers', () => {
    expect(notationError(() => tokenize('arr0w →')).kind).toBe('InvalidIdentifier');
    expect(notationError(() => tokenize('größe x')).kind).toBe('InvalidIdentifier');
    expect(notationError(() => tokenize('.r.r x')).kind).toBe('InvalidIdentifier');
    expect(notationError(() => tokenize('x @= y.2')).kind).toBe('InvalidIdentifier');
  });
});

describe('validateIdent', () => {
  it('should accept ASCII letters in either case', () => {
    expect(validateIdent('Alpha')).toBe('Alpha');
  });

  it('should reject anything else', () => {
    expect(notationError(() => validateIdent('snake_case')).message).toBe('invalid identifier: "snake_case"');
  });
});
