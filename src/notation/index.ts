/**
 * Notation Module
 *
 * Line-oriented notation for named Unicode symbols: lexer, parser, alias
 * resolution and escape decoding.
 */

export * from './errors.js';
export * from './escapes.js';
export * from './lexer.js';
export * from './parser.js';
export * from './alias.js';
export * from './compiler.js';
