/**
 * Symbols Module
 */

export * from './modifiers.js';
export * from './module.js';
export * from './lookup.js';
export * from './conformance.js';
