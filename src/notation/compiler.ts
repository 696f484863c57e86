/**
 * Notation Compiler - source text to a frozen module tree
 */

import { readFileSync } from 'fs';
import { Module } from '../symbols/module.js';
import { parse } from './parser.js';

export interface CompileSummary {
  modules: number;
  symbols: number;
  variants: number;
  deprecated: number;
}

/**
 * Compile notation source. Throws a located NotationError on the first problem.
 */
export function compile(source: string, file = '<input>'): Module {
  return parse(source, file);
}

/**
 * Read and compile a notation file
 */
export function compileFile(path: string): Module {
  return compile(readFileSync(path, 'utf-8'), path);
}

/**
 * Count what a compiled tree contains, nested modules included
 */
export function summarize(module: Module): CompileSummary {
  const summary: CompileSummary = { modules: 0, symbols: 0, variants: 0, deprecated: 0 };

  const visit = (scope: Module): void => {
    for (const [, entry] of scope) {
      if (entry.deprecation !== null) summary.deprecated++;
      if (entry.def.kind === 'module') {
        summary.modules++;
        visit(entry.def.module);
        continue;
      }
      const variants = entry.def.symbol.variants();
      summary.symbols++;
      summary.variants += variants.length;
      summary.deprecated += variants.filter(v => v.deprecation !== null).length;
    }
  };

  visit(module);
  return summary;
}
