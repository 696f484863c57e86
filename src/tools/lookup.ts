/**
 * symbol_lookup - Resolve a dotted path to a symbol value
 */

import type { Module } from '../symbols/module.js';
import { lookup } from '../symbols/lookup.js';
import type { LookupInput } from '../types.js';

export interface LookupResult {
  success: boolean;
  path: string;
  kind?: 'symbol' | 'module';
  value?: string;
  codepoints?: string[];
  names?: string[];
  deprecation?: string;
  error?: string;
}

/**
 * Look up a symbol (with modifiers) or a module
 */
export function lookupSymbol(root: Module, input: LookupInput): LookupResult {
  const found = lookup(root, input.path);

  if (!found) {
    return { success: false, path: input.path, error: `No such symbol: ${input.path}` };
  }

  const deprecation = found.deprecation ?? undefined;
  if (found.kind === 'module') {
    return { success: true, path: input.path, kind: 'module', names: found.names, deprecation };
  }

  return {
    success: true,
    path: input.path,
    kind: 'symbol',
    value: found.value,
    codepoints: found.codepoints,
    deprecation,
  };
}

/**
 * Tool definition for MCP
 */
export const lookupToolDef = {
  name: 'symbol_lookup',
  description: 'Resolve a dotted symbol path such as "sym.arrow.r.double" to its Unicode value. Segments after the symbol name are modifiers and may appear in any order.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Dotted path: corpus, modules, symbol name, then modifiers. Example: sym.arrow.l.double',
      },
    },
    required: ['path'],
  },
};
