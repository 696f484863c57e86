/**
 * symbol_list - List the bindings of a module
 */

import type { Module } from '../symbols/module.js';
import { findModule } from '../symbols/lookup.js';
import type { ListInput } from '../types.js';

export interface ListResult {
  success: boolean;
  module: string;
  entries: Array<{
    name: string;
    kind: 'symbol' | 'module';
    value?: string;
    variants?: number;
    deprecation?: string;
  }>;
  error?: string;
}

export function listModule(root: Module, input: ListInput): ListResult {
  const path = input.module ?? '';
  const module = findModule(root, path);

  if (!module) {
    return { success: false, module: path, entries: [], error: `No such module: ${path}` };
  }

  const entries: ListResult['entries'] = [];
  for (const [name, entry] of module) {
    const deprecation = entry.deprecation ?? undefined;
    if (entry.def.kind === 'module') {
      entries.push({ name, kind: 'module', deprecation });
      continue;
    }
    const symbol = entry.def.symbol;
    entries.push({
      name,
      kind: 'symbol',
      value: symbol.defaultValue().value,
      variants: symbol.variants().length,
      deprecation,
    });
  }

  return { success: true, module: path, entries };
}

/**
 * Tool definition for MCP
 */
export const listToolDef = {
  name: 'symbol_list',
  description: 'List the symbols and modules bound in a module. Without a module, lists the corpora.',
  inputSchema: {
    type: 'object',
    properties: {
      module: {
        type: 'string',
        description: 'Dotted module path, e.g. "sym" or "emoji.face". Default: the root',
      },
    },
  },
};
