/**
 * symbol_variants - List every variant of a symbol
 */

import type { Module } from '../symbols/module.js';
import { findSymbol, formatCodepoints, variantPath } from '../symbols/lookup.js';
import type { VariantsInput } from '../types.js';

export interface VariantsResult {
  success: boolean;
  path: string;
  deprecation?: string;
  variants: Array<{
    path: string;
    modifiers: string;
    value: string;
    codepoints: string[];
    deprecation?: string;
  }>;
  error?: string;
}

export function listVariants(root: Module, input: VariantsInput): VariantsResult {
  const found = findSymbol(root, input.path);

  if (!found) {
    return { success: false, path: input.path, variants: [], error: `No such symbol: ${input.path}` };
  }

  return {
    success: true,
    path: input.path,
    deprecation: found.deprecation ?? undefined,
    variants: found.symbol.variants().map(variant => ({
      path: variantPath(input.path, variant),
      modifiers: variant.modifiers.toString(),
      value: variant.value,
      codepoints: formatCodepoints(variant.value),
      deprecation: variant.deprecation ?? undefined,
    })),
  };
}

/**
 * Tool definition for MCP
 */
export const variantsToolDef = {
  name: 'symbol_variants',
  description: 'List every variant of a symbol with its modifiers and value.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Dotted path of the symbol without modifiers. Example: sym.arrow',
      },
    },
    required: ['path'],
  },
};
