/**
 * symbol_config - Configure corpus and table locations
 */

import type { ConfigInput, GlyphbookConfig } from '../types.js';
import { getConfigForDisplay, updateConfig, validateConfig } from '../config/index.js';
import { resetRoot } from '../corpus/index.js';

export interface ConfigResult {
  success: boolean;
  config?: Record<string, unknown>;
  message: string;
  warnings?: string[];
}

/**
 * Show or update settings
 */
export function config(input: ConfigInput): ConfigResult {
  const updates: Partial<GlyphbookConfig> = {};
  if (input.symbols_path !== undefined) updates.symbols_path = input.symbols_path;
  if (input.emoji_path !== undefined) updates.emoji_path = input.emoji_path;
  if (input.table_path !== undefined) updates.table_path = input.table_path;
  if (input.prefer_table !== undefined) updates.prefer_table = input.prefer_table;

  const validation = validateConfig();

  // Show current config
  if (input.show || Object.keys(updates).length === 0) {
    return {
      success: true,
      config: getConfigForDisplay(),
      message: 'Current configuration:',
      warnings: validation.issues.length > 0 ? validation.issues : undefined,
    };
  }

  updateConfig(updates);
  // Corpus locations changed, rebuild ROOT on next access
  resetRoot();

  const after = validateConfig();
  return {
    success: true,
    config: getConfigForDisplay(),
    message: `Updated ${Object.keys(updates).join(', ')}.`,
    warnings: after.issues.length > 0 ? after.issues : undefined,
  };
}

/**
 * Tool definition for MCP
 */
export const configToolDef = {
  name: 'symbol_config',
  description: 'Show or change where corpora and the compiled table are read from.',
  inputSchema: {
    type: 'object',
    properties: {
      show: {
        type: 'boolean',
        description: 'Show current configuration',
      },
      symbols_path: {
        type: 'string',
        description: 'Notation file used for the sym corpus',
      },
      emoji_path: {
        type: 'string',
        description: 'Notation file used for the emoji corpus',
      },
      table_path: {
        type: 'string',
        description: 'Compiled SQLite table to load the tree from',
      },
      prefer_table: {
        type: 'boolean',
        description: 'Load from the compiled table when it exists',
      },
    },
  },
};
