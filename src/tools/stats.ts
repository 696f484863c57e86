/**
 * symbol_stats - Counts per corpus and where ROOT was loaded from
 */

import type { Module } from '../symbols/module.js';
import { summarize, type CompileSummary } from '../notation/index.js';
import { getRootSource, tablePath } from '../corpus/index.js';

export interface StatsResult {
  success: boolean;
  stats: {
    corpora: Record<string, CompileSummary>;
    total: CompileSummary;
    source: string;
    table: string;
  };
}

export function stats(root: Module): StatsResult {
  const corpora: Record<string, CompileSummary> = {};
  for (const [name, entry] of root) {
    if (entry.def.kind === 'module') {
      corpora[name] = summarize(entry.def.module);
    }
  }

  return {
    success: true,
    stats: {
      corpora,
      total: summarize(root),
      source: getRootSource() ?? 'not loaded',
      table: tablePath(),
    },
  };
}

/**
 * Tool definition for MCP
 */
export const statsToolDef = {
  name: 'symbol_stats',
  description: 'Get counts of modules, symbols, variants and deprecations per corpus.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};
