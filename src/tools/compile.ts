/**
 * symbol_compile - Compile notation source and report what it defines
 */

import { compile, summarize, isNotationError, type CompileSummary } from '../notation/index.js';
import { checkConformance, type Ambiguity } from '../symbols/conformance.js';
import type { CompileInput } from '../types.js';

export interface CompileResult {
  success: boolean;
  summary?: CompileSummary;
  names?: string[];
  ambiguities?: Ambiguity[];
  error?: {
    kind: string;
    message: string;
    line?: number;
  };
}

/**
 * Compile ad-hoc notation, e.g. while authoring a corpus
 */
export function compileSource(input: CompileInput): CompileResult {
  try {
    const module = compile(input.source, input.file ?? '<input>');
    const report = checkConformance(module);

    return {
      success: true,
      summary: summarize(module),
      names: module.names(),
      ambiguities: report.ambiguities.length > 0 ? report.ambiguities : undefined,
    };
  } catch (error) {
    if (!isNotationError(error)) throw error;
    return {
      success: false,
      error: { kind: error.kind, message: error.message, line: error.line },
    };
  }
}

/**
 * Tool definition for MCP
 */
export const compileToolDef = {
  name: 'symbol_compile',
  description: 'Compile symbol notation source. Returns a summary and any ambiguous variants, or the first error with its line.',
  inputSchema: {
    type: 'object',
    properties: {
      source: {
        type: 'string',
        description: 'Notation source text',
      },
      file: {
        type: 'string',
        description: 'File name used in error messages. Default: <input>',
      },
    },
    required: ['source'],
  },
};
