// Corpus names under the root module
export type CorpusName = 'emoji' | 'sym';

export const CORPORA: readonly CorpusName[] = ['emoji', 'sym'];

// Configuration
export interface GlyphbookConfig {
  symbols_path?: string;     // Override for the bundled sym corpus
  emoji_path?: string;       // Override for the bundled emoji corpus
  table_path?: string;       // Compiled table (SQLite); used when it exists
  prefer_table: boolean;     // Load ROOT from the table instead of compiling
}

export const DEFAULT_CONFIG: GlyphbookConfig = {
  prefer_table: true,
};

export type ConfigKey = 'symbols_path' | 'emoji_path' | 'table_path' | 'prefer_table';

// Table statistics
export interface TableStats {
  modules: number;
  symbols: number;
  variants: number;
  builtAt: number | null;
}

// MCP Tool inputs
export interface LookupInput {
  path: string;
}

export interface VariantsInput {
  path: string;
}

export interface ListInput {
  module?: string;
}

export interface CompileInput {
  source: string;
  file?: string;
}

export interface ConfigInput {
  show?: boolean;
  symbols_path?: string;
  emoji_path?: string;
  table_path?: string;
  prefer_table?: boolean;
}
