/**
 * Configuration Management
 *
 * Handles corpus locations and the compiled table.
 * Config is stored in ~/.glyphbook/config.json (GLYPHBOOK_HOME moves it).
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { ConfigKey, GlyphbookConfig } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

// In-memory config cache
let currentConfig: GlyphbookConfig | null = null;

/**
 * Directory holding config.json and the default compiled table
 */
export function getHomeDir(): string {
  return process.env.GLYPHBOOK_HOME || join(homedir(), '.glyphbook');
}

export function getConfigPath(): string {
  return join(getHomeDir(), 'config.json');
}

export function getDefaultTablePath(): string {
  return join(getHomeDir(), 'table.db');
}

export function ensureHomeDir(): void {
  const dir = getHomeDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function readConfigFile(path: string): Partial<GlyphbookConfig> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) return {};

  const result: Partial<GlyphbookConfig> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (key === 'prefer_table' && typeof value === 'boolean') {
      result.prefer_table = value;
    } else if ((key === 'symbols_path' || key === 'emoji_path' || key === 'table_path') && typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): GlyphbookConfig {
  if (currentConfig) {
    return currentConfig;
  }

  let config: GlyphbookConfig = { ...DEFAULT_CONFIG };

  // Try to load from file
  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    try {
      config = { ...config, ...readConfigFile(configPath) };
    } catch (error) {
      console.error('Failed to load config file:', error);
    }
  }

  // Override with environment variables
  if (process.env.GLYPHBOOK_SYMBOLS) {
    config.symbols_path = process.env.GLYPHBOOK_SYMBOLS;
  }
  if (process.env.GLYPHBOOK_EMOJI) {
    config.emoji_path = process.env.GLYPHBOOK_EMOJI;
  }
  if (process.env.GLYPHBOOK_TABLE) {
    config.table_path = process.env.GLYPHBOOK_TABLE;
  }

  currentConfig = config;
  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: GlyphbookConfig): void {
  ensureHomeDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
  currentConfig = config;
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<GlyphbookConfig>): GlyphbookConfig {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Get current config (cached)
 */
export function getConfig(): GlyphbookConfig {
  return loadConfig();
}

/**
 * Forget the cached config so the next read goes back to disk
 */
export function clearConfigCache(): void {
  currentConfig = null;
}

/**
 * Reset config to defaults
 */
export function resetConfig(): GlyphbookConfig {
  currentConfig = null;
  const config = { ...DEFAULT_CONFIG };
  saveConfig(config);
  return config;
}

/**
 * Parse a CLI-style `key value` pair into a config update
 */
export function parseConfigValue(key: string, value: string): Partial<GlyphbookConfig> {
  switch (key) {
    case 'symbols_path':
      return { symbols_path: value };
    case 'emoji_path':
      return { emoji_path: value };
    case 'table_path':
      return { table_path: value };
    case 'prefer_table':
      if (value !== 'true' && value !== 'false') {
        throw new Error('prefer_table must be true or false');
      }
      return { prefer_table: value === 'true' };
    default:
      throw new Error(`Unknown config key: ${key}. Expected one of: ${CONFIG_KEYS.join(', ')}`);
  }
}

export const CONFIG_KEYS: readonly ConfigKey[] = ['symbols_path', 'emoji_path', 'table_path', 'prefer_table'];

/**
 * Get config for display
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    symbols_path: config.symbols_path ?? '(bundled)',
    emoji_path: config.emoji_path ?? '(bundled)',
    table_path: config.table_path ?? getDefaultTablePath(),
    prefer_table: config.prefer_table,
    config_path: getConfigPath(),
  };
}

/**
 * Validate config and return any issues
 */
export function validateConfig(): { valid: boolean; issues: string[] } {
  const config = loadConfig();
  const issues: string[] = [];

  for (const key of ['symbols_path', 'emoji_path'] as const) {
    const path = config[key];
    if (path && !existsSync(path)) {
      issues.push(`${key} does not exist: ${path}`);
    }
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
