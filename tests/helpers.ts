/**
 * Shared test helpers
 */

import { afterEach, beforeEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { clearConfigCache } from '../src/config/index.js';
import { resetRoot } from '../src/corpus/index.js';
import { NotationError } from '../src/notation/errors.js';

const ENV_KEYS = ['GLYPHBOOK_HOME', 'GLYPHBOOK_SYMBOLS', 'GLYPHBOOK_EMOJI', 'GLYPHBOOK_TABLE'] as const;

/**
 * Run the compiler and return the NotationError it throws
 */
export function notationError(fn: () => unknown): NotationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof NotationError) return error;
    throw error;
  }
  throw new Error('expected a NotationError');
}

/**
 * Point GLYPHBOOK_HOME at a fresh directory for every test in the file
 */
export function useTempHome(): { dir: () => string } {
  let home = '';
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'glyphbook-test-'));
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    process.env.GLYPHBOOK_HOME = home;
    clearConfigCache();
    resetRoot();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    clearConfigCache();
    resetRoot();
    rmSync(home, { recursive: true, force: true });
  });

  return { dir: () => home };
}
