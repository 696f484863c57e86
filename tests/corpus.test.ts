/**
 * Bundled corpora and ROOT tests
 */

import { describe, it, expect, vi } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { compileCorpus, compileRoot, corpusPath, getRoot, getRootSource, resetRoot, tablePath, DATA_DIR } from '../src/corpus/index.js';
import { clearConfigCache, updateConfig } from '../src/config/index.js';
import { openTableDb, saveTree } from '../src/db/index.js';
import { summarize } from '../src/notation/compiler.js';
import { checkConformance, findUnsorted } from '../src/symbols/conformance.js';
import { lookup } from '../src/symbols/lookup.js';
import { useTempHome } from './helpers.js';

const home = useTempHome();

describe('bundled corpora', () => {
  it('should compile both corpora under the root', () => {
    expect(compileRoot().names()).toEqual(['emoji', 'sym']);
  });

  it('should have sorted modules and no ambiguous variants', () => {
    expect(checkConformance(compileRoot())).toEqual({ ok: true, unsorted: [], ambiguities: [] });
  });

  it('should count the emoji corpus', () => {
    expect(summarize(compileCorpus('emoji'))).toEqual({ modules: 3, symbols: 24, variants: 57, deprecated: 1 });
  });

  it('should sort uppercase names before lowercase ones', () => {
    const greek = lookup(compileRoot(), 'sym.greek');
    expect(greek?.kind === 'module' && greek.names.slice(0, 8)).toEqual([
      'Alpha',
      'Delta',
      'Gamma',
      'Omega',
      'Phi',
      'Pi',
      'Theta',
      'alpha',
    ]);
    expect(findUnsorted(compileRoot())).toEqual([]);
  });

  it('should resolve symbols across both corpora', () => {
    const root = compileRoot();
    expect(lookup(root, 'sym.arrow.l.double')).toMatchObject({ value: '⇐' });
    expect(lookup(root, 'sym.arrow.double.l')).toMatchObject({ value: '⇐' });
    expect(lookup(root, 'sym.square')).toMatchObject({ value: '■' });
    expect(lookup(root, 'sym.square.filled')).toMatchObject({ value: '■' });
    expect(lookup(root, 'sym.square.small')).toMatchObject({ value: '▪' });
    expect(lookup(root, 'sym.square.stroked.small')).toMatchObject({ value: '▫' });
    expect(lookup(root, 'sym.models.not')).toMatchObject({ value: '⊧\u0338' });
    expect(lookup(root, 'sym.greek.Alpha')).toMatchObject({ codepoints: ['U+0391'] });
    expect(lookup(root, 'emoji.smile')).toMatchObject({ value: '😁' });
    expect(lookup(root, 'emoji.heart')).toMatchObject({ codepoints: ['U+2764', 'U+FE0F'] });
    expect(lookup(root, 'emoji.flag.rainbow')).toMatchObject({
      codepoints: ['U+1F3F3', 'U+FE0F', 'U+200D', 'U+1F308'],
    });
  });

  it('should resolve aliases in the sym corpus', () => {
    const root = compileRoot();
    expect(lookup(root, 'sym.rarrow')).toMatchObject({ value: '→' });
    expect(lookup(root, 'sym.rarrow.long.squiggly')).toMatchObject({ value: '⟿' });
    expect(lookup(root, 'sym.larrow.r')).toMatchObject({ value: '↔' });
    expect(lookup(root, 'sym.iff')).toMatchObject({ value: '⇔' });
    expect(lookup(root, 'sym.implies')).toMatchObject({ value: '⟹' });
  });

  it('should report deprecations from the corpora', () => {
    const root = compileRoot();
    expect(lookup(root, 'sym.arrow.r.not')).toMatchObject({
      value: '↛',
      deprecation: 'use `arrow.r.slash` instead',
    });
    expect(lookup(root, 'sym.middot')).toMatchObject({ deprecation: 'use `dot.c` instead' });
    expect(lookup(root, 'sym.letters.mu')).toMatchObject({ value: 'μ', deprecation: 'use `greek` instead' });
    expect(lookup(root, 'emoji.grinning')).toMatchObject({ deprecation: 'use `face.grin` instead' });
  });
});

describe('corpus paths', () => {
  it('should default to the bundled data files', () => {
    expect(corpusPath('sym')).toBe(join(DATA_DIR, 'sym.txt'));
    expect(tablePath()).toBe(join(home.dir(), 'table.db'));
  });

  it('should honour environment overrides', () => {
    const file = join(home.dir(), 'mine.txt');
    writeFileSync(file, 'x 1\n', 'utf-8');
    process.env.GLYPHBOOK_SYMBOLS = file;
    clearConfigCache();

    expect(corpusPath('sym')).toBe(file);
    expect(lookup(compileRoot(), 'sym')).toMatchObject({ kind: 'module', names: ['x'] });
  });
});

describe('getRoot', () => {
  it('should compile from source when there is no table', () => {
    expect(getRootSource()).toBeNull();
    expect(getRoot().names()).toEqual(['emoji', 'sym']);
    expect(getRootSource()).toBe('source');
  });

  it('should build the root once', () => {
    expect(getRoot()).toBe(getRoot());
  });

  it('should load the compiled table when present', () => {
    const db = openTableDb(tablePath());
    saveTree(db, compileRoot());
    db.close();

    resetRoot();
    const root = getRoot();
    expect(getRootSource()).toBe('table');
    expect(lookup(root, 'sym.arrow.r.not')).toMatchObject({
      value: '↛',
      deprecation: 'use `arrow.r.slash` instead',
    });
    expect(lookup(root, 'emoji.hand.raised.splayed')).toMatchObject({ codepoints: ['U+1F590', 'U+FE0F'] });
  });

  it('should compile from source when a corpus file is overridden', () => {
    const db = openTableDb(tablePath());
    saveTree(db, compileRoot());
    db.close();

    const file = join(home.dir(), 'mine.txt');
    writeFileSync(file, 'x 1\n', 'utf-8');
    process.env.GLYPHBOOK_SYMBOLS = file;
    clearConfigCache();
    resetRoot();

    expect(lookup(getRoot(), 'sym')).toMatchObject({ kind: 'module', names: ['x'] });
    expect(getRootSource()).toBe('source');
  });

  it('should fall back to the corpora when the table cannot be read', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      writeFileSync(tablePath(), '');
      resetRoot();

      expect(getRoot().names()).toEqual(['emoji', 'sym']);
      expect(getRootSource()).toBe('source');
      expect(errors).toHaveBeenCalledWith(
        `Compiled table ${tablePath()} is unusable (schema version 0, expected 2), compiling corpora instead`
      );
    } finally {
      errors.mockRestore();
    }
  });

    it('should compile from source when the table is not preferred', () => {
    const db = openTableDb(tablePath());
    saveTree(db, compileRoot());
    db.close();

    updateConfig({ prefer_table: false });
    resetRoot();
    getRoot();
    expect(getRootSource()).toBe('source');
  });
});
