#!/usr/bin/env node
/**
 * Glyphbook CLI
 *
 * Compile and check notation corpora, build the compiled table, and look up
 * symbols from the command line.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getConfigForDisplay, updateConfig, parseConfigValue, validateConfig } from './config/index.js';
import { compileRoot, getRoot, resetRoot, tablePath } from './corpus/index.js';
import { openTableDb, saveTree, getTableStats } from './db/index.js';
import { compileFile, summarize, isNotationError } from './notation/index.js';
import { checkConformance } from './symbols/conformance.js';
import { lookupSymbol, listModule, listVariants } from './tools/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package info
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
);

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

function error(message: string): void {
  log(`✗ ${message}`, 'red');
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}Glyphbook${colors.reset} v${packageJson.version}
Named access to Unicode symbols

${colors.cyan}Usage:${colors.reset}
  glyphbook <command> [options]

${colors.cyan}Commands:${colors.reset}
  lookup <path>     Resolve a symbol path, e.g. sym.arrow.r.double
  variants <path>   List every variant of a symbol
  list [module]     List the bindings of a module
  compile <file>    Compile a notation file and report what it defines
  check             Check the corpora for ordering and ambiguous variants
  build             Compile the corpora into the SQLite table
  config            Manage configuration
  version           Show version
  help              Show this help

${colors.cyan}Build Options:${colors.reset}
  --out <db>        Write the table here instead of the configured path

${colors.cyan}Config Options:${colors.reset}
  --show                Show current configuration
  --set <key> <value>   Set symbols_path, emoji_path, table_path or prefer_table

${colors.cyan}Examples:${colors.reset}
  glyphbook lookup sym.arrow.l.double
  glyphbook variants sym.arrow
  glyphbook list sym
  glyphbook compile ./my-symbols.txt
  glyphbook build --out ./table.db
  glyphbook config --set prefer_table false
`);
}

/**
 * Resolve and print one symbol
 */
function lookup(args: string[]): boolean {
  const path = args[0];
  if (!path) {
    error('Missing symbol path');
    return false;
  }

  const result = lookupSymbol(getRoot(), { path });
  if (!result.success) {
    error(result.error ?? `No such symbol: ${path}`);
    return false;
  }

  if (result.kind === 'module') {
    log(`${path} is a module: ${result.names?.join(', ')}`, 'cyan');
  } else {
    log(`${result.value}  ${result.codepoints?.join(' ')}`, 'bright');
  }
  if (result.deprecation) {
    warn(`Deprecated: ${result.deprecation}`);
  }
  return true;
}

function variants(args: string[]): boolean {
  const path = args[0];
  if (!path) {
    error('Missing symbol path');
    return false;
  }

  const result = listVariants(getRoot(), { path });
  if (!result.success) {
    error(result.error ?? `No such symbol: ${path}`);
    return false;
  }

  for (const variant of result.variants) {
    const note = variant.deprecation ? `  (deprecated: ${variant.deprecation})` : '';
    log(`  ${variant.path.padEnd(32)} ${variant.value}  ${variant.codepoints.join(' ')}${note}`);
  }
  return true;
}

function list(args: string[]): boolean {
  const result = listModule(getRoot(), { module: args[0] });
  if (!result.success) {
    error(result.error ?? `No such module: ${args[0]}`);
    return false;
  }

  for (const entry of result.entries) {
    const shown = entry.kind === 'module'
      ? `${colors.cyan}module${colors.reset}`
      : `${entry.value}  (${entry.variants} variant${entry.variants === 1 ? '' : 's'})`;
    const note = entry.deprecation ? `  ${colors.yellow}deprecated${colors.reset}` : '';
    log(`  ${entry.name.padEnd(24)} ${shown}${note}`);
  }
  return true;
}

/**
 * Compile a notation file and print a summary
 */
function compile(args: string[]): boolean {
  const file = args[0];
  if (!file) {
    error('Missing file');
    return false;
  }

  const module = compileFile(file);
  const summary = summarize(module);
  success(`Compiled ${file}`);
  log(`  Modules: ${summary.modules}`);
  log(`  Symbols: ${summary.symbols}`);
  log(`  Variants: ${summary.variants}`);
  log(`  Deprecated: ${summary.deprecated}`);

  const report = checkConformance(module);
  for (const ambiguity of report.ambiguities) {
    warn(`Ambiguous: ${ambiguity.path} for {${ambiguity.request}} matches ${ambiguity.variants.join(' and ')}`);
  }
  return report.ok;
}

/**
 * Conformance over the configured corpora, always from source
 */
function check(): boolean {
  log('\n🔎 Glyphbook Conformance\n', 'bright');

  const report = checkConformance(compileRoot());
  for (const path of report.unsorted) {
    error(`Unsorted module: ${path || '(root)'}`);
  }
  for (const ambiguity of report.ambiguities) {
    error(`Ambiguous: ${ambiguity.path} for {${ambiguity.request}} matches ${ambiguity.variants.join(' and ')}`);
  }

  if (report.ok) {
    success('All modules sorted, no ambiguous variants');
  }
  log('');
  return report.ok;
}

/**
 * Compile the corpora and store them in the table
 */
function build(args: string[]): boolean {
  const outIndex = args.indexOf('--out');
  const out = outIndex !== -1 && args[outIndex + 1] ? args[outIndex + 1] : tablePath();

  log('\n🔨 Building compiled table\n', 'bright');

  const root = compileRoot();
  const db = openTableDb(out);
  try {
    saveTree(db, root);
    const tableStats = getTableStats(db);
    success(`Wrote ${out}`);
    log(`  Modules: ${tableStats.modules}`);
    log(`  Symbols: ${tableStats.symbols}`);
    log(`  Variants: ${tableStats.variants}`);
  } finally {
    db.close();
  }

  resetRoot();
  log('');
  return true;
}

/**
 * Manage configuration
 */
function config(args: string[]): boolean {
  const setIndex = args.indexOf('--set');
  if (setIndex !== -1) {
    const key = args[setIndex + 1];
    const value = args[setIndex + 2];
    if (!key || value === undefined) {
      error('Usage: glyphbook config --set <key> <value>');
      return false;
    }
    updateConfig(parseConfigValue(key, value));
    success(`Set ${key} = ${value}`);
  }

  showConfig();
  return true;
}

/**
 * Show current configuration
 */
function showConfig(): void {
  log('\n📋 Glyphbook Configuration\n', 'bright');

  for (const [key, value] of Object.entries(getConfigForDisplay())) {
    log(`  ${key}: ${JSON.stringify(value)}`);
  }

  const validation = validateConfig();
  for (const issue of validation.issues) {
    warn(issue);
  }
  if (process.env.GLYPHBOOK_HOME) {
    log('');
    info('GLYPHBOOK_HOME environment variable is set');
  }
  log('');
}

/**
 * Main CLI entry point
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  let ok = true;
  try {
    switch (command) {
      case 'lookup':
        ok = lookup(rest);
        break;
      case 'variants':
        ok = variants(rest);
        break;
      case 'list':
        ok = list(rest);
        break;
      case 'compile':
        ok = compile(rest);
        break;
      case 'check':
        ok = check();
        break;
      case 'build':
        ok = build(rest);
        break;
      case 'config':
        ok = config(rest);
        break;
      case 'version':
      case '-v':
      case '--version':
        console.log(`glyphbook v${packageJson.version}`);
        break;
      case 'help':
      case '-h':
      case '--help':
      case undefined:
        showHelp();
        break;
      default:
        error(`Unknown command: ${command}`);
        showHelp();
        ok = false;
    }
  } catch (err) {
    if (isNotationError(err)) {
      error(`${err.kind}: ${err.message}`);
    } else {
      error(err instanceof Error ? err.message : String(err));
    }
    ok = false;
  }

  if (!ok) {
    process.exit(1);
  }
}

main();
