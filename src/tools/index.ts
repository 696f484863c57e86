/**
 * MCP Tools Module
 */

export { lookupSymbol, lookupToolDef, type LookupResult } from './lookup.js';
export { listVariants, variantsToolDef, type VariantsResult } from './variants.js';
export { listModule, listToolDef, type ListResult } from './list.js';
export { compileSource, compileToolDef, type CompileResult } from './compile.js';
export { stats, statsToolDef, type StatsResult } from './stats.js';
export { config, configToolDef, type ConfigResult } from './config.js';
export { readString, readOptionalString, readOptionalBoolean, type ToolArgs } from './args.js';
