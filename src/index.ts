#!/usr/bin/env node
/**
 * Glyphbook MCP Server
 *
 * Serves named Unicode symbols over MCP: lookups by dotted path, variant
 * listings, and compilation of notation source.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './config/index.js';
import { getRoot } from './corpus/index.js';
import {
  lookupSymbol,
  lookupToolDef,
  listVariants,
  variantsToolDef,
  listModule,
  listToolDef,
  compileSource,
  compileToolDef,
  stats,
  statsToolDef,
  config,
  configToolDef,
  readString,
  readOptionalString,
  readOptionalBoolean,
} from './tools/index.js';

// Initialize config
loadConfig();

// Create MCP server
const server = new Server(
  {
    name: 'glyphbook',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

function respond(result: { success: boolean }) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(result, null, 2),
      },
    ],
    isError: !result.success,
  };
}

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      lookupToolDef,
      variantsToolDef,
      listToolDef,
      compileToolDef,
      statsToolDef,
      configToolDef,
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'symbol_lookup':
        return respond(lookupSymbol(getRoot(), { path: readString(args, 'path') }));

      case 'symbol_variants':
        return respond(listVariants(getRoot(), { path: readString(args, 'path') }));

      case 'symbol_list':
        return respond(listModule(getRoot(), { module: readOptionalString(args, 'module') }));

      case 'symbol_compile':
        return respond(compileSource({
          source: readString(args, 'source'),
          file: readOptionalString(args, 'file'),
        }));

      case 'symbol_stats':
        return respond(stats(getRoot()));

      case 'symbol_config':
        return respond(config({
          show: readOptionalBoolean(args, 'show'),
          symbols_path: readOptionalString(args, 'symbols_path'),
          emoji_path: readOptionalString(args, 'emoji_path'),
          table_path: readOptionalString(args, 'table_path'),
          prefer_table: readOptionalBoolean(args, 'prefer_table'),
        }));

      default:
        return {
          content: [
            {
              type: 'text',
              text: `Unknown tool: ${name}`,
            },
          ],
          isError: true,
        };
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${errorMessage}`,
        },
      ],
      isError: true,
    };
  }
});

// Handle cleanup
process.on('SIGINT', () => {
  process.exit(0);
});

process.on('SIGTERM', () => {
  process.exit(0);
});

// Start the server
async function main() {
  try {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error('Glyphbook MCP server running');
  } catch (error) {
    console.error('Failed to connect transport:', error);
    throw error;
  }
}

process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
});

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
