#!/usr/bin/env node
/**
 * Sparse Memory MCP Server
 *
 * Exposes the sparse distributed memory bundle tools (store, list,
 * reconstruct, stats) over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, validateConfig } from './config/index.js';
import {
  store,
  storeToolDef,
  list,
  listToolDef,
  reconstruct,
  reconstructToolDef,
  stats,
  statsToolDef,
} from './tools/index.js';
import {
  parseListArgs,
  parseReconstructArgs,
  parseStatsArgs,
  parseStoreArgs,
} from './tools/args.js';

// Load config early so problems show up at startup
loadConfig();
const validation = validateConfig();
for (const issue of validation.issues) {
  console.error(`Config: ${issue}`);
}

// Create MCP server
const server = new Server(
  {
    name: 'sparse-memory',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

function textResult(result: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      storeToolDef,
      listToolDef,
      reconstructToolDef,
      statsToolDef,
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'sdm_store':
        return textResult(await store(parseStoreArgs(args)));

      case 'sdm_list':
        return textResult(await list(parseListArgs(args)));

      case 'sdm_reconstruct':
        return textResult(await reconstruct(parseReconstructArgs(args)));

      case 'sdm_stats':
        return textResult(await stats(parseStatsArgs(args)));

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
    console.error('Sparse memory MCP server running');
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
