#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { configFromEnv } from '@asset-graph/core';
import { bootstrap, resetContext } from './bootstrap.js';
import { registerGraphTools } from './tools/graph.js';

export const SERVER_NAME = 'asset-graph-mcp';
export const SERVER_VERSION = '0.1.0';

if (process.argv.includes('--version')) {
  console.log(`${SERVER_NAME} ${SERVER_VERSION}`);
  process.exit(0);
}

const context = await bootstrap(configFromEnv());
console.error(`[graph-mcp] graph ready (origin: ${context.origin})`);

const server = new McpServer({
  name: SERVER_NAME,
  version: SERVER_VERSION,
});

registerGraphTools(server, context);

async function shutdown(signal: string): Promise<void> {
  console.error(`[graph-mcp] ${signal} received, shutting down`);
  try {
    await server.close();
    await resetContext(context);
  } catch (err) {
    console.error('[graph-mcp] shutdown failed:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
  process.exit();
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

const transport = new StdioServerTransport();
await server.connect(transport);
