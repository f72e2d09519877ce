#!/usr/bin/env node

/**
 * SiteScope MCP Server
 *
 * Exposes company research over MCP (stdio):
 * - research_company: discovery, page selection, extraction, synthesis
 * - discover_links: discovery only
 *
 * stdout carries the protocol; logs go to stderr.
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { dispatchToolCall, getAllToolSchemas, TOOL_NAMES, type ToolContext } from './mcp/index.js';
import { LinkDiscoveryEngine } from './core/link-discovery.js';
import { createResearchPipeline } from './sdk.js';
import { getConfigFilePath, getMergedLogConfig, getMergedPipelineConfig } from './utils/config-loader.js';
import { configureLogger, logger, logServerShutdown, logServerStart } from './utils/logger.js';

const SERVER_VERSION = '0.1.0';

function createToolContext(): ToolContext {
  return {
    pipeline: createResearchPipeline(),
    discovery: new LinkDiscoveryEngine(),
    config: getMergedPipelineConfig(),
  };
}

async function main(): Promise<void> {
  const logConfig = getMergedLogConfig();
  configureLogger({ level: logConfig.level, prettyPrint: logConfig.prettyPrint });

  const context = createToolContext();
  const server = new Server(
    {
      name: 'sitescope',
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: getAllToolSchemas(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    return dispatchToolCall(context, name, args, extra.signal);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logServerStart(SERVER_VERSION, [...TOOL_NAMES]);
  logger.server.info('Configuration loaded', { configFile: getConfigFilePath() ?? 'none' });

  const shutdown = (reason: string) => {
    logServerShutdown(reason);
    server
      .close()
      .catch((error: unknown) => logger.server.error('Error closing server', { error }))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.server.error('Fatal error', { error });
  process.exit(1);
});
