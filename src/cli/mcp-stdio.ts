#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createScraperMcpServer } from '../mcp/scraper-mcp-server.js';
import { createScraperRuntime } from '../services.js';

async function main() {
  const config = loadConfig();
  // 将日志输出到 stderr，避免干扰 stdio 通信
  const log = createLogger(config, 2);

  const runtime = createScraperRuntime(config, log);
  const mcpServer = createScraperMcpServer(runtime, { log });

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  log.info('MCP server connected via stdio. Ready for requests.');

  const shutdown = async () => {
    log.info('Shutting down...');
    await mcpServer.close();
    await runtime.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[adtransparency-mcp] Fatal error:', err);
  process.exit(1);
});
