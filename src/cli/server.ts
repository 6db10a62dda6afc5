#!/usr/bin/env node

import { parseArgs } from 'node:util';
import Fastify from 'fastify';
import { registerErrorHandler, registerMcpSseRoutes, registerRoutes, registerScreenshots } from '../api/index.js';
import { loadConfig } from '../config.js';
import { loggerOptions } from '../logger.js';
import { createScraperRuntime } from '../services.js';

const { values: args } = parseArgs({
  options: {
    port: { type: 'string', short: 'p' },
    host: { type: 'string', short: 'h' },
  },
  strict: false,
});

async function main() {
  const config = loadConfig();
  const app = Fastify({ logger: loggerOptions(config) });

  const runtime = createScraperRuntime(config, app.log.child({ module: 'scraper' }));

  await registerScreenshots(app, runtime.capture);
  registerErrorHandler(app);
  registerRoutes(app, runtime);
  registerMcpSseRoutes(app, runtime);

  // 优先级: --port > PORT 环境变量 > 默认值
  const port = typeof args.port === 'string' ? parseInt(args.port, 10) : config.server.port;
  const host = typeof args.host === 'string' ? args.host : config.server.host;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${String(args.port)}`);
  }

  try {
    await app.listen({ port, host });
    app.log.info(`Ads transparency scraper running at http://${host}:${port}`);
    const chromePath = runtime.browserManager.resolveExecutablePath();
    if (!chromePath) {
      app.log.warn('No Chrome executable found; scrape requests will fail until CHROME_PATH is set');
    }
  } catch (err) {
    app.log.error(err);
    await runtime.close();
    process.exit(1);
  }

  // 优雅关闭
  const shutdown = async () => {
    app.log.info('Shutting down...');
    await app.close();
    await runtime.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      app.log.error(err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
