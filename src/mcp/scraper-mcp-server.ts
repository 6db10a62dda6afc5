import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { BrowserUnavailableError } from '../browser/index.js';
import { InvalidAdvertiserNameError, isAdvertiserId } from '../portal/index.js';
import type { ScraperServices } from '../services.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

export enum ToolErrorCode {
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  ADVERTISER_NOT_FOUND = 'ADVERTISER_NOT_FOUND',
  BROWSER_UNAVAILABLE = 'BROWSER_UNAVAILABLE',
  SCRAPE_FAILED = 'SCRAPE_FAILED',
}

export interface ScraperMcpServerOptions {
  log?: Logger;
}

function textResult(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

function errorResult(message: string, errorCode: ToolErrorCode) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: message, errorCode }) }],
    isError: true as const,
  };
}

/** A failure the tool reports with a specific code. */
class ToolError extends Error {
  constructor(message: string, readonly errorCode: ToolErrorCode) {
    super(message);
    this.name = 'ToolError';
  }
}

function classifyError(err: unknown): ToolErrorCode {
  if (err instanceof ToolError) return err.errorCode;
  if (err instanceof InvalidAdvertiserNameError) return ToolErrorCode.INVALID_PARAMETER;
  if (err instanceof BrowserUnavailableError) return ToolErrorCode.BROWSER_UNAVAILABLE;
  return ToolErrorCode.SCRAPE_FAILED;
}

function requireAdvertiserId(advertiserId: string): string {
  if (!isAdvertiserId(advertiserId)) {
    throw new ToolError(`Invalid advertiser id: ${advertiserId}`, ToolErrorCode.INVALID_PARAMETER);
  }
  return advertiserId;
}

const advertiserIdShape = z
  .string()
  .describe('Advertiser id from the transparency portal, e.g. AR14017378248766259201');

export function createScraperMcpServer(services: ScraperServices, options: ScraperMcpServerOptions = {}): McpServer {
  const log = options.log ?? silentLogger;
  const server = new McpServer(
    { name: 'adtransparency-scraper', version: '1.0.0' },
    { capabilities: { tools: {} } }
  );

  // Wraps a handler so that failures come back as tool errors instead of protocol errors
  async function run<T>(toolName: string, fn: () => Promise<T>) {
    try {
      return textResult(await fn());
    } catch (err) {
      if (err instanceof ToolError) {
        log.warn({ tool: toolName, errorCode: err.errorCode }, err.message);
      } else {
        log.error({ err, tool: toolName }, 'Tool call failed');
      }
      const message = err instanceof Error ? err.message : String(err);
      return errorResult(message, classifyError(err));
    }
  }

  server.tool(
    'lookup_advertiser',
    'Resolve an advertiser name to its transparency portal id and report its video ads',
    {
      advertiserName: z.string().describe('Advertiser or brand name, as typed into the portal search box'),
    },
    async ({ advertiserName }) => run('lookup_advertiser', async () => {
      const name = advertiserName.trim();
      if (!name) {
        throw new ToolError('Advertiser name cannot be empty', ToolErrorCode.INVALID_PARAMETER);
      }
      const report = await services.lookup.lookup(name);
      if (!report) {
        throw new ToolError(`No advertiser ID found for '${name}'`, ToolErrorCode.ADVERTISER_NOT_FOUND);
      }
      return report;
    })
  );

  server.tool(
    'check_advertiser_videos',
    'Count the video ad indicators on an advertiser page',
    { advertiserId: advertiserIdShape },
    async ({ advertiserId }) => run('check_advertiser_videos', async () => {
      const id = requireAdvertiserId(advertiserId);
      return { advertiserId: id, ...(await services.videos.checkVideos(id)) };
    })
  );

  server.tool(
    'inspect_search_page',
    'Load the portal home page and report the search input the heuristics find',
    {},
    async () => run('inspect_search_page', async () => {
      const snapshot = await services.inspector.inspectSearchPage();
      return { searchInput: snapshot.searchInput, lineCount: snapshot.pageContent.length };
    })
  );

  server.tool(
    'collect_advertiser_assets',
    'List the tag names and image URLs on an advertiser page',
    { advertiserId: advertiserIdShape },
    async ({ advertiserId }) => run('collect_advertiser_assets', () =>
      services.inspector.collectAdvertiserAssets(requireAdvertiserId(advertiserId))
    )
  );

  return server;
}
