import { FastifyInstance } from 'fastify';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { z } from 'zod';
import { createScraperMcpServer } from '../mcp/scraper-mcp-server.js';
import type { ScraperServices } from '../services.js';
import { ApiError, ErrorCode } from './errors.js';

const messageQuerySchema = z.object({ sessionId: z.string().min(1) });

/** MCP over SSE next to the REST routes; one MCP server per open stream. */
export function registerMcpSseRoutes(app: FastifyInstance, services: ScraperServices) {
  // sessionId -> SSEServerTransport
  const transports = new Map<string, SSEServerTransport>();

  app.get('/mcp/sse', (request, reply) => {
    reply.hijack();

    const transport = new SSEServerTransport('/mcp/message', reply.raw);
    const mcpServer = createScraperMcpServer(services, { log: request.log });
    const sessionId = transport.sessionId;
    transports.set(sessionId, transport);

    let cleanedUp = false;
    const cleanupConnection = () => {
      if (cleanedUp) return;
      cleanedUp = true;
      transports.delete(sessionId);
      mcpServer.close().catch((err) => {
        request.log.warn({ err, sessionId }, 'Error closing MCP session');
      });
    };

    transport.onclose = cleanupConnection;

    mcpServer.connect(transport).catch((err) => {
      request.log.error({ err, sessionId }, 'MCP SSE connect error');
      cleanupConnection();
    });

    request.raw.on('close', cleanupConnection);
  });

  app.post('/mcp/message', async (request, reply) => {
    const query = messageQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new ApiError(ErrorCode.INVALID_REQUEST, 'sessionId query parameter required', 400);
    }

    const transport = transports.get(query.data.sessionId);
    if (!transport) {
      throw new ApiError(ErrorCode.SESSION_NOT_FOUND, 'SSE session not found', 404, {
        sessionId: query.data.sessionId,
      });
    }

    reply.hijack();
    await transport.handlePostMessage(request.raw, reply.raw, request.body);
  });
}
