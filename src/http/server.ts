// This module exposes the protocol engine over streamable HTTP as an alternative to the stdio loop.

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { SUPPORTED_METHODS, type McpProtocolEngine } from '../mcp/protocol.js';
import { MCP_SERVER_NAME } from '../version.js';

export interface HttpServerDeps {
  engine: Pick<McpProtocolEngine, 'handleLine'>;
  logger: FastifyBaseLogger;
}

// This function builds the Fastify app; the caller owns listen() and close().
export function createHttpServer(deps: HttpServerDeps): FastifyInstance {
  const app = Fastify({ loggerInstance: deps.logger });

  // Bodies reach the engine as raw text so malformed JSON produces a JSON-RPC parse error instead of an HTTP 400.
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.get('/mcp', async (_request, reply) => {
    reply.send({
      name: MCP_SERVER_NAME,
      transport: 'streamable-http',
      endpoint: '/mcp',
      methods: SUPPORTED_METHODS
    });
  });

  app.post('/mcp', async (request, reply) => {
    const body = typeof request.body === 'string' ? request.body : '';
    const requestLogger = request.log.child({ component: 'mcp' });

    const line = await deps.engine.handleLine(body);
    if (line === null) {
      requestLogger.info({ event: 'mcp_post_notification_accepted' }, 'mcp_post_notification_accepted');
      reply.code(202).send();
      return;
    }

    reply.type('application/json; charset=utf-8').send(line);
  });

  return app;
}
