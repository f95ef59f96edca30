import fastify, { FastifyInstance } from 'fastify';
import { HighlightingController } from '../../adapters/controllers/HighlightingController';

export function createServer(controller: HighlightingController): FastifyInstance {
  const server = fastify();

  server.get(
    '/tokens',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            path: { type: 'string', minLength: 1 },
          },
          required: ['path'],
        },
      },
    },
    controller.tokens.bind(controller),
  );

  server.post(
    '/highlight',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            uri: { type: 'string', minLength: 1 },
            version: { type: 'integer', minimum: 0 },
            path: { type: 'string', minLength: 1 },
          },
          required: ['uri', 'version', 'path'],
        },
      },
    },
    controller.highlight.bind(controller),
  );

  server.post(
    '/close',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            uri: { type: 'string', minLength: 1 },
          },
          required: ['uri'],
        },
      },
    },
    controller.close.bind(controller),
  );

  server.get('/scopes', controller.scopes.bind(controller));
  server.get('/health', async () => ({ status: 'ok' }));
  server.post('/shutdown', async () => {
    setTimeout(() => process.kill(process.pid, 'SIGTERM'), 200);
    return { status: 'shutting down' };
  });

  return server;
}
