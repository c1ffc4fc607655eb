import fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import {
  ResolveQuery,
  SourceController,
  SourceQuery,
} from '../../adapters/controllers/SourceController';

const symbolProperties = {
  path: { type: 'string', minLength: 1 },
  function: { type: 'string' },
  symbol: { type: 'string' },
} as const;

export function createServer(
  controller: SourceController,
  options: FastifyServerOptions = {},
): FastifyInstance {
  const server = fastify({ requestIdHeader: 'request-id', ...options });

  server.get<{ Querystring: SourceQuery }>(
    '/source/go',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            ...symbolProperties,
            repository: { type: 'string' },
            revision: { type: 'string' },
          },
          required: ['path'],
        },
      },
    },
    controller.getSource.bind(controller),
  );

  server.get<{ Querystring: ResolveQuery }>(
    '/resolve',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: symbolProperties,
          required: ['path'],
        },
      },
    },
    controller.resolve.bind(controller),
  );

  server.get('/health', async () => ({ status: 'ok' }));

  return server;
}
