import fastify, { type FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';

export type MetricsServerOptions = {
  registry: Registry;
  enabled: boolean;
};

/** Scrape endpoint for the worker's prom-client registry. */
export function createMetricsServer(options: MetricsServerOptions): FastifyInstance {
  const app = fastify({ logger: false });

  app.get('/metrics', async (_request, reply) => {
    if (!options.enabled) {
      reply.code(503).type('text/plain');
      return 'metrics disabled';
    }
    reply.type(options.registry.contentType);
    return options.registry.metrics();
  });

  app.get('/healthz', async () => ({ status: 'ok' }));

  return app;
}
