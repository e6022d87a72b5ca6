// Tool routes
import type { FastifyInstance } from 'fastify';
import type { ToolRegistry } from '../services/tools/registry.js';

export interface ToolRouteOptions {
  registry: ToolRegistry;
}

export async function toolRoutes(server: FastifyInstance, opts: ToolRouteOptions) {
  // GET /v1/tools - Registered tool schemas
  server.get('/tools', async () => {
    return { tools: opts.registry.schemas() };
  });
}
