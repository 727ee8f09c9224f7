import { FastifyInstance } from 'fastify';
import { HealthController } from '../controllers/health.controller';
import type { RouteDependencies } from './index';

export default async function healthRoutes(fastify: FastifyInstance, opts: RouteDependencies) {
  const healthController = new HealthController(opts.deps);

  fastify.get('/health', healthController.health.bind(healthController));
  fastify.get('/metrics', healthController.metrics.bind(healthController));
}
