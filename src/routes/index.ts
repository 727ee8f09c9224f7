import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { MarketplaceDependencies } from '../config/dependencies';
import accountsRoutes from './accounts.routes';
import adminRoutes from './admin.routes';
import bidsRoutes from './bids.routes';
import collectionsRoutes from './collections.routes';
import healthRoutes from './health.routes';
import listingsRoutes from './listings.routes';

export interface RouteDependencies extends FastifyPluginOptions {
  deps: MarketplaceDependencies;
}

export default async function routes(fastify: FastifyInstance, opts: RouteDependencies) {
  const { deps } = opts;

  // Health check and metrics
  await fastify.register(healthRoutes, { deps });

  // Route groups
  await fastify.register(listingsRoutes, { prefix: '/listings', deps });
  await fastify.register(bidsRoutes, { prefix: '/bids', deps });
  await fastify.register(collectionsRoutes, { prefix: '/collections', deps });
  await fastify.register(accountsRoutes, { prefix: '/accounts', deps });
  await fastify.register(adminRoutes, { prefix: '/admin', deps });
}
