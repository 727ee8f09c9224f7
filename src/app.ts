import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import routes from './routes';
import { config } from './config';
import { MarketplaceDependencies, createDependencies } from './config/dependencies';
import { errorHandler } from './middleware/error.middleware';

export async function buildApp(deps: MarketplaceDependencies = createDependencies()): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using our custom logger
    trustProxy: true,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.timeWindow,
  });

  // Set error handler
  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(routes, { prefix: '/api/v1/marketplace', deps });

  return app;
}

export default buildApp;
