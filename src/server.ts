import { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { config } from './config';
import { createDependencies } from './config/dependencies';
import { validateAndFail } from './config/validate';
import { logger } from './utils/logger';

const HOST = '0.0.0.0';

async function startServer(): Promise<FastifyInstance> {
  validateAndFail();

  const deps = createDependencies(config);
  const app = await buildApp(deps);

  await app.listen({ port: config.port, host: HOST });

  logger.info(`Marketplace ledger running on port ${config.port}`);
  logger.info(`API available at: http://localhost:${config.port}/api/v1/marketplace`, {
    marketplace: deps.ledger.address,
    admin: deps.ledger.admin,
    factory: deps.factory.address
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return app;
}

export { startServer };
