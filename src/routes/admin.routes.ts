import { FastifyInstance } from 'fastify';
import { AdminController } from '../controllers/admin.controller';
import { authMiddleware, requireAdmin } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { TransferAdminBody, transferAdminSchema } from '../schemas/validation';
import type { RouteDependencies } from './index';

export default async function adminRoutes(fastify: FastifyInstance, opts: RouteDependencies) {
  const adminController = new AdminController(opts.deps);

  // All admin routes require authentication and admin role
  const adminPreHandler = [authMiddleware, requireAdmin];

  fastify.get('/status', adminController.getStatus.bind(adminController));

  fastify.post('/pause', {
    preHandler: adminPreHandler
  }, adminController.pause.bind(adminController));

  fastify.post('/unpause', {
    preHandler: adminPreHandler
  }, adminController.unpause.bind(adminController));

  fastify.post<{ Body: TransferAdminBody }>('/transfer', {
    preHandler: [...adminPreHandler, validate(transferAdminSchema)]
  }, adminController.transferAdmin.bind(adminController));
}
