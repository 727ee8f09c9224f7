import { FastifyInstance } from 'fastify';
import { BidController } from '../controllers/bid.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import { validateParams } from '../middleware/validation.middleware';
import { IdParams, idParamsSchema } from '../schemas/validation';
import type { RouteDependencies } from './index';

export default async function bidsRoutes(fastify: FastifyInstance, opts: RouteDependencies) {
  const bidController = new BidController(opts.deps);
  const withId = validateParams(idParamsSchema);

  fastify.get<{ Params: IdParams }>('/:id', {
    preHandler: [withId]
  }, bidController.getBid.bind(bidController));

  fastify.delete<{ Params: IdParams }>('/:id', {
    preHandler: [authMiddleware, withId]
  }, bidController.withdrawBid.bind(bidController));

  fastify.post<{ Params: IdParams }>('/:id/accept', {
    preHandler: [authMiddleware, withId]
  }, bidController.acceptBid.bind(bidController));
}
