import { FastifyInstance } from 'fastify';
import { AccountController } from '../controllers/account.controller';
import { authMiddleware, requireAdmin } from '../middleware/auth.middleware';
import { validate, validateParams } from '../middleware/validation.middleware';
import { AddressParams, DepositBody, addressParamsSchema, depositSchema } from '../schemas/validation';
import type { RouteDependencies } from './index';

export default async function accountsRoutes(fastify: FastifyInstance, opts: RouteDependencies) {
  const accountController = new AccountController(opts.deps);
  const withAddress = validateParams(addressParamsSchema);

  fastify.get<{ Params: AddressParams }>('/:address/balance', {
    preHandler: [withAddress]
  }, accountController.getBalance.bind(accountController));

  fastify.post<{ Params: AddressParams; Body: DepositBody }>('/:address/deposit', {
    preHandler: [authMiddleware, requireAdmin, withAddress, validate(depositSchema)]
  }, accountController.deposit.bind(accountController));
}
