import { FastifyReply } from 'fastify';
import { MarketplaceDependencies } from '../config/dependencies';
import { AuthRequest, getUser } from '../middleware/auth.middleware';
import { AddressParams, DepositBody } from '../schemas/validation';
import { logger } from '../utils/logger';
import { serialize } from '../utils/serialize';

export class AccountController {
  private log = logger.child({ component: 'AccountController' });

  constructor(private readonly deps: MarketplaceDependencies) {}

  async getBalance(request: AuthRequest<{ Params: AddressParams }>, reply: FastifyReply) {
    const address = request.params.address.toLowerCase();

    reply.send({
      success: true,
      data: serialize({ address, balance: this.deps.bank.balanceOf(address) }),
    });
  }

  /**
   * Credits settlement currency to an account. Admin only; this is how value
   * enters the in-process bank.
   */
  async deposit(request: AuthRequest<{ Params: AddressParams; Body: DepositBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const address = request.params.address.toLowerCase();
    const balance = this.deps.bank.deposit(address, BigInt(request.body.amount));

    this.log.info('Deposit credited', { address, amount: request.body.amount, by: user.address });

    reply.send({
      success: true,
      data: serialize({ address, balance }),
    });
  }
}
