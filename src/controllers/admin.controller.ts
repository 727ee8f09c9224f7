import { FastifyReply } from 'fastify';
import { MarketplaceDependencies } from '../config/dependencies';
import { AuthRequest, getUser } from '../middleware/auth.middleware';
import { TransferAdminBody } from '../schemas/validation';
import { serialize } from '../utils/serialize';

export class AdminController {
  constructor(private readonly deps: MarketplaceDependencies) {}

  async getStatus(_request: AuthRequest, reply: FastifyReply) {
    const ledger = this.deps.ledger;

    reply.send({
      success: true,
      data: serialize({
        address: ledger.address,
        admin: ledger.admin,
        paused: ledger.isPaused(),
        listingCount: ledger.listingCount,
        bidCount: ledger.bidCount,
        heldBalance: ledger.heldBalance(),
      }),
    });
  }

  async pause(request: AuthRequest, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.pause({ caller: user.address });

    reply.send({ success: true, data: { paused: true } });
  }

  async unpause(request: AuthRequest, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.unpause({ caller: user.address });

    reply.send({ success: true, data: { paused: false } });
  }

  async transferAdmin(request: AuthRequest<{ Body: TransferAdminBody }>, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.transferAdmin({ caller: user.address }, request.body.newAdmin);

    reply.send({ success: true, data: { admin: this.deps.ledger.admin } });
  }
}
