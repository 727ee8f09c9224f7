import { FastifyReply } from 'fastify';
import { MarketplaceDependencies } from '../config/dependencies';
import { AuthRequest, getUser } from '../middleware/auth.middleware';
import { IdParams, PlaceBidBody } from '../schemas/validation';
import { serialize } from '../utils/serialize';

export class BidController {
  constructor(private readonly deps: MarketplaceDependencies) {}

  async placeBid(request: AuthRequest<{ Params: IdParams; Body: PlaceBidBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const amount = BigInt(request.body.amount);
    const value = request.body.value === undefined ? amount : BigInt(request.body.value);

    const bidId = this.deps.ledger.placeBid({ caller: user.address, value }, request.params.id, amount);

    reply.status(201).send({
      success: true,
      data: serialize({ bidId, ...this.deps.ledger.getBid(bidId) }),
    });
  }

  async getBid(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    reply.send({
      success: true,
      data: serialize({ bidId: request.params.id, ...this.deps.ledger.getBid(request.params.id) }),
    });
  }

  async withdrawBid(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    const user = getUser(request);
    const refunded = this.deps.ledger.withdrawBid({ caller: user.address }, request.params.id);

    reply.send({
      success: true,
      data: serialize({ bidId: request.params.id, refunded }),
    });
  }

  async acceptBid(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    const user = getUser(request);
    const receipt = this.deps.ledger.acceptBid({ caller: user.address }, request.params.id);

    reply.send({
      success: true,
      data: serialize(receipt),
    });
  }
}
