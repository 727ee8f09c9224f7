import { FastifyReply } from 'fastify';
import { MarketplaceDependencies } from '../config/dependencies';
import { AuthRequest, getUser } from '../middleware/auth.middleware';
import {
  BuyBody,
  CreateListingBody,
  ExtendAuctionBody,
  IdParams,
  UpdatePriceBody
} from '../schemas/validation';
import { serialize } from '../utils/serialize';

export class ListingController {
  constructor(private readonly deps: MarketplaceDependencies) {}

  async getActiveListings(_request: AuthRequest, reply: FastifyReply) {
    reply.send({
      success: true,
      data: serialize(this.deps.ledger.getActiveListings()),
    });
  }

  async getListing(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    reply.send({
      success: true,
      data: serialize(this.deps.ledger.getListingView(request.params.id)),
    });
  }

  async getListingBids(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    reply.send({
      success: true,
      data: serialize(this.deps.ledger.getBidsForListing(request.params.id)),
    });
  }

  async createListing(request: AuthRequest<{ Body: CreateListingBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const body = request.body;

    const listingId = this.deps.ledger.list(
      { caller: user.address },
      {
        collection: body.collection,
        assetId: BigInt(body.assetId),
        price: BigInt(body.price),
        isAuction: body.isAuction,
        auctionEndTime: body.auctionEndTime,
      }
    );

    reply.status(201).send({
      success: true,
      data: serialize(this.deps.ledger.getListingView(listingId)),
    });
  }

  async cancelListing(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.delist({ caller: user.address }, request.params.id);

    reply.send({
      success: true,
      message: 'Listing removed',
    });
  }

  async updateListingPrice(request: AuthRequest<{ Params: IdParams; Body: UpdatePriceBody }>, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.changePrice({ caller: user.address }, request.params.id, BigInt(request.body.price));

    reply.send({
      success: true,
      data: serialize(this.deps.ledger.getListingView(request.params.id)),
    });
  }

  async pauseSale(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.pauseSale({ caller: user.address }, request.params.id);
    this.sendListing(request.params.id, reply);
  }

  async unpauseSale(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.unpauseSale({ caller: user.address }, request.params.id);
    this.sendListing(request.params.id, reply);
  }

  async toggleAuctionMode(request: AuthRequest<{ Params: IdParams }>, reply: FastifyReply) {
    const user = getUser(request);
    this.deps.ledger.toggleAuctionMode({ caller: user.address }, request.params.id);
    this.sendListing(request.params.id, reply);
  }

  async extendAuctionEndTime(
    request: AuthRequest<{ Params: IdParams; Body: ExtendAuctionBody }>,
    reply: FastifyReply
  ) {
    const user = getUser(request);
    this.deps.ledger.extendAuctionEndTime({ caller: user.address }, request.params.id, request.body.auctionEndTime);
    this.sendListing(request.params.id, reply);
  }

  async buyListing(request: AuthRequest<{ Params: IdParams; Body: BuyBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const receipt = this.deps.ledger.buy(
      { caller: user.address, value: BigInt(request.body.value) },
      request.params.id,
      request.body.receiver ?? user.address
    );

    reply.send({
      success: true,
      data: serialize(receipt),
    });
  }

  private sendListing(listingId: number, reply: FastifyReply) {
    reply.send({
      success: true,
      data: serialize(this.deps.ledger.getListingView(listingId)),
    });
  }
}
