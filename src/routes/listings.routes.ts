import { FastifyInstance } from 'fastify';
import { BidController } from '../controllers/bid.controller';
import { ListingController } from '../controllers/listing.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import { validate, validateParams } from '../middleware/validation.middleware';
import {
  BuyBody,
  CreateListingBody,
  ExtendAuctionBody,
  IdParams,
  PlaceBidBody,
  UpdatePriceBody,
  buySchema,
  createListingSchema,
  extendAuctionSchema,
  idParamsSchema,
  placeBidSchema,
  updatePriceSchema
} from '../schemas/validation';
import type { RouteDependencies } from './index';

export default async function listingsRoutes(fastify: FastifyInstance, opts: RouteDependencies) {
  const listingController = new ListingController(opts.deps);
  const bidController = new BidController(opts.deps);
  const withId = validateParams(idParamsSchema);

  // Public routes
  fastify.get('/', listingController.getActiveListings.bind(listingController));

  fastify.get<{ Params: IdParams }>('/:id', {
    preHandler: [withId]
  }, listingController.getListing.bind(listingController));

  fastify.get<{ Params: IdParams }>('/:id/bids', {
    preHandler: [withId]
  }, listingController.getListingBids.bind(listingController));

  // Seller routes
  fastify.post<{ Body: CreateListingBody }>('/', {
    preHandler: [authMiddleware, validate(createListingSchema)]
  }, listingController.createListing.bind(listingController));

  fastify.delete<{ Params: IdParams }>('/:id', {
    preHandler: [authMiddleware, withId]
  }, listingController.cancelListing.bind(listingController));

  fastify.put<{ Params: IdParams; Body: UpdatePriceBody }>('/:id/price', {
    preHandler: [authMiddleware, withId, validate(updatePriceSchema)]
  }, listingController.updateListingPrice.bind(listingController));

  fastify.post<{ Params: IdParams }>('/:id/pause-sale', {
    preHandler: [authMiddleware, withId]
  }, listingController.pauseSale.bind(listingController));

  fastify.post<{ Params: IdParams }>('/:id/unpause-sale', {
    preHandler: [authMiddleware, withId]
  }, listingController.unpauseSale.bind(listingController));

  fastify.post<{ Params: IdParams }>('/:id/toggle-auction', {
    preHandler: [authMiddleware, withId]
  }, listingController.toggleAuctionMode.bind(listingController));

  fastify.put<{ Params: IdParams; Body: ExtendAuctionBody }>('/:id/auction-end-time', {
    preHandler: [authMiddleware, withId, validate(extendAuctionSchema)]
  }, listingController.extendAuctionEndTime.bind(listingController));

  // Buyer routes
  fastify.post<{ Params: IdParams; Body: BuyBody }>('/:id/buy', {
    preHandler: [authMiddleware, withId, validate(buySchema)]
  }, listingController.buyListing.bind(listingController));

  fastify.post<{ Params: IdParams; Body: PlaceBidBody }>('/:id/bids', {
    preHandler: [authMiddleware, withId, validate(placeBidSchema)]
  }, bidController.placeBid.bind(bidController));
}
