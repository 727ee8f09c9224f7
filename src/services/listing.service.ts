import { AuthorizationError, InvalidStateError, ValidationError } from '../errors';
import { MarketplaceEvents } from '../events/event-types';
import { ListParams } from '../types/ledger.types';
import { requireUsableAddress } from '../utils/address';
import { logger } from '../utils/logger';
import { Caller, LedgerContext, requireNonNegative, requireSeller } from './ledger-context';
import { Transaction } from './transaction.service';

/**
 * Creating listings and the seller-side mutations on them.
 */
export class ListingService {
  private log = logger.child({ component: 'ListingService' });

  constructor(private readonly ctx: LedgerContext) {}

  list(tx: Transaction, caller: Caller, params: ListParams): number {
    const collection = requireUsableAddress(params.collection, 'collection');
    requireNonNegative(params.assetId, 'assetId');
    requireNonNegative(params.price, 'price');

    const registry = this.ctx.registries.resolve(collection);
    if (!registry.isApprovedForTransfer(params.assetId, this.ctx.address)) {
      throw new AuthorizationError('Marketplace is not approved to transfer this asset', {
        collection,
        assetId: params.assetId.toString()
      });
    }

    if (params.isAuction) {
      const now = this.ctx.clock.now();
      if (params.auctionEndTime === 0 || params.auctionEndTime <= now) {
        throw ValidationError.invalidField('auctionEndTime', 'must be in the future');
      }
    }

    const auctionEndTime = params.isAuction ? params.auctionEndTime : 0;
    const listingId = this.ctx.listings.create(
      {
        assetId: params.assetId,
        price: params.price,
        collection,
        seller: caller.address
      },
      {
        auctionEndTime,
        forSale: !params.isAuction,
        onAuction: params.isAuction
      }
    );

    tx.record(MarketplaceEvents.LISTING_CREATED, {
      listingId,
      collection,
      assetId: params.assetId,
      seller: caller.address,
      price: params.price,
      isAuction: params.isAuction,
      auctionEndTime
    });

    this.log.info('Listing created', {
      listingId,
      collection,
      assetId: params.assetId,
      seller: caller.address,
      mode: params.isAuction ? 'auction' : 'sale'
    });

    return listingId;
  }

  delist(tx: Transaction, caller: Caller, listingId: number): void {
    requireSeller(this.ctx, listingId, caller);
    this.ctx.listings.delete(listingId);

    tx.record(MarketplaceEvents.LISTING_DELETED, { listingId, seller: caller.address });
    this.log.info('Listing delisted', { listingId, seller: caller.address });
  }

  pauseSale(tx: Transaction, caller: Caller, listingId: number): void {
    requireSeller(this.ctx, listingId, caller);
    const state = this.ctx.listings.findStateById(listingId);
    if (!state.forSale) {
      throw InvalidStateError.notForSale(listingId);
    }

    this.ctx.listings.updateState(listingId, { forSale: false });
    tx.record(MarketplaceEvents.SALE_STATUS_CHANGED, { listingId, forSale: false });
  }

  unpauseSale(tx: Transaction, caller: Caller, listingId: number): void {
    requireSeller(this.ctx, listingId, caller);
    const state = this.ctx.listings.findStateById(listingId);
    if (state.forSale) {
      throw InvalidStateError.alreadyForSale(listingId);
    }
    // A listing in auction mode may not also be for sale.
    if (state.onAuction) {
      throw InvalidStateError.onAuction(listingId);
    }

    this.ctx.listings.updateState(listingId, { forSale: true });
    tx.record(MarketplaceEvents.SALE_STATUS_CHANGED, { listingId, forSale: true });
  }

  changePrice(tx: Transaction, caller: Caller, listingId: number, newPrice: bigint): void {
    requireNonNegative(newPrice, 'price');
    const listing = requireSeller(this.ctx, listingId, caller);

    this.ctx.listings.updatePrice(listingId, newPrice);
    tx.record(MarketplaceEvents.PRICE_CHANGED, { listingId, oldPrice: listing.price, newPrice });

    this.log.info('Listing price updated', { listingId, oldPrice: listing.price, newPrice });
  }

  /**
   * Moves a for-sale listing into auction mode. The stored auction end time is
   * left as it is; the seller sets it with extendAuctionEndTime.
   */
  toggleAuctionMode(tx: Transaction, caller: Caller, listingId: number): void {
    requireSeller(this.ctx, listingId, caller);
    const state = this.ctx.listings.findStateById(listingId);
    if (!state.forSale) {
      throw InvalidStateError.notForSale(listingId);
    }

    const next = this.ctx.listings.updateState(listingId, {
      forSale: !state.forSale,
      onAuction: !state.onAuction
    });

    tx.record(MarketplaceEvents.AUCTION_MODE_TOGGLED, {
      listingId,
      forSale: next.forSale,
      onAuction: next.onAuction
    });

    if (next.onAuction && next.auctionEndTime <= this.ctx.clock.now()) {
      this.log.warn('Listing switched to auction mode with an end time that has already passed', {
        listingId,
        auctionEndTime: next.auctionEndTime
      });
    }
  }

  extendAuctionEndTime(tx: Transaction, caller: Caller, listingId: number, newEndTime: number): void {
    requireSeller(this.ctx, listingId, caller);
    const state = this.ctx.listings.findStateById(listingId);
    if (!state.onAuction) {
      throw InvalidStateError.notOnAuction(listingId);
    }
    if (!Number.isInteger(newEndTime) || newEndTime < this.ctx.clock.now()) {
      throw ValidationError.invalidField('auctionEndTime', 'must not be in the past');
    }

    this.ctx.listings.updateState(listingId, { auctionEndTime: newEndTime });
    tx.record(MarketplaceEvents.AUCTION_END_TIME_EXTENDED, { listingId, auctionEndTime: newEndTime });

    this.log.info('Auction end time extended', { listingId, auctionEndTime: newEndTime });
  }
}
