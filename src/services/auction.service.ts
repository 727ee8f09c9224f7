import { AuthorizationError, InvalidStateError, TransferError, errorMessage } from '../errors';
import { MarketplaceEvents } from '../events/event-types';
import { Address, isAddress, isZeroOrBurn, sameAddress } from '../utils/address';
import { logger } from '../utils/logger';
import { Caller, LedgerContext, collectPayment, requireNonNegative } from './ledger-context';
import { resolveRoyalty } from './royalty.service';
import { SaleReceipt } from './sale.service';
import { Transaction } from './transaction.service';

export interface AcceptedBidReceipt extends SaleReceipt {
  bidId: number;
  royaltyForfeited: boolean;
}

/**
 * Bids against auction listings and their settlement.
 */
export class AuctionService {
  private log = logger.child({ component: 'AuctionService' });

  constructor(private readonly ctx: LedgerContext) {}

  /**
   * Bids are not ranked: any number may be live per listing and the seller
   * picks one with acceptBid. The payment stays in ledger custody until then.
   */
  placeBid(tx: Transaction, caller: Caller, listingId: number, amount: bigint): number {
    requireNonNegative(amount, 'amount');
    this.ctx.listings.findById(listingId);
    const state = this.ctx.listings.findStateById(listingId);

    if (!state.onAuction) {
      throw InvalidStateError.notOnAuction(listingId);
    }
    if (this.ctx.clock.now() > state.auctionEndTime) {
      throw InvalidStateError.auctionEnded(listingId, state.auctionEndTime);
    }

    collectPayment(this.ctx, caller, amount);
    const bidId = this.ctx.bids.append({ listingId, amount, bidder: caller.address });

    tx.record(MarketplaceEvents.BID_PLACED, { bidId, listingId, bidder: caller.address, amount });
    this.log.info('Bid placed', { bidId, listingId, bidder: caller.address, amount });

    return bidId;
  }

  /**
   * Refunds a live bid. If the refund cannot be delivered the whole call
   * aborts and the bid stays live.
   */
  withdrawBid(tx: Transaction, caller: Caller, bidId: number): bigint {
    const bid = this.ctx.bids.findLiveById(bidId);
    if (!sameAddress(bid.bidder, caller.address)) {
      throw AuthorizationError.notBidder(bidId, caller.address);
    }

    this.ctx.bids.zero(bidId);
    this.ctx.bank.transfer(this.ctx.address, bid.bidder, bid.amount);

    tx.record(MarketplaceEvents.BID_WITHDRAWN, {
      bidId,
      listingId: bid.listingId,
      bidder: bid.bidder,
      amount: bid.amount
    });
    this.log.info('Bid withdrawn', { bidId, listingId: bid.listingId, bidder: bid.bidder });

    return bid.amount;
  }

  /**
   * Sells the listing to the bidder. Unlike a direct purchase, a royalty that
   * cannot be delivered is forfeited and stays in ledger custody.
   */
  acceptBid(tx: Transaction, caller: Caller, bidId: number): AcceptedBidReceipt {
    const bid = this.ctx.bids.findLiveById(bidId);
    const listing = this.ctx.listings.findById(bid.listingId);
    if (!sameAddress(listing.seller, caller.address)) {
      throw AuthorizationError.notSeller(bid.listingId, caller.address);
    }

    const state = this.ctx.listings.findStateById(bid.listingId);
    if (!state.onAuction) {
      throw InvalidStateError.notOnAuction(bid.listingId);
    }

    const registry = this.ctx.registries.resolve(listing.collection);
    tx.enlist(registry);
    const royalty = resolveRoyalty(registry, listing.assetId, bid.amount);
    const sellerProceeds = bid.amount - royalty.amount;

    this.ctx.listings.delete(bid.listingId);
    this.ctx.bids.zero(bidId);

    registry.transferOwnership(listing.seller, bid.bidder, listing.assetId, this.ctx.address);
    this.ctx.bank.transfer(this.ctx.address, listing.seller, sellerProceeds);

    let royaltyForfeited = false;
    if (royalty.amount > 0n) {
      const failure = this.payRoyalty(royalty.receiver, royalty.amount);
      if (failure) {
        royaltyForfeited = true;
        tx.record(MarketplaceEvents.ROYALTY_FORFEITED, {
          listingId: bid.listingId,
          receiver: royalty.receiver,
          amount: royalty.amount,
          reason: failure
        });
        this.log.warn('Royalty forfeited on bid acceptance', {
          listingId: bid.listingId,
          bidId,
          receiver: royalty.receiver,
          amount: royalty.amount,
          reason: failure
        });
      }
    }

    tx.record(MarketplaceEvents.LISTING_SOLD, {
      listingId: bid.listingId,
      collection: listing.collection,
      assetId: listing.assetId,
      seller: listing.seller,
      buyer: bid.bidder,
      price: bid.amount,
      royaltyReceiver: royalty.receiver,
      royaltyAmount: royaltyForfeited ? 0n : royalty.amount,
      bidId
    });
    tx.record(MarketplaceEvents.BID_WITHDRAWN, {
      bidId,
      listingId: bid.listingId,
      bidder: bid.bidder,
      amount: bid.amount
    });

    this.log.info('Bid accepted', { bidId, listingId: bid.listingId, buyer: bid.bidder, price: bid.amount });

    return {
      bidId,
      listingId: bid.listingId,
      buyer: bid.bidder,
      price: bid.amount,
      royaltyReceiver: royalty.receiver,
      royaltyAmount: royalty.amount,
      sellerProceeds,
      royaltyForfeited
    };
  }

  /** Returns the reason the royalty was not paid, or null when it was. */
  private payRoyalty(receiver: Address, amount: bigint): string | null {
    if (!isAddress(receiver) || isZeroOrBurn(receiver)) {
      return 'invalid royalty receiver';
    }
    try {
      this.ctx.bank.transfer(this.ctx.address, receiver, amount);
      return null;
    } catch (error) {
      if (error instanceof TransferError) {
        return errorMessage(error);
      }
      throw error;
    }
  }
}
