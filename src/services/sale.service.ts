import { InvalidStateError } from '../errors';
import { MarketplaceEvents } from '../events/event-types';
import { Address, requireUsableAddress } from '../utils/address';
import { logger } from '../utils/logger';
import { Caller, LedgerContext, collectPayment } from './ledger-context';
import { resolveRoyalty } from './royalty.service';
import { Transaction } from './transaction.service';

export interface SaleReceipt {
  listingId: number;
  buyer: Address;
  price: bigint;
  royaltyReceiver: Address;
  royaltyAmount: bigint;
  sellerProceeds: bigint;
}

/**
 * Fixed-price settlement.
 */
export class SaleService {
  private log = logger.child({ component: 'SaleService' });

  constructor(private readonly ctx: LedgerContext) {}

  /**
   * Exactly `price` leaves the buyer: the royalty share goes to the
   * rights-holder and the rest to the seller. Any failed transfer, the royalty
   * payment included, aborts the purchase.
   */
  buy(tx: Transaction, caller: Caller, listingId: number, receiver: Address): SaleReceipt {
    const recipient = requireUsableAddress(receiver, 'receiver');
    const listing = this.ctx.listings.findById(listingId);
    const state = this.ctx.listings.findStateById(listingId);

    if (!state.forSale) {
      throw InvalidStateError.notForSale(listingId);
    }
    if (state.onAuction) {
      throw InvalidStateError.onAuction(listingId);
    }

    collectPayment(this.ctx, caller, listing.price);

    const registry = this.ctx.registries.resolve(listing.collection);
    tx.enlist(registry);
    const royalty = resolveRoyalty(registry, listing.assetId, listing.price);
    const sellerProceeds = listing.price - royalty.amount;

    this.ctx.listings.delete(listingId);

    registry.transferOwnership(listing.seller, recipient, listing.assetId, this.ctx.address);
    if (royalty.amount > 0n) {
      this.ctx.bank.transfer(this.ctx.address, royalty.receiver, royalty.amount);
    }
    this.ctx.bank.transfer(this.ctx.address, listing.seller, sellerProceeds);

    tx.record(MarketplaceEvents.LISTING_SOLD, {
      listingId,
      collection: listing.collection,
      assetId: listing.assetId,
      seller: listing.seller,
      buyer: recipient,
      price: listing.price,
      royaltyReceiver: royalty.receiver,
      royaltyAmount: royalty.amount
    });

    this.log.info('Listing sold', {
      listingId,
      buyer: recipient,
      price: listing.price,
      royaltyAmount: royalty.amount
    });

    return {
      listingId,
      buyer: recipient,
      price: listing.price,
      royaltyReceiver: royalty.receiver,
      royaltyAmount: royalty.amount,
      sellerProceeds
    };
  }
}
