import { EventEmitter } from 'events';
import { AuthorizationError, InvalidStateError, ValidationError, errorMessage, wrapError } from '../errors';
import { MarketplaceEvent, MarketplaceEvents } from '../events/event-types';
import { BidModel } from '../models/bid.model';
import { ListingModel } from '../models/listing.model';
import {
  Bid,
  BidView,
  CallContext,
  Clock,
  ListParams,
  Listing,
  ListingState,
  ListingView,
  systemClock
} from '../types/ledger.types';
import { Address, requireUsableAddress, sameAddress } from '../utils/address';
import { logger } from '../utils/logger';
import {
  bidsPlacedTotal,
  bidsWithdrawnTotal,
  listingsCreatedTotal,
  listingsDelistedTotal,
  operationsFailedTotal,
  royaltiesForfeitedTotal,
  salesTotal
} from '../utils/metrics';
import { AcceptedBidReceipt, AuctionService } from './auction.service';
import { BankService } from './bank.service';
import { Caller, LedgerContext } from './ledger-context';
import { ListingService } from './listing.service';
import { RegistryDirectory } from './registry-directory.service';
import { SaleReceipt, SaleService } from './sale.service';
import { Transaction, TransactionManager } from './transaction.service';

export interface MarketplaceLedgerOptions {
  address: Address;
  admin: Address;
  bank: BankService;
  registries: RegistryDirectory;
  clock?: Clock;
}

interface ExecuteOptions {
  payable?: boolean;
  /** Admin operations stay available while paused */
  ignorePause?: boolean;
}

/**
 * Marketplace ledger: listings, bids and their settlement.
 *
 * Each mutating call runs as one transaction over the listing table, the bid
 * sequence, the bank and any registry it touches. Committed events are
 * emitted under their type and under 'event'.
 */
export class MarketplaceLedger extends EventEmitter {
  public readonly address: Address;

  private log = logger.child({ component: 'MarketplaceLedger' });
  private readonly ctx: LedgerContext;
  private readonly transactions: TransactionManager;
  private readonly listingService: ListingService;
  private readonly saleService: SaleService;
  private readonly auctionService: AuctionService;
  private paused = false;
  private adminAddress: Address;

  constructor(options: MarketplaceLedgerOptions) {
    super();
    this.address = requireUsableAddress(options.address, 'address');
    this.adminAddress = requireUsableAddress(options.admin, 'admin');
    this.ctx = {
      address: this.address,
      listings: new ListingModel(),
      bids: new BidModel(),
      bank: options.bank,
      registries: options.registries,
      clock: options.clock ?? systemClock
    };
    this.transactions = new TransactionManager(this.address, (events) => this.publish(events));
    this.listingService = new ListingService(this.ctx);
    this.saleService = new SaleService(this.ctx);
    this.auctionService = new AuctionService(this.ctx);
  }

  // ===== LISTING LIFECYCLE =====

  list(call: CallContext, params: ListParams): number {
    return this.execute('list', call, {}, (tx, caller) => this.listingService.list(tx, caller, params));
  }

  delist(call: CallContext, listingId: number): void {
    this.execute('delist', call, {}, (tx, caller) => this.listingService.delist(tx, caller, listingId));
  }

  pauseSale(call: CallContext, listingId: number): void {
    this.execute('pauseSale', call, {}, (tx, caller) => this.listingService.pauseSale(tx, caller, listingId));
  }

  unpauseSale(call: CallContext, listingId: number): void {
    this.execute('unpauseSale', call, {}, (tx, caller) => this.listingService.unpauseSale(tx, caller, listingId));
  }

  changePrice(call: CallContext, listingId: number, newPrice: bigint): void {
    this.execute('changePrice', call, {}, (tx, caller) =>
      this.listingService.changePrice(tx, caller, listingId, newPrice)
    );
  }

  toggleAuctionMode(call: CallContext, listingId: number): void {
    this.execute('toggleAuctionMode', call, {}, (tx, caller) =>
      this.listingService.toggleAuctionMode(tx, caller, listingId)
    );
  }

  extendAuctionEndTime(call: CallContext, listingId: number, newEndTime: number): void {
    this.execute('extendAuctionEndTime', call, {}, (tx, caller) =>
      this.listingService.extendAuctionEndTime(tx, caller, listingId, newEndTime)
    );
  }

  // ===== SETTLEMENT =====

  buy(call: CallContext, listingId: number, receiver: Address): SaleReceipt {
    return this.execute('buy', call, { payable: true }, (tx, caller) =>
      this.saleService.buy(tx, caller, listingId, receiver)
    );
  }

  placeBid(call: CallContext, listingId: number, amount: bigint): number {
    return this.execute('placeBid', call, { payable: true }, (tx, caller) =>
      this.auctionService.placeBid(tx, caller, listingId, amount)
    );
  }

  withdrawBid(call: CallContext, bidId: number): bigint {
    return this.execute('withdrawBid', call, {}, (tx, caller) => this.auctionService.withdrawBid(tx, caller, bidId));
  }

  acceptBid(call: CallContext, bidId: number): AcceptedBidReceipt {
    return this.execute('acceptBid', call, {}, (tx, caller) => this.auctionService.acceptBid(tx, caller, bidId));
  }

  // ===== ADMINISTRATION =====

  pause(call: CallContext): void {
    this.execute('pause', call, { ignorePause: true }, (tx, caller) => {
      this.requireAdmin(caller);
      if (this.paused) {
        throw InvalidStateError.paused();
      }
      this.paused = true;
      tx.record(MarketplaceEvents.PAUSED, { admin: caller.address });
    });
  }

  unpause(call: CallContext): void {
    this.execute('unpause', call, { ignorePause: true }, (tx, caller) => {
      this.requireAdmin(caller);
      if (!this.paused) {
        throw new InvalidStateError('Marketplace is not paused');
      }
      this.paused = false;
      tx.record(MarketplaceEvents.UNPAUSED, { admin: caller.address });
    });
  }

  transferAdmin(call: CallContext, newAdmin: Address): void {
    this.execute('transferAdmin', call, { ignorePause: true }, (tx, caller) => {
      this.requireAdmin(caller);
      const next = requireUsableAddress(newAdmin, 'newAdmin');
      const previousAdmin = this.adminAddress;
      this.adminAddress = next;
      tx.record(MarketplaceEvents.ADMIN_TRANSFERRED, { previousAdmin, newAdmin: next });
    });
  }

  // ===== QUERIES =====

  get admin(): Address {
    return this.adminAddress;
  }

  isPaused(): boolean {
    return this.paused;
  }

  get listingCount(): number {
    return this.ctx.listings.count;
  }

  get bidCount(): number {
    return this.ctx.bids.count;
  }

  getListing(listingId: number): Listing {
    return this.ctx.listings.findById(listingId);
  }

  getListingState(listingId: number): ListingState {
    return this.ctx.listings.findStateById(listingId);
  }

  getListingView(listingId: number): ListingView {
    return this.ctx.listings.findViewById(listingId);
  }

  getActiveListings(): ListingView[] {
    return this.ctx.listings.findActive();
  }

  getBid(bidId: number): Bid {
    return this.ctx.bids.findById(bidId);
  }

  getBidsForListing(listingId: number): BidView[] {
    this.ctx.listings.findById(listingId);
    return this.ctx.bids.findLiveByListing(listingId);
  }

  /** Value currently held by the ledger (live bids plus forfeited royalties) */
  heldBalance(): bigint {
    return this.ctx.bank.balanceOf(this.address);
  }

  // ===== PLUMBING =====

  private execute<T>(
    operation: string,
    call: CallContext,
    options: ExecuteOptions,
    work: (tx: Transaction, caller: Caller) => T
  ): T {
    try {
      const caller: Caller = {
        address: requireUsableAddress(call.caller, 'caller'),
        value: call.value ?? 0n
      };
      if (!options.payable && caller.value !== 0n) {
        throw ValidationError.invalidField('value', `${operation} does not accept payment`);
      }
      if (!options.ignorePause && this.paused) {
        throw InvalidStateError.paused();
      }

      const participants = [this.ctx.listings, this.ctx.bids, this.ctx.bank];
      return this.transactions.run(operation, participants, (tx) => work(tx, caller));
    } catch (error) {
      const wrapped = wrapError(error);
      operationsFailedTotal.inc({ operation, code: wrapped.code });
      this.log.warn('Ledger operation aborted', {
        operation,
        caller: call.caller,
        code: wrapped.code,
        error: errorMessage(error)
      });
      throw error;
    }
  }

  private requireAdmin(caller: Caller): void {
    if (!sameAddress(caller.address, this.adminAddress)) {
      throw AuthorizationError.notAdmin(caller.address);
    }
  }

  private publish(events: MarketplaceEvent[]): void {
    for (const event of events) {
      this.recordMetrics(event);
      try {
        this.emit(event.type, event);
        this.emit('event', event);
      } catch (error) {
        this.log.error('Event listener failed', { type: event.type, eventId: event.id, error: errorMessage(error) });
      }
    }
  }

  private recordMetrics(event: MarketplaceEvent): void {
    switch (event.type) {
      case MarketplaceEvents.LISTING_CREATED:
        listingsCreatedTotal.inc({ mode: 'isAuction' in event.payload && event.payload.isAuction ? 'auction' : 'sale' });
        break;
      case MarketplaceEvents.LISTING_DELETED:
        listingsDelistedTotal.inc();
        break;
      case MarketplaceEvents.LISTING_SOLD:
        salesTotal.inc({ path: event.metadata.operation === 'acceptBid' ? 'auction' : 'direct' });
        break;
      case MarketplaceEvents.BID_PLACED:
        bidsPlacedTotal.inc();
        break;
      case MarketplaceEvents.BID_WITHDRAWN:
        if (event.metadata.operation === 'withdrawBid') {
          bidsWithdrawnTotal.inc();
        }
        break;
      case MarketplaceEvents.ROYALTY_FORFEITED:
        royaltiesForfeitedTotal.inc();
        break;
      default:
        break;
    }
  }
}
