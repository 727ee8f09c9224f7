import { NotFoundError } from '../errors';
import { Checkpointable, Restore } from '../types/registry.types';
import { Listing, ListingState, ListingView } from '../types/ledger.types';
import { ZERO_ADDRESS } from '../utils/address';

export const EMPTY_LISTING: Readonly<Listing> = Object.freeze({
  assetId: 0n,
  price: 0n,
  collection: ZERO_ADDRESS,
  seller: ZERO_ADDRESS
});

export const EMPTY_LISTING_STATE: Readonly<ListingState> = Object.freeze({
  auctionEndTime: 0,
  forSale: false,
  onAuction: false
});

/**
 * Listing table plus the separately tracked listing-state table.
 *
 * Ids are allocated from 1 by a monotonic counter. Deleting a listing leaves a
 * tombstone: the id stays allocated and reads back as the zero-valued record.
 */
export class ListingModel implements Checkpointable {
  private nextId = 1;
  private listings = new Map<number, Listing>();
  private states = new Map<number, ListingState>();

  create(listing: Listing, state: ListingState): number {
    const listingId = this.nextId;
    this.nextId += 1;
    this.listings.set(listingId, { ...listing });
    this.states.set(listingId, { ...state });
    return listingId;
  }

  /** Number of ids ever allocated */
  get count(): number {
    return this.nextId - 1;
  }

  isAllocated(listingId: number): boolean {
    return Number.isInteger(listingId) && listingId >= 1 && listingId < this.nextId;
  }

  findById(listingId: number): Listing {
    this.assertAllocated(listingId);
    return { ...(this.listings.get(listingId) ?? EMPTY_LISTING) };
  }

  findStateById(listingId: number): ListingState {
    this.assertAllocated(listingId);
    return { ...(this.states.get(listingId) ?? EMPTY_LISTING_STATE) };
  }

  findViewById(listingId: number): ListingView {
    return { listingId, ...this.findById(listingId), ...this.findStateById(listingId) };
  }

  findActive(): ListingView[] {
    return [...this.listings.keys()]
      .sort((a, b) => a - b)
      .map((listingId) => this.findViewById(listingId));
  }

  updatePrice(listingId: number, price: bigint): void {
    const listing = this.listings.get(listingId);
    if (listing) {
      listing.price = price;
    }
  }

  updateState(listingId: number, changes: Partial<ListingState>): ListingState {
    const current = this.states.get(listingId);
    if (!current) {
      return { ...EMPTY_LISTING_STATE };
    }
    const next: ListingState = { ...current, ...changes };
    this.states.set(listingId, next);
    return { ...next };
  }

  delete(listingId: number): void {
    this.listings.delete(listingId);
    this.states.delete(listingId);
  }

  checkpoint(): Restore {
    const nextId = this.nextId;
    const listings = cloneEntries(this.listings);
    const states = cloneEntries(this.states);

    return () => {
      this.nextId = nextId;
      this.listings = new Map(listings);
      this.states = new Map(states);
    };
  }

  private assertAllocated(listingId: number): void {
    if (!this.isAllocated(listingId)) {
      throw NotFoundError.listing(listingId);
    }
  }
}

function cloneEntries<T extends object>(source: Map<number, T>): Array<[number, T]> {
  return [...source.entries()].map(([key, value]): [number, T] => [key, { ...value }]);
}
