import { Address } from '../utils/address';

export interface Listing {
  assetId: bigint;
  /** Sale price, or the reference value for an auction */
  price: bigint;
  /** Address of the asset registry */
  collection: Address;
  seller: Address;
}

export interface ListingState {
  /** Unix seconds; 0 when the listing is not an auction */
  auctionEndTime: number;
  forSale: boolean;
  onAuction: boolean;
}

export interface Bid {
  listingId: number;
  amount: bigint;
  bidder: Address;
}

export interface ListingView extends Listing, ListingState {
  listingId: number;
}

export interface BidView extends Bid {
  bidId: number;
}

/**
 * Who is calling and how much value is attached to the call.
 */
export interface CallContext {
  caller: Address;
  value?: bigint;
}

export interface ListParams {
  collection: Address;
  assetId: bigint;
  price: bigint;
  auctionEndTime: number;
  isAuction: boolean;
}

export interface Clock {
  /** Current time in unix seconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};
