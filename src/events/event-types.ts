import { Address } from '../utils/address';

export enum MarketplaceEvents {
  LISTING_CREATED = 'marketplace.listing.created',
  LISTING_DELETED = 'marketplace.listing.deleted',
  LISTING_SOLD = 'marketplace.listing.sold',
  PRICE_CHANGED = 'marketplace.listing.price_changed',
  SALE_STATUS_CHANGED = 'marketplace.listing.sale_status_changed',
  AUCTION_MODE_TOGGLED = 'marketplace.listing.auction_mode_toggled',
  AUCTION_END_TIME_EXTENDED = 'marketplace.listing.auction_end_time_extended',
  BID_PLACED = 'marketplace.bid.placed',
  BID_WITHDRAWN = 'marketplace.bid.withdrawn',
  ROYALTY_FORFEITED = 'marketplace.royalty.forfeited',
  PAUSED = 'marketplace.admin.paused',
  UNPAUSED = 'marketplace.admin.unpaused',
  ADMIN_TRANSFERRED = 'marketplace.admin.transferred'
}

export interface EventPayloads {
  [MarketplaceEvents.LISTING_CREATED]: {
    listingId: number;
    collection: Address;
    assetId: bigint;
    seller: Address;
    price: bigint;
    isAuction: boolean;
    auctionEndTime: number;
  };
  [MarketplaceEvents.LISTING_DELETED]: { listingId: number; seller: Address };
  [MarketplaceEvents.LISTING_SOLD]: {
    listingId: number;
    collection: Address;
    assetId: bigint;
    seller: Address;
    buyer: Address;
    price: bigint;
    royaltyReceiver: Address;
    royaltyAmount: bigint;
    bidId?: number;
  };
  [MarketplaceEvents.PRICE_CHANGED]: { listingId: number; oldPrice: bigint; newPrice: bigint };
  [MarketplaceEvents.SALE_STATUS_CHANGED]: { listingId: number; forSale: boolean };
  [MarketplaceEvents.AUCTION_MODE_TOGGLED]: { listingId: number; forSale: boolean; onAuction: boolean };
  [MarketplaceEvents.AUCTION_END_TIME_EXTENDED]: { listingId: number; auctionEndTime: number };
  [MarketplaceEvents.BID_PLACED]: { bidId: number; listingId: number; bidder: Address; amount: bigint };
  [MarketplaceEvents.BID_WITHDRAWN]: { bidId: number; listingId: number; bidder: Address; amount: bigint };
  [MarketplaceEvents.ROYALTY_FORFEITED]: { listingId: number; receiver: Address; amount: bigint; reason: string };
  [MarketplaceEvents.PAUSED]: { admin: Address };
  [MarketplaceEvents.UNPAUSED]: { admin: Address };
  [MarketplaceEvents.ADMIN_TRANSFERRED]: { previousAdmin: Address; newAdmin: Address };
}

export interface MarketplaceEvent<K extends MarketplaceEvents = MarketplaceEvents> {
  id: string;
  type: K;
  timestamp: Date;
  payload: EventPayloads[K];
  metadata: {
    source: Address;
    operation: string;
  };
}
