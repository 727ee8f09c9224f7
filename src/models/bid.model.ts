import { NotFoundError } from '../errors';
import { Checkpointable, Restore } from '../types/registry.types';
import { Bid, BidView } from '../types/ledger.types';
import { ZERO_ADDRESS, sameAddress } from '../utils/address';

export const EMPTY_BID: Readonly<Bid> = Object.freeze({
  listingId: 0,
  amount: 0n,
  bidder: ZERO_ADDRESS
});

/**
 * Append-only bid sequence. A bid's id is its position; removal zeroes the
 * slot in place so later ids never shift.
 */
export class BidModel implements Checkpointable {
  private bids: Bid[] = [];

  append(bid: Bid): number {
    this.bids.push({ ...bid });
    return this.bids.length - 1;
  }

  get count(): number {
    return this.bids.length;
  }

  findById(bidId: number): Bid {
    const bid = Number.isInteger(bidId) ? this.bids[bidId] : undefined;
    if (!bid) {
      throw NotFoundError.bid(bidId);
    }
    return { ...bid };
  }

  /**
   * Like findById, but a zeroed slot is reported as not found.
   */
  findLiveById(bidId: number): Bid {
    const bid = this.findById(bidId);
    if (isTombstone(bid)) {
      throw NotFoundError.bid(bidId);
    }
    return bid;
  }

  findLiveByListing(listingId: number): BidView[] {
    const live: BidView[] = [];
    this.bids.forEach((bid, bidId) => {
      if (bid.listingId === listingId && !isTombstone(bid)) {
        live.push({ bidId, ...bid });
      }
    });
    return live;
  }

  zero(bidId: number): void {
    if (bidId >= 0 && bidId < this.bids.length) {
      this.bids[bidId] = { ...EMPTY_BID };
    }
  }

  checkpoint(): Restore {
    const snapshot = this.bids.map((bid) => ({ ...bid }));
    return () => {
      this.bids = snapshot.map((bid) => ({ ...bid }));
    };
  }
}

function isTombstone(bid: Bid): boolean {
  return sameAddress(bid.bidder, ZERO_ADDRESS);
}
