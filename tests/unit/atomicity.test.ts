import { AuthorizationError, InvalidStateError, TransferError } from '../../src/errors';
import { MarketplaceEvent, MarketplaceEvents } from '../../src/events/event-types';
import { Transaction, TransactionManager } from '../../src/services/transaction.service';
import { Checkpointable } from '../../src/types/registry.types';
import { ADDRESSES, World, createWorld, listForAuction, listForSale } from '../fixtures/marketplace';

const ADMIN = { caller: ADDRESSES.admin };
const SELLER = { caller: ADDRESSES.seller };

class Counter implements Checkpointable {
  value = 0;

  checkpoint() {
    const saved = this.value;
    return () => {
      this.value = saved;
    };
  }
}

describe('TransactionManager', () => {
  let published: MarketplaceEvent[][];
  let manager: TransactionManager;

  beforeEach(() => {
    published = [];
    manager = new TransactionManager(ADDRESSES.marketplace, (events) => published.push(events));
  });

  it('publishes recorded events after the work succeeds', () => {
    const counter = new Counter();

    const result = manager.run('pause', [counter], (tx) => {
      counter.value = 3;
      tx.record(MarketplaceEvents.PAUSED, { admin: ADDRESSES.admin });
      expect(published).toHaveLength(0);
      return 'done';
    });

    expect(result).toBe('done');
    expect(counter.value).toBe(3);
    expect(published).toHaveLength(1);
    expect(published[0][0]).toMatchObject({
      type: MarketplaceEvents.PAUSED,
      payload: { admin: ADDRESSES.admin },
      metadata: { source: ADDRESSES.marketplace, operation: 'pause' }
    });
  });

  it('restores every participant and drops events on failure', () => {
    const first = new Counter();
    const late = new Counter();

    expect(() =>
      manager.run('pause', [first], (tx: Transaction) => {
        first.value = 1;
        tx.enlist(late);
        tx.enlist(late);
        late.value = 2;
        tx.record(MarketplaceEvents.PAUSED, { admin: ADDRESSES.admin });
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(first.value).toBe(0);
    expect(late.value).toBe(0);
    expect(published).toHaveLength(0);
    expect(manager.inFlight).toBe(false);
  });

  it('rejects a nested run and recovers afterwards', () => {
    expect(() => manager.run('outer', [], () => manager.run('inner', [], () => 1))).toThrow(InvalidStateError);
    expect(manager.run('again', [], () => 2)).toBe(2);
  });
});

describe('Ledger atomicity and guards', () => {
  let world: World;

  beforeEach(() => {
    world = createWorld({ royaltyBps: 1000n });
  });

  describe('reentrancy', () => {
    it('rejects a bidder re-entering withdrawBid from its refund hook', () => {
      world.bank.deposit(ADDRESSES.bidderA, 50n);
      listForAuction(world, 9n, 0n);
      world.ledger.placeBid({ caller: ADDRESSES.bidderA, value: 50n }, 1, 50n);

      const reentryErrors: unknown[] = [];
      world.bank.onReceive(ADDRESSES.bidderA, () => {
        try {
          world.ledger.withdrawBid({ caller: ADDRESSES.bidderA }, 0);
        } catch (error) {
          reentryErrors.push(error);
          throw error;
        }
      });

      expect(() => world.ledger.withdrawBid({ caller: ADDRESSES.bidderA }, 0)).toThrow(
        'Transfer rejected by recipient: Reentrant call rejected'
      );
      expect(reentryErrors).toHaveLength(1);
      expect(reentryErrors[0]).toBeInstanceOf(InvalidStateError);
      expect(world.ledger.getBid(0).amount).toBe(50n);
      expect(world.ledger.heldBalance()).toBe(50n);
      expect(world.bank.balanceOf(ADDRESSES.bidderA)).toBe(0n);
    });

    it('rejects a seller re-entering the ledger while being paid', () => {
      world.bank.deposit(ADDRESSES.buyer, 100n);
      listForSale(world, 7n, 100n);
      listForSale(world, 8n, 100n);
      world.bank.onReceive(ADDRESSES.seller, () => {
        world.ledger.delist(SELLER, 2);
      });

      expect(() => world.ledger.buy({ caller: ADDRESSES.buyer, value: 100n }, 1, ADDRESSES.buyer)).toThrow(
        TransferError
      );
      expect(world.ledger.getListingState(2).forSale).toBe(true);
      expect(world.ledger.getListingState(1).forSale).toBe(true);
      expect(world.bank.balanceOf(ADDRESSES.buyer)).toBe(100n);
    });
  });

  describe('pause', () => {
    it('is admin only', () => {
      expect(() => world.ledger.pause(SELLER)).toThrow(AuthorizationError);
      expect(world.ledger.isPaused()).toBe(false);
    });

    it('blocks mutations and keeps queries available', () => {
      listForSale(world, 7n, 100n);
      world.ledger.pause(ADMIN);

      expect(world.ledger.isPaused()).toBe(true);
      expect(() => world.ledger.delist(SELLER, 1)).toThrow('Marketplace is paused');
      expect(() => world.ledger.changePrice(SELLER, 1, 5n)).toThrow(InvalidStateError);
      expect(() => world.ledger.buy({ caller: ADDRESSES.buyer, value: 100n }, 1, ADDRESSES.buyer)).toThrow(
        'Marketplace is paused'
      );
      expect(world.ledger.getListing(1).price).toBe(100n);
      expect(world.ledger.getActiveListings()).toHaveLength(1);
    });

    it('rejects redundant pause and unpause', () => {
      expect(() => world.ledger.unpause(ADMIN)).toThrow('Marketplace is not paused');

      world.ledger.pause(ADMIN);
      expect(() => world.ledger.pause(ADMIN)).toThrow('Marketplace is paused');

      world.ledger.unpause(ADMIN);
      expect(world.ledger.isPaused()).toBe(false);
      expect(listForSale(world, 7n, 100n)).toBe(1);
    });

    it('emits pause events', () => {
      const types: string[] = [];
      world.ledger.on('event', (event: MarketplaceEvent) => types.push(event.type));

      world.ledger.pause(ADMIN);
      world.ledger.unpause(ADMIN);

      expect(types).toEqual([MarketplaceEvents.PAUSED, MarketplaceEvents.UNPAUSED]);
    });
  });

  describe('transferAdmin', () => {
    it('hands over the admin role', () => {
      world.ledger.transferAdmin(ADMIN, ADDRESSES.stranger);

      expect(world.ledger.admin).toBe(ADDRESSES.stranger);
      expect(() => world.ledger.pause(ADMIN)).toThrow(AuthorizationError);
      world.ledger.pause({ caller: ADDRESSES.stranger });
      expect(world.ledger.isPaused()).toBe(true);
    });

    it('refuses zero and burn admins', () => {
      expect(() => world.ledger.transferAdmin(ADMIN, ADDRESSES.burn)).toThrow('Invalid newAdmin: zero or burn address');
      expect(world.ledger.admin).toBe(ADDRESSES.admin);
    });
  });

  it('keeps emitting after a listener throws', () => {
    world.ledger.on(MarketplaceEvents.LISTING_CREATED, () => {
      throw new Error('listener bug');
    });

    expect(listForSale(world, 7n, 100n)).toBe(1);
    expect(world.ledger.listingCount).toBe(1);
  });
});
