import { v4 as uuidv4 } from 'uuid';
import { InvalidStateError } from '../errors';
import { EventPayloads, MarketplaceEvent, MarketplaceEvents } from '../events/event-types';
import { Checkpointable, Restore } from '../types/registry.types';
import { Address } from '../utils/address';
import { logger } from '../utils/logger';

/**
 * One all-or-nothing unit of ledger work.
 *
 * Participants are checkpointed the first time they are enlisted; events are
 * held back until the unit commits.
 */
export class Transaction {
  private restores: Restore[] = [];
  private enlisted = new Set<Checkpointable>();
  private pending: MarketplaceEvent[] = [];

  constructor(
    public readonly operation: string,
    private readonly source: Address
  ) {}

  enlist(participant: Checkpointable): void {
    if (this.enlisted.has(participant)) {
      return;
    }
    this.enlisted.add(participant);
    this.restores.push(participant.checkpoint());
  }

  record<K extends MarketplaceEvents>(type: K, payload: EventPayloads[K]): void {
    const event: MarketplaceEvent<K> = {
      id: uuidv4(),
      type,
      timestamp: new Date(),
      payload,
      metadata: { source: this.source, operation: this.operation }
    };
    this.pending.push(event);
  }

  get events(): MarketplaceEvent[] {
    return [...this.pending];
  }

  rollback(): void {
    for (const restore of [...this.restores].reverse()) {
      restore();
    }
    this.pending = [];
  }
}

/**
 * Runs ledger operations one at a time. A second `run` while one is in flight
 * is a reentrant call and is refused.
 */
export class TransactionManager {
  private log = logger.child({ component: 'TransactionManager' });
  private active: Transaction | null = null;

  constructor(
    private readonly source: Address,
    private readonly publish: (events: MarketplaceEvent[]) => void
  ) {}

  get inFlight(): boolean {
    return this.active !== null;
  }

  run<T>(operation: string, participants: Checkpointable[], work: (tx: Transaction) => T): T {
    if (this.active) {
      throw InvalidStateError.reentrantCall(operation);
    }

    const tx = new Transaction(operation, this.source);
    participants.forEach((participant) => tx.enlist(participant));
    this.active = tx;

    let result: T;
    try {
      result = work(tx);
    } catch (error) {
      tx.rollback();
      this.log.debug('Operation rolled back', { operation });
      throw error;
    } finally {
      this.active = null;
    }

    this.publish(tx.events);
    return result;
  }
}
