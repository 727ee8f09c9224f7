import { TransferError, ValidationError, errorMessage } from '../errors';
import { Checkpointable, Restore } from '../types/registry.types';
import { Address, isZeroOrBurn, normalizeAddress } from '../utils/address';
import { logger } from '../utils/logger';

/**
 * Called after a recipient has been credited. Throwing rejects the transfer.
 */
export type ReceiveHook = (from: Address, amount: bigint) => void;

/**
 * In-process account book for the settlement currency.
 */
export class BankService implements Checkpointable {
  private log = logger.child({ component: 'BankService' });
  private balances = new Map<Address, bigint>();
  private hooks = new Map<Address, ReceiveHook>();

  balanceOf(account: Address): bigint {
    return this.balances.get(normalizeAddress(account, 'account')) ?? 0n;
  }

  deposit(account: Address, amount: bigint): bigint {
    const normalized = normalizeAddress(account, 'account');
    if (amount <= 0n) {
      throw ValidationError.invalidField('amount', 'must be greater than zero');
    }
    const balance = (this.balances.get(normalized) ?? 0n) + amount;
    this.balances.set(normalized, balance);
    this.log.debug('Deposit credited', { account: normalized, amount });
    return balance;
  }

  /**
   * Registers a hook run whenever `account` receives value. Pass undefined to clear.
   */
  onReceive(account: Address, hook: ReceiveHook | undefined): void {
    const normalized = normalizeAddress(account, 'account');
    if (hook) {
      this.hooks.set(normalized, hook);
    } else {
      this.hooks.delete(normalized);
    }
  }

  /**
   * Moves `amount` from one account to another. Either the whole transfer,
   * including whatever the recipient's hook did, applies or nothing does.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    const sender = normalizeAddress(from, 'from');
    const recipient = normalizeAddress(to, 'to');

    if (amount < 0n) {
      throw ValidationError.invalidField('amount', 'must not be negative');
    }
    if (isZeroOrBurn(recipient)) {
      throw new TransferError('Cannot transfer to zero or burn address', { recipient });
    }

    const available = this.balances.get(sender) ?? 0n;
    if (available < amount) {
      throw TransferError.insufficientBalance(sender, amount, available);
    }

    const restore = this.checkpoint();
    this.balances.set(sender, available - amount);
    this.balances.set(recipient, (this.balances.get(recipient) ?? 0n) + amount);

    const hook = this.hooks.get(recipient);
    if (hook) {
      try {
        hook(sender, amount);
      } catch (error) {
        restore();
        this.log.warn('Recipient rejected transfer', { from: sender, to: recipient, amount, error: errorMessage(error) });
        throw TransferError.rejected(recipient, errorMessage(error));
      }
    }

    this.log.debug('Transfer settled', { from: sender, to: recipient, amount });
  }

  checkpoint(): Restore {
    const snapshot = new Map(this.balances);
    return () => {
      this.balances = new Map(snapshot);
    };
  }
}
