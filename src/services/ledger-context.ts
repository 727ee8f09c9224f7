import { AuthorizationError, ValidationError } from '../errors';
import { BidModel } from '../models/bid.model';
import { ListingModel } from '../models/listing.model';
import { Clock, Listing } from '../types/ledger.types';
import { Address, sameAddress } from '../utils/address';
import { BankService } from './bank.service';
import { RegistryDirectory } from './registry-directory.service';

/**
 * State and collaborators shared by the listing, sale and auction services.
 */
export interface LedgerContext {
  /** Account that holds bid payments and is the approved transfer operator */
  readonly address: Address;
  readonly listings: ListingModel;
  readonly bids: BidModel;
  readonly bank: BankService;
  readonly registries: RegistryDirectory;
  readonly clock: Clock;
}

/**
 * Resolved caller of the operation currently running.
 */
export interface Caller {
  address: Address;
  value: bigint;
}

export function requireSeller(ctx: LedgerContext, listingId: number, caller: Caller): Listing {
  const listing = ctx.listings.findById(listingId);
  if (!sameAddress(listing.seller, caller.address)) {
    throw AuthorizationError.notSeller(listingId, caller.address);
  }
  return listing;
}

/**
 * Checks the attached value matches exactly and moves it into ledger custody.
 */
export function collectPayment(ctx: LedgerContext, caller: Caller, expected: bigint): void {
  if (caller.value !== expected) {
    throw ValidationError.paymentMismatch(expected, caller.value);
  }
  if (expected > 0n) {
    ctx.bank.transfer(caller.address, ctx.address, expected);
  }
}

export function requireNonNegative(value: bigint, field: string): void {
  if (value < 0n) {
    throw ValidationError.invalidField(field, 'must not be negative');
  }
}
