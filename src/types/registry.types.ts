import { Address } from '../utils/address';

/**
 * Restores a participant to the state captured when the checkpoint was taken.
 */
export type Restore = () => void;

/**
 * Anything whose state can take part in an all-or-nothing ledger operation.
 */
export interface Checkpointable {
  checkpoint(): Restore;
}

export interface RoyaltyInfo {
  receiver: Address;
  amount: bigint;
}

/**
 * Optional capability an asset registry may declare.
 */
export interface RoyaltyProvider {
  supportsRoyalty(): boolean;
  royaltyInfo(assetId: bigint, salePrice: bigint): RoyaltyInfo;
}

/**
 * Boundary the ledger consumes from an asset registry. Calls are synchronous
 * and throw on failure.
 */
export interface AssetRegistry extends Checkpointable {
  readonly address: Address;
  ownerOf(assetId: bigint): Address;
  /** `operator` is the account performing the transfer and must be owner or approved. */
  transferOwnership(from: Address, to: Address, assetId: bigint, operator: Address): void;
  isApprovedForTransfer(assetId: bigint, operator: Address): boolean;
}

export type RoyaltyAwareRegistry = AssetRegistry & RoyaltyProvider;

export function isRoyaltyProvider(registry: AssetRegistry): registry is RoyaltyAwareRegistry {
  return (
    'supportsRoyalty' in registry &&
    typeof registry.supportsRoyalty === 'function' &&
    'royaltyInfo' in registry &&
    typeof registry.royaltyInfo === 'function'
  );
}
