import { InvalidStateError, ValidationError } from '../errors';
import { BaseAssetRegistry, RegistryOptions } from './base.registry';

export interface BoundedCollectionOptions extends RegistryOptions {
  maxSupply: number;
}

/**
 * Collection capped at `maxSupply` assets.
 */
export class BoundedCollectionRegistry extends BaseAssetRegistry {
  public readonly maxSupply: number;

  constructor(options: BoundedCollectionOptions) {
    if (!Number.isInteger(options.maxSupply) || options.maxSupply <= 0) {
      throw ValidationError.invalidField('maxSupply', 'must be a positive integer');
    }
    super(options);
    this.maxSupply = options.maxSupply;
  }

  get remainingSupply(): number {
    return this.maxSupply - this.totalSupply;
  }

  protected assertCanMint(assetId: bigint): void {
    if (this.totalSupply >= this.maxSupply) {
      throw new InvalidStateError('Collection is fully minted', {
        maxSupply: this.maxSupply,
        assetId: assetId.toString()
      });
    }
  }
}
