import { BaseAssetRegistry, RegistryOptions } from './base.registry';

/**
 * Registry of one-of-one assets. Every id is minted at most once; the base
 * registry already refuses a second mint of the same id.
 */
export class SingleEditionRegistry extends BaseAssetRegistry {
  constructor(options: RegistryOptions) {
    super(options);
  }

  protected assertCanMint(_assetId: bigint): void {}
}
