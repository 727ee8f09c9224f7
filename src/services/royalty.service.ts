import { ValidationError } from '../errors';
import { AssetRegistry, RoyaltyInfo, isRoyaltyProvider } from '../types/registry.types';
import { ZERO_ADDRESS } from '../utils/address';

export const NO_ROYALTY: Readonly<RoyaltyInfo> = Object.freeze({ receiver: ZERO_ADDRESS, amount: 0n });

/**
 * Royalty owed on a sale, or none when the registry declares no royalty
 * capability. A royalty larger than the sale price aborts the sale.
 */
export function resolveRoyalty(registry: AssetRegistry, assetId: bigint, salePrice: bigint): RoyaltyInfo {
  if (!isRoyaltyProvider(registry) || !registry.supportsRoyalty()) {
    return { ...NO_ROYALTY };
  }

  const royalty = registry.royaltyInfo(assetId, salePrice);
  if (royalty.amount < 0n || royalty.amount > salePrice) {
    throw new ValidationError(
      'Royalty exceeds sale price',
      [{ field: 'royalty', message: `royalty ${royalty.amount} is outside 0..${salePrice}` }],
      { assetId: assetId.toString(), salePrice: salePrice.toString(), royalty: royalty.amount.toString() }
    );
  }
  return { receiver: royalty.receiver.toLowerCase(), amount: royalty.amount };
}
