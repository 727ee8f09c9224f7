import { ConflictError, NotFoundError } from '../errors';
import { AssetRegistry } from '../types/registry.types';
import { Address, normalizeAddress } from '../utils/address';

/**
 * Resolves a listing's collection address to the registry living there.
 */
export class RegistryDirectory {
  private registries = new Map<Address, AssetRegistry>();

  register(registry: AssetRegistry): void {
    const address = normalizeAddress(registry.address, 'collection');
    if (this.registries.has(address)) {
      throw ConflictError.alreadyExists('Collection', { collection: address });
    }
    this.registries.set(address, registry);
  }

  has(address: Address): boolean {
    return this.registries.has(address.toLowerCase());
  }

  resolve(address: Address): AssetRegistry {
    const registry = this.registries.get(address.toLowerCase());
    if (!registry) {
      throw new NotFoundError('Collection', { collection: address });
    }
    return registry;
  }

  list(): AssetRegistry[] {
    return [...this.registries.values()];
  }
}
