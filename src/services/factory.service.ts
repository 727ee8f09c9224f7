import { ConflictError } from '../errors';
import { BoundedCollectionRegistry } from '../registries/bounded-collection.registry';
import { RoyaltyConfig } from '../registries/base.registry';
import { SingleEditionRegistry } from '../registries/single-edition.registry';
import { Clock } from '../types/ledger.types';
import { Address, deriveAddress, normalizeAddress, requireUsableAddress } from '../utils/address';
import { logger } from '../utils/logger';
import { BankService } from './bank.service';
import { MarketplaceLedger } from './marketplace-ledger.service';
import { RegistryDirectory } from './registry-directory.service';

export type DeploymentKind = 'marketplace' | 'single-edition' | 'bounded-collection';

export interface CollectionDeployParams {
  name: string;
  symbol: string;
  royalty?: RoyaltyConfig;
}

export interface Deployment {
  address: Address;
  kind: DeploymentKind;
  deployer: Address;
  salt: string;
}

/**
 * Creates marketplaces and registries at addresses derived from the factory
 * address, the kind and a caller-chosen salt, so the address is known before
 * deployment.
 */
export class DeploymentFactory {
  public readonly address: Address;

  private log = logger.child({ component: 'DeploymentFactory' });
  private deployments = new Map<Address, Deployment>();

  constructor(
    address: Address,
    private readonly bank: BankService,
    private readonly registries: RegistryDirectory,
    private readonly clock?: Clock
  ) {
    this.address = requireUsableAddress(address, 'factoryAddress');
  }

  predictAddress(kind: DeploymentKind, salt: string): Address {
    return deriveAddress(this.address, kind, salt);
  }

  deployMarketplace(deployer: Address, salt: string, admin?: Address): MarketplaceLedger {
    return this.deploy('marketplace', deployer, salt, (deployment) =>
      new MarketplaceLedger({
        address: deployment.address,
        admin: admin ?? deployment.deployer,
        bank: this.bank,
        registries: this.registries,
        clock: this.clock
      })
    );
  }

  deploySingleEdition(deployer: Address, salt: string, params: CollectionDeployParams): SingleEditionRegistry {
    return this.deploy('single-edition', deployer, salt, (deployment) => {
      const registry = new SingleEditionRegistry({ address: deployment.address, owner: deployment.deployer, ...params });
      this.registries.register(registry);
      return registry;
    });
  }

  deployBoundedCollection(
    deployer: Address,
    salt: string,
    params: CollectionDeployParams & { maxSupply: number }
  ): BoundedCollectionRegistry {
    return this.deploy('bounded-collection', deployer, salt, (deployment) => {
      const registry = new BoundedCollectionRegistry({ address: deployment.address, owner: deployment.deployer, ...params });
      this.registries.register(registry);
      return registry;
    });
  }

  getDeployment(address: Address): Deployment | undefined {
    return this.deployments.get(address.toLowerCase());
  }

  listDeployments(): Deployment[] {
    return [...this.deployments.values()];
  }

  private deploy<T>(kind: DeploymentKind, deployer: Address, salt: string, create: (deployment: Deployment) => T): T {
    const address = this.predictAddress(kind, salt);
    if (this.deployments.has(address)) {
      throw ConflictError.alreadyExists('Deployment', { address, kind, salt });
    }

    const deployment: Deployment = { address, kind, deployer: normalizeAddress(deployer, 'deployer'), salt };
    const instance = create(deployment);
    this.deployments.set(address, deployment);

    this.log.info('Deployment created', { address, kind, deployer: deployment.deployer });
    return instance;
  }
}
