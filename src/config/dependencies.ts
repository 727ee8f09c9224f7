import { BankService } from '../services/bank.service';
import { DeploymentFactory } from '../services/factory.service';
import { MarketplaceLedger } from '../services/marketplace-ledger.service';
import { RegistryDirectory } from '../services/registry-directory.service';
import { Clock } from '../types/ledger.types';
import { ServiceConfig, config as defaultConfig } from './index';

/**
 * Everything the HTTP layer talks to. One set per running service.
 */
export interface MarketplaceDependencies {
  ledger: MarketplaceLedger;
  bank: BankService;
  registries: RegistryDirectory;
  factory: DeploymentFactory;
}

export function createDependencies(
  serviceConfig: ServiceConfig = defaultConfig,
  clock?: Clock
): MarketplaceDependencies {
  const bank = new BankService();
  const registries = new RegistryDirectory();
  const factory = new DeploymentFactory(serviceConfig.factoryAddress, bank, registries, clock);
  const ledger = new MarketplaceLedger({
    address: serviceConfig.marketplaceAddress,
    admin: serviceConfig.marketplaceAdmin,
    bank,
    registries,
    clock
  });

  return { ledger, bank, registries, factory };
}
