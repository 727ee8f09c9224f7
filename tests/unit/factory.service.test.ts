import { ConflictError, ValidationError } from '../../src/errors';
import { BankService } from '../../src/services/bank.service';
import { DeploymentFactory } from '../../src/services/factory.service';
import { RegistryDirectory } from '../../src/services/registry-directory.service';
import { deriveAddress } from '../../src/utils/address';
import { ADDRESSES, ManualClock } from '../fixtures/marketplace';

describe('DeploymentFactory', () => {
  let bank: BankService;
  let registries: RegistryDirectory;
  let factory: DeploymentFactory;

  beforeEach(() => {
    bank = new BankService();
    registries = new RegistryDirectory();
    factory = new DeploymentFactory(ADDRESSES.factory, bank, registries, new ManualClock());
  });

  it('predicts addresses from factory, kind and salt', () => {
    const predicted = factory.predictAddress('single-edition', 'drop-1');

    expect(predicted).toBe(deriveAddress(ADDRESSES.factory, 'single-edition', 'drop-1'));
    expect(predicted).toMatch(/^0x[0-9a-f]{40}$/);
    expect(factory.predictAddress('bounded-collection', 'drop-1')).not.toBe(predicted);
  });

  it('deploys a single-edition registry at the predicted address', () => {
    const registry = factory.deploySingleEdition(ADDRESSES.issuer, 'drop-1', { name: 'Drop', symbol: 'DRP' });

    expect(registry.address).toBe(factory.predictAddress('single-edition', 'drop-1'));
    expect(registry.owner).toBe(ADDRESSES.issuer);
    expect(registries.resolve(registry.address)).toBe(registry);
    expect(factory.getDeployment(registry.address.toUpperCase().replace('0X', '0x'))).toEqual({
      address: registry.address,
      kind: 'single-edition',
      deployer: ADDRESSES.issuer,
      salt: 'drop-1'
    });
  });

  it('refuses to redeploy the same salt', () => {
    factory.deploySingleEdition(ADDRESSES.issuer, 'drop-1', { name: 'Drop', symbol: 'DRP' });

    expect(() => factory.deploySingleEdition(ADDRESSES.stranger, 'drop-1', { name: 'Other', symbol: 'OTH' })).toThrow(
      ConflictError
    );
    expect(factory.listDeployments()).toHaveLength(1);
  });

  it('records nothing when construction fails', () => {
    expect(() =>
      factory.deployBoundedCollection(ADDRESSES.issuer, 'cap', { name: 'Capped', symbol: 'CAP', maxSupply: 0 })
    ).toThrow(ValidationError);

    expect(factory.listDeployments()).toEqual([]);
    expect(registries.list()).toEqual([]);

    const registry = factory.deployBoundedCollection(ADDRESSES.issuer, 'cap', {
      name: 'Capped',
      symbol: 'CAP',
      maxSupply: 3
    });
    expect(registry.maxSupply).toBe(3);
  });

  it('deploys a marketplace administered by the deployer unless told otherwise', () => {
    const own = factory.deployMarketplace(ADDRESSES.seller, 'market-1');
    const delegated = factory.deployMarketplace(ADDRESSES.seller, 'market-2', ADDRESSES.admin);

    expect(own.address).toBe(factory.predictAddress('marketplace', 'market-1'));
    expect(own.admin).toBe(ADDRESSES.seller);
    expect(delegated.admin).toBe(ADDRESSES.admin);
  });

  it('wires deployed collections and marketplaces together', () => {
    const ledger = factory.deployMarketplace(ADDRESSES.admin, 'market');
    const registry = factory.deploySingleEdition(ADDRESSES.issuer, 'art', {
      name: 'Art',
      symbol: 'ART',
      royalty: { receiver: ADDRESSES.royalty, basisPoints: 500n }
    });
    const assetId = registry.mint(ADDRESSES.issuer, ADDRESSES.seller);
    registry.approve(ADDRESSES.seller, ledger.address, assetId);
    bank.deposit(ADDRESSES.buyer, 200n);

    const listingId = ledger.list(
      { caller: ADDRESSES.seller },
      { collection: registry.address, assetId, price: 200n, auctionEndTime: 0, isAuction: false }
    );
    ledger.buy({ caller: ADDRESSES.buyer, value: 200n }, listingId, ADDRESSES.buyer);

    expect(registry.ownerOf(assetId)).toBe(ADDRESSES.buyer);
    expect(bank.balanceOf(ADDRESSES.royalty)).toBe(10n);
    expect(bank.balanceOf(ADDRESSES.seller)).toBe(190n);
  });
});
