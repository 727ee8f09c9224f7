import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  TransferError,
  ValidationError
} from '../errors';
import { AssetRegistry, Restore, RoyaltyInfo, RoyaltyProvider } from '../types/registry.types';
import { Address, ZERO_ADDRESS, isZeroOrBurn, normalizeAddress, sameAddress } from '../utils/address';
import type { Logger } from 'winston';
import { logger } from '../utils/logger';

export const BPS_DENOMINATOR = 10000n;

export interface RoyaltyConfig {
  receiver: Address;
  basisPoints: bigint;
}

export interface RegistryOptions {
  address: Address;
  /** Account allowed to mint and to configure royalties */
  owner: Address;
  name: string;
  symbol: string;
  royalty?: RoyaltyConfig;
}

interface RegistryState {
  owners: Map<string, Address>;
  tokenApprovals: Map<string, Address>;
  operatorApprovals: Map<Address, Set<Address>>;
  royalty?: RoyaltyConfig;
  nextAssetId: bigint;
}

/**
 * Ownership, approvals and royalty bookkeeping shared by the issuance
 * registries. Asset ids are bigint and keyed by their decimal string.
 */
export abstract class BaseAssetRegistry implements AssetRegistry, RoyaltyProvider {
  public readonly address: Address;
  public readonly owner: Address;
  public readonly name: string;
  public readonly symbol: string;

  protected readonly log: Logger;
  private state: RegistryState;

  constructor(options: RegistryOptions) {
    this.address = normalizeAddress(options.address, 'address');
    this.owner = normalizeAddress(options.owner, 'owner');
    this.name = options.name;
    this.symbol = options.symbol;
    this.log = logger.child({ component: this.constructor.name, registry: this.address });
    this.state = {
      owners: new Map(),
      tokenApprovals: new Map(),
      operatorApprovals: new Map(),
      nextAssetId: 1n
    };
    if (options.royalty) {
      this.setDefaultRoyalty(this.owner, options.royalty.receiver, options.royalty.basisPoints);
    }
  }

  /** Extra rules a concrete registry applies before an asset is created. */
  protected abstract assertCanMint(assetId: bigint): void;

  get totalSupply(): number {
    return this.state.owners.size;
  }

  mint(caller: Address, to: Address, assetId?: bigint): bigint {
    this.assertOwner(caller);
    const recipient = normalizeAddress(to, 'to');
    if (isZeroOrBurn(recipient)) {
      throw ValidationError.invalidAddress('to');
    }

    const id = assetId ?? this.nextFreeId();
    if (id <= 0n) {
      throw ValidationError.invalidField('assetId', 'must be greater than zero');
    }
    if (this.state.owners.has(id.toString())) {
      throw ConflictError.alreadyExists('Asset', { assetId: id.toString() });
    }
    this.assertCanMint(id);

    this.state.owners.set(id.toString(), recipient);
    if (id >= this.state.nextAssetId) {
      this.state.nextAssetId = id + 1n;
    }

    this.log.info('Asset minted', { assetId: id, to: recipient });
    return id;
  }

  ownerOf(assetId: bigint): Address {
    const owner = this.state.owners.get(assetId.toString());
    if (!owner) {
      throw new NotFoundError('Asset', { assetId: assetId.toString(), registry: this.address });
    }
    return owner;
  }

  exists(assetId: bigint): boolean {
    return this.state.owners.has(assetId.toString());
  }

  approve(caller: Address, operator: Address, assetId: bigint): void {
    const owner = this.ownerOf(assetId);
    const sender = normalizeAddress(caller, 'caller');
    if (!sameAddress(owner, sender) && !this.isApprovedForAll(owner, sender)) {
      throw new AuthorizationError('Unauthorized: caller is not the asset owner', {
        assetId: assetId.toString(),
        caller: sender
      });
    }
    this.state.tokenApprovals.set(assetId.toString(), normalizeAddress(operator, 'operator'));
  }

  getApproved(assetId: bigint): Address {
    this.ownerOf(assetId);
    return this.state.tokenApprovals.get(assetId.toString()) ?? ZERO_ADDRESS;
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    const owner = normalizeAddress(caller, 'caller');
    const normalizedOperator = normalizeAddress(operator, 'operator');
    const operators = this.state.operatorApprovals.get(owner) ?? new Set<Address>();
    if (approved) {
      operators.add(normalizedOperator);
    } else {
      operators.delete(normalizedOperator);
    }
    this.state.operatorApprovals.set(owner, operators);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    const operators = this.state.operatorApprovals.get(owner.toLowerCase());
    return operators ? operators.has(operator.toLowerCase()) : false;
  }

  isApprovedForTransfer(assetId: bigint, operator: Address): boolean {
    const owner = this.state.owners.get(assetId.toString());
    if (!owner) {
      return false;
    }
    const approved = this.state.tokenApprovals.get(assetId.toString());
    return (approved !== undefined && sameAddress(approved, operator)) || this.isApprovedForAll(owner, operator);
  }

  transferOwnership(from: Address, to: Address, assetId: bigint, operator: Address): void {
    const owner = this.state.owners.get(assetId.toString());
    if (!owner || !sameAddress(owner, from)) {
      throw new TransferError('Asset transfer from incorrect owner', {
        assetId: assetId.toString(),
        from,
        registry: this.address
      });
    }
    if (!sameAddress(operator, owner) && !this.isApprovedForTransfer(assetId, operator)) {
      throw new TransferError('Asset transfer caller is not owner nor approved', {
        assetId: assetId.toString(),
        operator,
        registry: this.address
      });
    }
    const recipient = to.toLowerCase();
    if (isZeroOrBurn(recipient)) {
      throw new TransferError('Asset transfer to zero or burn address', { assetId: assetId.toString() });
    }

    this.state.tokenApprovals.delete(assetId.toString());
    this.state.owners.set(assetId.toString(), normalizeAddress(recipient, 'to'));
    this.log.debug('Asset transferred', { assetId, from: owner, to: recipient, operator });
  }

  setDefaultRoyalty(caller: Address, receiver: Address, basisPoints: bigint): void {
    this.assertOwner(caller);
    if (basisPoints < 0n || basisPoints > BPS_DENOMINATOR) {
      throw ValidationError.invalidField('basisPoints', `must be between 0 and ${BPS_DENOMINATOR}`);
    }
    this.state.royalty = { receiver: normalizeAddress(receiver, 'receiver'), basisPoints };
  }

  get defaultRoyalty(): RoyaltyConfig | undefined {
    return this.state.royalty ? { ...this.state.royalty } : undefined;
  }

  supportsRoyalty(): boolean {
    return this.state.royalty !== undefined;
  }

  royaltyInfo(_assetId: bigint, salePrice: bigint): RoyaltyInfo {
    const royalty = this.state.royalty;
    if (!royalty) {
      return { receiver: ZERO_ADDRESS, amount: 0n };
    }
    return {
      receiver: royalty.receiver,
      amount: (salePrice * royalty.basisPoints) / BPS_DENOMINATOR
    };
  }

  checkpoint(): Restore {
    const snapshot = cloneState(this.state);
    return () => {
      this.state = cloneState(snapshot);
    };
  }

  protected assertOwner(caller: Address): void {
    if (!sameAddress(caller, this.owner)) {
      throw new AuthorizationError('Unauthorized: caller is not the registry owner', {
        caller,
        registry: this.address
      });
    }
  }

  private nextFreeId(): bigint {
    let id = this.state.nextAssetId;
    while (this.state.owners.has(id.toString())) {
      id += 1n;
    }
    return id;
  }
}

function cloneState(state: RegistryState): RegistryState {
  return {
    owners: new Map(state.owners),
    tokenApprovals: new Map(state.tokenApprovals),
    operatorApprovals: new Map(
      [...state.operatorApprovals.entries()].map(([owner, operators]): [Address, Set<Address>] => [owner, new Set(operators)])
    ),
    royalty: state.royalty ? { ...state.royalty } : undefined,
    nextAssetId: state.nextAssetId
  };
}
