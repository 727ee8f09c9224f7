import { FastifyReply } from 'fastify';
import { MarketplaceDependencies } from '../config/dependencies';
import { InvalidStateError } from '../errors';
import { AuthRequest, getUser } from '../middleware/auth.middleware';
import { BaseAssetRegistry, RoyaltyConfig } from '../registries/base.registry';
import { BoundedCollectionRegistry } from '../registries/bounded-collection.registry';
import {
  AddressParams,
  ApproveBody,
  AssetParams,
  DeployCollectionBody,
  MintBody,
  OperatorApprovalBody
} from '../schemas/validation';
import { serialize } from '../utils/serialize';

function describeRegistry(registry: BaseAssetRegistry) {
  return {
    address: registry.address,
    owner: registry.owner,
    name: registry.name,
    symbol: registry.symbol,
    totalSupply: registry.totalSupply,
    maxSupply: registry instanceof BoundedCollectionRegistry ? registry.maxSupply : null,
    royalty: registry.defaultRoyalty ?? null,
  };
}

export class CollectionController {
  constructor(private readonly deps: MarketplaceDependencies) {}

  async deployCollection(request: AuthRequest<{ Body: DeployCollectionBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const body = request.body;
    const royalty: RoyaltyConfig | undefined = body.royalty
      ? { receiver: body.royalty.receiver, basisPoints: BigInt(body.royalty.basisPoints) }
      : undefined;
    const params = { name: body.name, symbol: body.symbol, royalty };

    const registry =
      body.kind === 'bounded-collection'
        ? this.deps.factory.deployBoundedCollection(user.address, body.salt, {
            ...params,
            maxSupply: body.maxSupply ?? 0,
          })
        : this.deps.factory.deploySingleEdition(user.address, body.salt, params);

    reply.status(201).send({
      success: true,
      data: serialize({ kind: body.kind, ...describeRegistry(registry) }),
    });
  }

  async listCollections(_request: AuthRequest, reply: FastifyReply) {
    const collections = this.deps.registries
      .list()
      .filter((registry): registry is BaseAssetRegistry => registry instanceof BaseAssetRegistry)
      .map(describeRegistry);

    reply.send({
      success: true,
      data: serialize(collections),
    });
  }

  async getCollection(request: AuthRequest<{ Params: AddressParams }>, reply: FastifyReply) {
    reply.send({
      success: true,
      data: serialize(describeRegistry(this.resolveIssuer(request.params.address))),
    });
  }

  async mint(request: AuthRequest<{ Params: AddressParams; Body: MintBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const registry = this.resolveIssuer(request.params.address);
    const assetId = registry.mint(
      user.address,
      request.body.to,
      request.body.assetId === undefined ? undefined : BigInt(request.body.assetId)
    );

    reply.status(201).send({
      success: true,
      data: serialize({ collection: registry.address, assetId, owner: registry.ownerOf(assetId) }),
    });
  }

  async approve(request: AuthRequest<{ Params: AddressParams; Body: ApproveBody }>, reply: FastifyReply) {
    const user = getUser(request);
    const registry = this.resolveIssuer(request.params.address);
    const assetId = BigInt(request.body.assetId);
    registry.approve(user.address, request.body.operator, assetId);

    reply.send({
      success: true,
      data: serialize({ collection: registry.address, assetId, approved: registry.getApproved(assetId) }),
    });
  }

  async setApprovalForAll(
    request: AuthRequest<{ Params: AddressParams; Body: OperatorApprovalBody }>,
    reply: FastifyReply
  ) {
    const user = getUser(request);
    const registry = this.resolveIssuer(request.params.address);
    registry.setApprovalForAll(user.address, request.body.operator, request.body.approved);

    reply.send({
      success: true,
      data: {
        collection: registry.address,
        owner: user.address,
        operator: request.body.operator.toLowerCase(),
        approved: registry.isApprovedForAll(user.address, request.body.operator),
      },
    });
  }

  async getAsset(request: AuthRequest<{ Params: AssetParams }>, reply: FastifyReply) {
    const registry = this.resolveIssuer(request.params.address);
    const assetId = BigInt(request.params.assetId);

    reply.send({
      success: true,
      data: serialize({
        collection: registry.address,
        assetId,
        owner: registry.ownerOf(assetId),
        approved: registry.getApproved(assetId),
      }),
    });
  }

  private resolveIssuer(address: string): BaseAssetRegistry {
    const registry = this.deps.registries.resolve(address);
    if (!(registry instanceof BaseAssetRegistry)) {
      throw new InvalidStateError('Collection does not support issuance', { collection: address });
    }
    return registry;
  }
}
