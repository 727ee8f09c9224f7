import { FastifyInstance } from 'fastify';
import { CollectionController } from '../controllers/collection.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import { validate, validateParams } from '../middleware/validation.middleware';
import {
  AddressParams,
  ApproveBody,
  AssetParams,
  DeployCollectionBody,
  MintBody,
  OperatorApprovalBody,
  addressParamsSchema,
  approveSchema,
  assetParamsSchema,
  deployCollectionSchema,
  mintSchema,
  operatorApprovalSchema
} from '../schemas/validation';
import type { RouteDependencies } from './index';

export default async function collectionsRoutes(fastify: FastifyInstance, opts: RouteDependencies) {
  const collectionController = new CollectionController(opts.deps);
  const withAddress = validateParams(addressParamsSchema);

  fastify.get('/', collectionController.listCollections.bind(collectionController));

  fastify.get<{ Params: AddressParams }>('/:address', {
    preHandler: [withAddress]
  }, collectionController.getCollection.bind(collectionController));

  fastify.get<{ Params: AssetParams }>('/:address/assets/:assetId', {
    preHandler: [validateParams(assetParamsSchema)]
  }, collectionController.getAsset.bind(collectionController));

  // Deploy a registry owned by the caller
  fastify.post<{ Body: DeployCollectionBody }>('/', {
    preHandler: [authMiddleware, validate(deployCollectionSchema)]
  }, collectionController.deployCollection.bind(collectionController));

  fastify.post<{ Params: AddressParams; Body: MintBody }>('/:address/mint', {
    preHandler: [authMiddleware, withAddress, validate(mintSchema)]
  }, collectionController.mint.bind(collectionController));

  fastify.post<{ Params: AddressParams; Body: ApproveBody }>('/:address/approve', {
    preHandler: [authMiddleware, withAddress, validate(approveSchema)]
  }, collectionController.approve.bind(collectionController));

  fastify.post<{ Params: AddressParams; Body: OperatorApprovalBody }>('/:address/operators', {
    preHandler: [authMiddleware, withAddress, validate(operatorApprovalSchema)]
  }, collectionController.setApprovalForAll.bind(collectionController));
}
