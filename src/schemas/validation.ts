/**
 * Input Validation Schemas for the Marketplace Ledger API
 *
 * Amounts and asset ids travel as decimal strings so values beyond
 * Number.MAX_SAFE_INTEGER survive JSON. Addresses are 0x-prefixed 20-byte hex.
 */

import Joi from 'joi';
import { ADDRESS_REGEX } from '../utils/address';

const DECIMAL_REGEX = /^\d+$/;

/**
 * Common field validators
 */
export const CommonFields = {
  address: Joi.string().pattern(ADDRESS_REGEX).messages({
    'string.pattern.base': '{{#label}} must be a 0x-prefixed 20-byte hex address'
  }),

  amount: Joi.string().pattern(DECIMAL_REGEX).messages({
    'string.pattern.base': '{{#label}} must be a non-negative integer string'
  }),

  // Unix seconds
  timestamp: Joi.number().integer().min(0),

  id: Joi.number().integer().min(0)
};

// ===== PARAMS =====

export interface IdParams {
  id: number;
}

export interface AddressParams {
  address: string;
}

export interface AssetParams extends AddressParams {
  assetId: string;
}

export const idParamsSchema = Joi.object({
  id: CommonFields.id.required()
});

export const addressParamsSchema = Joi.object({
  address: CommonFields.address.required()
});

export const assetParamsSchema = Joi.object({
  address: CommonFields.address.required(),
  assetId: CommonFields.amount.required()
});

// ===== LISTINGS =====

export interface CreateListingBody {
  collection: string;
  assetId: string;
  price: string;
  isAuction: boolean;
  auctionEndTime: number;
}

export const createListingSchema = Joi.object({
  collection: CommonFields.address.required(),
  assetId: CommonFields.amount.required(),
  price: CommonFields.amount.required(),
  isAuction: Joi.boolean().default(false),
  auctionEndTime: CommonFields.timestamp.default(0)
});

export interface UpdatePriceBody {
  price: string;
}

export const updatePriceSchema = Joi.object({
  price: CommonFields.amount.required()
});

export interface ExtendAuctionBody {
  auctionEndTime: number;
}

export const extendAuctionSchema = Joi.object({
  auctionEndTime: CommonFields.timestamp.required()
});

export interface BuyBody {
  value: string;
  receiver?: string;
}

export const buySchema = Joi.object({
  value: CommonFields.amount.required(),
  receiver: CommonFields.address.optional()
});

// ===== BIDS =====

export interface PlaceBidBody {
  amount: string;
  /** Attached payment; defaults to `amount` */
  value?: string;
}

export const placeBidSchema = Joi.object({
  amount: CommonFields.amount.required(),
  value: CommonFields.amount.optional()
});

// ===== COLLECTIONS =====

export interface RoyaltyBody {
  receiver: string;
  basisPoints: number;
}

export interface DeployCollectionBody {
  kind: 'single-edition' | 'bounded-collection';
  salt: string;
  name: string;
  symbol: string;
  maxSupply?: number;
  royalty?: RoyaltyBody;
}

export const deployCollectionSchema = Joi.object({
  kind: Joi.string().valid('single-edition', 'bounded-collection').required(),
  salt: Joi.string().min(1).max(128).required(),
  name: Joi.string().min(1).max(100).required(),
  symbol: Joi.string().min(1).max(16).required(),
  maxSupply: Joi.number().integer().min(1).when('kind', {
    is: 'bounded-collection',
    then: Joi.required(),
    otherwise: Joi.forbidden()
  }),
  royalty: Joi.object({
    receiver: CommonFields.address.required(),
    basisPoints: Joi.number().integer().min(0).max(10000).required()
  }).optional()
});

export interface MintBody {
  to: string;
  assetId?: string;
}

export const mintSchema = Joi.object({
  to: CommonFields.address.required(),
  assetId: CommonFields.amount.optional()
});

export interface ApproveBody {
  operator: string;
  assetId: string;
}

export const approveSchema = Joi.object({
  operator: CommonFields.address.required(),
  assetId: CommonFields.amount.required()
});

export interface OperatorApprovalBody {
  operator: string;
  approved: boolean;
}

export const operatorApprovalSchema = Joi.object({
  operator: CommonFields.address.required(),
  approved: Joi.boolean().required()
});

// ===== ACCOUNTS & ADMIN =====

export interface DepositBody {
  amount: string;
}

export const depositSchema = Joi.object({
  amount: CommonFields.amount.required()
});

export interface TransferAdminBody {
  newAdmin: string;
}

export const transferAdminSchema = Joi.object({
  newAdmin: CommonFields.address.required()
});
