import { FastifyInstance } from 'fastify';
import jwt from 'jsonwebtoken';
import { buildApp } from '../../src/app';
import { config } from '../../src/config';
import { MarketplaceDependencies, createDependencies } from '../../src/config/dependencies';
import { ADDRESSES, ManualClock, START_TIME } from '../fixtures/marketplace';

const PREFIX = '/api/v1/marketplace';

function authHeader(address: string, roles: string[] = []) {
  return { authorization: `Bearer ${jwt.sign({ sub: address, roles }, 'test-secret')}` };
}

describe('Marketplace API', () => {
  let app: FastifyInstance;
  let deps: MarketplaceDependencies;
  let collection: string;

  beforeEach(async () => {
    deps = createDependencies(config, new ManualClock());
    app = await buildApp(deps);

    const deployed = await app.inject({
      method: 'POST',
      url: `${PREFIX}/collections`,
      headers: authHeader(ADDRESSES.issuer),
      payload: {
        kind: 'single-edition',
        salt: 'art',
        name: 'Art',
        symbol: 'ART',
        royalty: { receiver: ADDRESSES.royalty, basisPoints: 1000 }
      }
    });
    collection = deployed.json().data.address;
  });

  afterEach(async () => {
    await app.close();
  });

  async function mintAndApprove(assetId: string) {
    await app.inject({
      method: 'POST',
      url: `${PREFIX}/collections/${collection}/mint`,
      headers: authHeader(ADDRESSES.issuer),
      payload: { to: ADDRESSES.seller, assetId }
    });
    await app.inject({
      method: 'POST',
      url: `${PREFIX}/collections/${collection}/approve`,
      headers: authHeader(ADDRESSES.seller),
      payload: { operator: ADDRESSES.marketplace, assetId }
    });
  }

  async function deposit(address: string, amount: string) {
    return app.inject({
      method: 'POST',
      url: `${PREFIX}/accounts/${address}/deposit`,
      headers: authHeader(ADDRESSES.admin, ['admin']),
      payload: { amount }
    });
  }

  describe('health and metrics', () => {
    it('reports health without authentication', async () => {
      const response = await app.inject({ method: 'GET', url: `${PREFIX}/health` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'healthy', service: 'marketplace-ledger', paused: false });
    });

    it('serves prometheus metrics', async () => {
      const response = await app.inject({ method: 'GET', url: `${PREFIX}/metrics` });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toContain('# HELP marketplace_sales_total Total number of settled sales');
    });
  });

  describe('collections', () => {
    it('deploys at the predicted address with its royalty', async () => {
      const response = await app.inject({ method: 'GET', url: `${PREFIX}/collections/${collection}` });

      expect(collection).toBe(deps.factory.predictAddress('single-edition', 'art'));
      expect(response.json().data).toEqual({
        address: collection,
        owner: ADDRESSES.issuer,
        name: 'Art',
        symbol: 'ART',
        totalSupply: 0,
        maxSupply: null,
        royalty: { receiver: ADDRESSES.royalty, basisPoints: '1000' }
      });
    });

    it('mints only for the registry owner', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/collections/${collection}/mint`,
        headers: authHeader(ADDRESSES.stranger),
        payload: { to: ADDRESSES.stranger }
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'UNAUTHORIZED', message: 'Unauthorized: caller is not the registry owner' }
      });
    });

    it('reports asset ownership', async () => {
      await mintAndApprove('7');

      const response = await app.inject({ method: 'GET', url: `${PREFIX}/collections/${collection}/assets/7` });

      expect(response.json().data).toEqual({
        collection,
        assetId: '7',
        owner: ADDRESSES.seller,
        approved: ADDRESSES.marketplace
      });
    });

    it('rejects a second deployment with the same salt', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/collections`,
        headers: authHeader(ADDRESSES.issuer),
        payload: { kind: 'bounded-collection', salt: 'art', name: 'Other', symbol: 'OTH', maxSupply: 5 }
      });

      expect(response.statusCode).toBe(201);

      const again = await app.inject({
        method: 'POST',
        url: `${PREFIX}/collections`,
        headers: authHeader(ADDRESSES.issuer),
        payload: { kind: 'single-edition', salt: 'art', name: 'Again', symbol: 'AGN' }
      });

      expect(again.statusCode).toBe(409);
      expect(again.json().error).toEqual({ code: 'CONFLICT', message: 'Deployment already exists' });
    });
  });

  describe('authentication', () => {
    it('requires a bearer token for mutations', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        payload: { collection, assetId: '7', price: '100' }
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' }
      });
    });

    it('rejects tokens signed with another secret', async () => {
      const token = jwt.sign({ sub: ADDRESSES.seller }, 'other-secret');
      const response = await app.inject({
        method: 'DELETE',
        url: `${PREFIX}/listings/1`,
        headers: { authorization: `Bearer ${token}` }
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.code).toBe('INVALID_TOKEN');
    });

    it('requires the admin role for deposits', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/accounts/${ADDRESSES.buyer}/deposit`,
        headers: authHeader(ADDRESSES.buyer),
        payload: { amount: '100' }
      });

      expect(response.statusCode).toBe(403);
      expect(deps.bank.balanceOf(ADDRESSES.buyer)).toBe(0n);
    });
  });

  describe('direct sale', () => {
    beforeEach(async () => {
      await mintAndApprove('7');
      await deposit(ADDRESSES.buyer, '100');
    });

    it('lists, sells and routes the royalty', async () => {
      const listed = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        headers: authHeader(ADDRESSES.seller),
        payload: { collection, assetId: '7', price: '100' }
      });

      expect(listed.statusCode).toBe(201);
      expect(listed.json().data).toEqual({
        listingId: 1,
        assetId: '7',
        price: '100',
        collection,
        seller: ADDRESSES.seller,
        auctionEndTime: 0,
        forSale: true,
        onAuction: false
      });

      const sold = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings/1/buy`,
        headers: authHeader(ADDRESSES.buyer),
        payload: { value: '100' }
      });

      expect(sold.statusCode).toBe(200);
      expect(sold.json().data).toEqual({
        listingId: 1,
        buyer: ADDRESSES.buyer,
        price: '100',
        royaltyReceiver: ADDRESSES.royalty,
        royaltyAmount: '10',
        sellerProceeds: '90'
      });

      const balance = await app.inject({ method: 'GET', url: `${PREFIX}/accounts/${ADDRESSES.seller}/balance` });
      expect(balance.json().data).toEqual({ address: ADDRESSES.seller, balance: '90' });
    });

    it('renders ledger errors with their status', async () => {
      await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        headers: authHeader(ADDRESSES.seller),
        payload: { collection, assetId: '7', price: '100' }
      });

      const underpaid = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings/1/buy`,
        headers: authHeader(ADDRESSES.buyer),
        payload: { value: '99' }
      });
      expect(underpaid.statusCode).toBe(400);
      expect(underpaid.json().error).toEqual({
        code: 'INVALID_INPUT',
        message: 'Attached payment does not match the required amount',
        details: [{ field: 'value', message: 'expected 100, received 99' }]
      });

      const stranger = await app.inject({
        method: 'PUT',
        url: `${PREFIX}/listings/1/price`,
        headers: authHeader(ADDRESSES.stranger),
        payload: { price: '1' }
      });
      expect(stranger.statusCode).toBe(403);

      const missing = await app.inject({ method: 'GET', url: `${PREFIX}/listings/99` });
      expect(missing.statusCode).toBe(404);
      expect(missing.json().error).toEqual({ code: 'NOT_FOUND', message: 'Listing not found' });
    });

    it('validates request bodies', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        headers: authHeader(ADDRESSES.seller),
        payload: { collection: 'not-an-address', assetId: '7', price: '-1' }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
      expect(response.json().error.details.map((detail: { field: string }) => detail.field)).toEqual([
        'collection',
        'price'
      ]);
    });
  });

  describe('auction', () => {
    beforeEach(async () => {
      await mintAndApprove('9');
      await deposit(ADDRESSES.bidderA, '50');
      await deposit(ADDRESSES.bidderB, '80');
      await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        headers: authHeader(ADDRESSES.seller),
        payload: { collection, assetId: '9', price: '0', isAuction: true, auctionEndTime: START_TIME + 3600 }
      });
    });

    async function bid(bidder: string, amount: string) {
      return app.inject({
        method: 'POST',
        url: `${PREFIX}/listings/1/bids`,
        headers: authHeader(bidder),
        payload: { amount }
      });
    }

    it('accepts one bid and refunds the other on withdrawal', async () => {
      const first = await bid(ADDRESSES.bidderA, '50');
      expect(first.statusCode).toBe(201);
      expect(first.json().data).toEqual({ bidId: 0, listingId: 1, amount: '50', bidder: ADDRESSES.bidderA });
      await bid(ADDRESSES.bidderB, '80');

      const bids = await app.inject({ method: 'GET', url: `${PREFIX}/listings/1/bids` });
      expect(bids.json().data).toHaveLength(2);

      const accepted = await app.inject({
        method: 'POST',
        url: `${PREFIX}/bids/1/accept`,
        headers: authHeader(ADDRESSES.seller)
      });
      expect(accepted.statusCode).toBe(200);
      expect(accepted.json().data).toMatchObject({
        bidId: 1,
        buyer: ADDRESSES.bidderB,
        price: '80',
        royaltyAmount: '8',
        sellerProceeds: '72',
        royaltyForfeited: false
      });

      const withdrawn = await app.inject({
        method: 'DELETE',
        url: `${PREFIX}/bids/0`,
        headers: authHeader(ADDRESSES.bidderA)
      });
      expect(withdrawn.json().data).toEqual({ bidId: 0, refunded: '50' });
      expect(deps.bank.balanceOf(ADDRESSES.bidderA)).toBe(50n);
      expect(deps.ledger.heldBalance()).toBe(0n);
    });

    it('rejects bids on a direct-sale listing', async () => {
      await mintAndApprove('10');
      await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        headers: authHeader(ADDRESSES.seller),
        payload: { collection, assetId: '10', price: '5' }
      });

      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings/2/bids`,
        headers: authHeader(ADDRESSES.bidderA),
        payload: { amount: '5' }
      });

      expect(response.statusCode).toBe(409);
      expect(response.json().error).toEqual({ code: 'INVALID_STATE', message: 'Listing is not on auction' });
    });
  });

  describe('administration', () => {
    it('pauses and unpauses the ledger for the configured admin', async () => {
      const paused = await app.inject({
        method: 'POST',
        url: `${PREFIX}/admin/pause`,
        headers: authHeader(ADDRESSES.admin, ['admin'])
      });
      expect(paused.json()).toEqual({ success: true, data: { paused: true } });

      await mintAndApprove('7');
      const listed = await app.inject({
        method: 'POST',
        url: `${PREFIX}/listings`,
        headers: authHeader(ADDRESSES.seller),
        payload: { collection, assetId: '7', price: '100' }
      });
      expect(listed.statusCode).toBe(409);
      expect(listed.json().error.message).toBe('Marketplace is paused');

      const status = await app.inject({ method: 'GET', url: `${PREFIX}/admin/status` });
      expect(status.json().data).toMatchObject({ paused: true, admin: ADDRESSES.admin, listingCount: 0 });

      await app.inject({
        method: 'POST',
        url: `${PREFIX}/admin/unpause`,
        headers: authHeader(ADDRESSES.admin, ['admin'])
      });
      expect(deps.ledger.isPaused()).toBe(false);
    });

    it('refuses admin-role callers that are not the ledger admin', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/admin/pause`,
        headers: authHeader(ADDRESSES.stranger, ['admin'])
      });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.message).toBe('Unauthorized: caller is not the administrator');
      expect(deps.ledger.isPaused()).toBe(false);
    });
  });
});
