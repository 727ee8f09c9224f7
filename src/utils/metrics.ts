import { Registry, Counter, collectDefaultMetrics } from 'prom-client';

// Create a custom registry
export const register = new Registry();

if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register, prefix: 'marketplace_ledger_' });
}

// ===== LISTING METRICS =====

export const listingsCreatedTotal = new Counter({
  name: 'marketplace_listings_created_total',
  help: 'Total number of listings created',
  labelNames: ['mode'],
  registers: [register]
});

export const listingsDelistedTotal = new Counter({
  name: 'marketplace_listings_delisted_total',
  help: 'Total number of listings removed by their seller',
  registers: [register]
});

// ===== SETTLEMENT METRICS =====

export const salesTotal = new Counter({
  name: 'marketplace_sales_total',
  help: 'Total number of settled sales',
  labelNames: ['path'],
  registers: [register]
});

export const royaltiesForfeitedTotal = new Counter({
  name: 'marketplace_royalties_forfeited_total',
  help: 'Royalty payments forfeited during bid acceptance',
  registers: [register]
});

// ===== BID METRICS =====

export const bidsPlacedTotal = new Counter({
  name: 'marketplace_bids_placed_total',
  help: 'Total number of bids placed',
  registers: [register]
});

export const bidsWithdrawnTotal = new Counter({
  name: 'marketplace_bids_withdrawn_total',
  help: 'Total number of bids withdrawn by their bidder',
  registers: [register]
});

// ===== FAILURE METRICS =====

export const operationsFailedTotal = new Counter({
  name: 'marketplace_operations_failed_total',
  help: 'Ledger operations aborted, by operation and error code',
  labelNames: ['operation', 'code'],
  registers: [register]
});
