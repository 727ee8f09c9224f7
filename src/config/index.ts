import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

const DEFAULT_ADMIN = '0x000000000000000000000000000000000000ad11';

export interface ServiceConfig {
  env: string;
  port: number;
  serviceName: string;
  jwtSecret: string;
  marketplaceAddress: string;
  marketplaceAdmin: string;
  factoryAddress: string;
  rateLimit: {
    max: number;
    timeWindow: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    env: env.NODE_ENV || 'development',
    port: parseInt(env.PORT || '3008', 10),
    serviceName: env.SERVICE_NAME || 'marketplace-ledger',

    // JWT
    jwtSecret: env.JWT_SECRET || 'development-only-secret-change-me-now',

    // Ledger identity
    marketplaceAddress: env.MARKETPLACE_ADDRESS || '0x00000000000000000000000000000000000a11ce',
    marketplaceAdmin: env.MARKETPLACE_ADMIN || DEFAULT_ADMIN,
    factoryAddress: env.FACTORY_ADDRESS || '0x0000000000000000000000000000000000fac701',

    rateLimit: {
      max: parseInt(env.RATE_LIMIT_MAX || '100', 10),
      timeWindow: env.RATE_LIMIT_WINDOW || '1 minute'
    }
  };
}

export const config = loadConfig();
export default config;
