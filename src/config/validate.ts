/**
 * Configuration Validation for the Marketplace Ledger
 *
 * Every setting the service reads is declared here once, with its default and
 * a validator. Startup fails in production when a required value is missing.
 */

import { ConfigurationError } from '../errors';
import { isAddress, isZeroOrBurn } from '../utils/address';
import { logger } from '../utils/logger';

export interface ConfigRequirement {
  name: string;
  required: boolean;
  sensitive?: boolean;
  validator?: (value: string) => boolean;
  default?: string;
  description: string;
}

const usableAddress = (v: string) => isAddress(v) && !isZeroOrBurn(v);

export const CONFIG_REQUIREMENTS: ConfigRequirement[] = [
  // Auth
  {
    name: 'JWT_SECRET',
    required: true,
    sensitive: true,
    validator: (v) => v.length >= 32,
    description: 'JWT signing secret (min 32 chars)'
  },

  // Ledger identity
  {
    name: 'MARKETPLACE_ADDRESS',
    required: false,
    default: '0x00000000000000000000000000000000000a11ce',
    validator: usableAddress,
    description: 'Account of the marketplace ledger (approved operator and bid custodian)'
  },
  {
    name: 'MARKETPLACE_ADMIN',
    required: true,
    validator: usableAddress,
    description: 'Administrator allowed to pause the ledger'
  },
  {
    name: 'FACTORY_ADDRESS',
    required: false,
    default: '0x0000000000000000000000000000000000fac701',
    validator: usableAddress,
    description: 'Address the deployment factory derives collection addresses from'
  },

  // Application
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Runtime environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3008',
    validator: (v) => /^\d+$/.test(v) && parseInt(v, 10) > 0 && parseInt(v, 10) < 65536,
    description: 'HTTP port to listen on'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
  },

  // Rate Limiting
  {
    name: 'RATE_LIMIT_MAX',
    required: false,
    default: '100',
    validator: (v) => /^\d+$/.test(v) && parseInt(v, 10) > 0,
    description: 'Max requests per window'
  },
  {
    name: 'RATE_LIMIT_WINDOW',
    required: false,
    default: '1 minute',
    description: 'Rate limit time window'
  }
];

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: Record<string, string>;
}

export function validateConfig(
  env: NodeJS.ProcessEnv = process.env,
  requirements: ConfigRequirement[] = CONFIG_REQUIREMENTS
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: Record<string, string> = {};

  for (const requirement of requirements) {
    const value = env[requirement.name];

    if (!value) {
      if (requirement.required) {
        errors.push(`Missing required config: ${requirement.name} (${requirement.description})`);
      } else if (requirement.default !== undefined) {
        config[requirement.name] = requirement.default;
        warnings.push(`Using default for ${requirement.name}: ${requirement.sensitive ? '[REDACTED]' : requirement.default}`);
      }
      continue;
    }

    if (requirement.validator && !requirement.validator(value)) {
      errors.push(`Invalid config: ${requirement.name} - value doesn't pass validation (${requirement.description})`);
      continue;
    }

    config[requirement.name] = value;
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config
  };
}

/**
 * Run validation and fail fast if invalid
 */
export function validateAndFail(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const log = logger.child({ component: 'ConfigValidation' });
  const result = validateConfig(env);

  for (const warning of result.warnings) {
    log.warn(warning);
  }

  if (!result.valid) {
    log.error('Configuration validation failed', { errors: result.errors });

    if (env.NODE_ENV === 'production') {
      throw new ConfigurationError(`Configuration validation failed:\n${result.errors.join('\n')}`, {
        errors: result.errors
      });
    }
    log.warn('Continuing with invalid configuration (development mode)');
  } else {
    log.info('Configuration validation passed', {
      configuredKeys: Object.keys(result.config).length
    });
  }

  return result.config;
}
