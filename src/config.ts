import { config as dotenvConfig } from 'dotenv';
import Joi from 'joi';
import { BSC_ADDRESSES } from './utils/abi';
import { ConfigurationError } from './errors';

export const SUPPORTED_VERSIONS = [2] as const;
export type RouterVersion = (typeof SUPPORTED_VERSIONS)[number];

// Deployment constants per router version
export const DEPLOYMENTS: Record<RouterVersion, { router: string; factory: string; wrappedBase: string }> = {
  2: {
    router: BSC_ADDRESSES.PANCAKESWAP_V2_ROUTER,
    factory: BSC_ADDRESSES.PANCAKESWAP_V2_FACTORY,
    wrappedBase: BSC_ADDRESSES.WBNB,
  },
};

export interface ClientConfig {
  rpcUrl?: string;
  walletAddress?: string;
  privateKey?: string;
  chainId: number;
  version: RouterVersion;
  maxSlippage: number;
  defaultGasLimit: number;
  approvalTimeoutSeconds: number;
  approvalSettleMs: number;
}

const addressPattern = /^0x[a-fA-F0-9]{40}$/;

export const configSchema = Joi.object<ClientConfig>({
  rpcUrl: Joi.string().uri({ scheme: ['http', 'https', 'ws', 'wss'] }).optional(),
  walletAddress: Joi.string().pattern(addressPattern).optional(),
  privateKey: Joi.string().pattern(/^0x[a-fA-F0-9]{64}$/).optional(),
  chainId: Joi.number().integer().min(1).default(56),
  version: Joi.number().valid(...SUPPORTED_VERSIONS).default(2),
  maxSlippage: Joi.number().min(0).less(1).default(0.1),
  defaultGasLimit: Joi.number().integer().min(21000).default(250000),
  approvalTimeoutSeconds: Joi.number().min(0).default(6000),
  approvalSettleMs: Joi.number().integer().min(0).default(1000),
});

/**
 * Validate config values and fill in defaults.
 */
export function validateConfig(raw: Partial<ClientConfig> | Record<string, unknown>): ClientConfig {
  const { error, value } = configSchema.validate(raw, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    throw new ConfigurationError(error.details.map(detail => detail.message));
  }
  return value;
}

function numberFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function stringFromEnv(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Build the config from environment variables (and `.env`, when present).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, loadDotenv = env === process.env): ClientConfig {
  if (loadDotenv) {
    dotenvConfig();
  }

  return validateConfig({
    rpcUrl: stringFromEnv(env.PROVIDER),
    walletAddress: stringFromEnv(env.WALLET_ADDRESS),
    privateKey: stringFromEnv(env.PRIVATE_KEY),
    chainId: numberFromEnv(env.CHAIN_ID),
    version: numberFromEnv(env.ROUTER_VERSION),
    maxSlippage: numberFromEnv(env.MAX_SLIPPAGE),
    defaultGasLimit: numberFromEnv(env.DEFAULT_GAS_LIMIT),
    approvalTimeoutSeconds: numberFromEnv(env.APPROVAL_TIMEOUT_SECONDS),
    approvalSettleMs: numberFromEnv(env.APPROVAL_SETTLE_MS),
  });
}

/**
 * Config as printable JSON, secrets hidden.
 */
export function describeConfig(config: ClientConfig): string {
  const sanitized = {
    ...config,
    privateKey: config.privateKey ? '***HIDDEN***' : undefined,
    rpcUrl: config.rpcUrl?.replace(/:\/\/[^@/]+@/, '://***@'),
  };
  return JSON.stringify(sanitized, null, 2);
}
