/**
 * Environment Configuration
 * Validates the environment and builds the typed executor config
 */

import { z } from 'zod';
import { getAddress, isAddress, parseGwei, parseUnits } from 'viem';
import type { Address, ChainId, Hex, RiskThresholds } from '../../../shared/schema.js';
import { ConfigurationError } from '../errors.js';

const decimalPattern = /^\d+(\.\d+)?$/;
const uintPattern = /^\d+$/;
const privateKeyPattern = /^0x[0-9a-fA-F]{64}$/;

const addressSchema = z
  .string()
  .trim()
  .refine((value) => isAddress(value, { strict: false }), 'Invalid Ethereum address')
  .transform((value): Address => getAddress(value));

const addressListSchema = z
  .string()
  .default('')
  .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean))
  .pipe(z.array(addressSchema));

// token=key pairs, comma separated
const priceKeysSchema = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter(Boolean)
      .map((entry) => entry.split('=').map((side) => side.trim()))
  )
  .pipe(z.array(z.tuple([addressSchema, addressSchema])))
  .transform((pairs): Record<Address, Address> => Object.fromEntries(pairs));

const decimalString = (message: string) => z.string().trim().regex(decimalPattern, message);

const positiveInt = (fallback: string) =>
  z.string().default(fallback).pipe(z.coerce.number().int().positive());

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt('3000'),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  LOG_LEVEL: z.string().optional(),

  // Chain access
  // Price oracles are Chainlink Feed Registries, which exist on Ethereum mainnet only
  CHAIN: z
    .enum(['ethereum'], {
      errorMap: () => ({ message: 'CHAIN must be ethereum: the Chainlink Feed Registry is only deployed on mainnet' }),
    })
    .default('ethereum'),
  RPC_URL: z.string().url('RPC_URL must be a URL'),

  // Operator
  OPERATOR_ADDRESS: addressSchema,
  OPERATOR_API_KEY: z.string().min(16, 'OPERATOR_API_KEY must be at least 16 characters'),
  EXECUTOR_PRIVATE_KEY: z
    .string()
    .trim()
    .refine((value): value is Hex => privateKeyPattern.test(value), 'EXECUTOR_PRIVATE_KEY must be a 32-byte hex string'),

  // Collaborators
  ROUTER_ADDRESSES: addressListSchema.refine((list) => list.length > 0, 'At least one router is required'),
  PRICE_ORACLE_ADDRESSES: addressListSchema.refine((list) => list.length > 0, 'At least one price oracle is required'),
  PRICE_FEED_KEYS: priceKeysSchema,
  GAS_PRICE_ORACLE_ADDRESS: addressSchema,
  LENDING_POOL_ADDRESS: addressSchema,
  FLASH_RECEIVER_ADDRESS: addressSchema,

  // Tokens
  MONITORED_TOKENS: addressListSchema,
  BASE_TOKEN_ADDRESS: addressSchema,
  STABLE_TOKEN_ADDRESS: addressSchema,

  // Risk thresholds
  GAS_PRICE_LIMIT_GWEI: decimalString('GAS_PRICE_LIMIT_GWEI must be a decimal number').default('100'),
  PROFIT_THRESHOLD_USD: decimalString('PROFIT_THRESHOLD_USD must be a decimal number').default('10'),
  SUPER_PROFIT_THRESHOLD_USD: decimalString('SUPER_PROFIT_THRESHOLD_USD must be a decimal number').default('1000'),
  LIQUIDITY_THRESHOLD_USD: decimalString('LIQUIDITY_THRESHOLD_USD must be a decimal number').default('100000'),

  // Executor
  ORACLE_MAX_AGE_SEC: positiveInt('3600'),
  COLLABORATOR_TIMEOUT_MS: positiveInt('10000'),
  EXECUTION_TIMEOUT_MS: positiveInt('120000'),
  FLASHLOAN_TIMEOUT_MS: positiveInt('300000'),
  DIRECT_GAS_UNITS: z.string().regex(uintPattern, 'DIRECT_GAS_UNITS must be an integer').default('250000'),
  FLASHLOAN_GAS_UNITS: z.string().regex(uintPattern, 'FLASHLOAN_GAS_UNITS must be an integer').default('450000'),
  SUPER_PROFIT_SLIPPAGE_BPS: z.string().default('50').pipe(z.coerce.number().int().min(0).max(10000)),
  SCAN_INTERVAL_MS: positiveInt('5000'),

  // Database
  DATABASE_URL: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  server: {
    nodeEnv: Env['NODE_ENV'];
    port: number;
    corsOrigin: string;
  };
  chain: {
    id: ChainId;
    rpcUrl: string;
  };
  operator: {
    address: Address;
    apiKey: string;
  };
  signer: {
    privateKey: Hex;
  };
  collaborators: {
    routers: Address[];
    priceOracles: Address[];
    priceKeys: Record<Address, Address>;
    gasPriceOracle: Address;
    lendingPool: Address;
    flashReceiver: Address;
  };
  tokens: {
    monitored: Address[];
    base: Address;
    stable: Address;
  };
  thresholds: RiskThresholds;
  executor: {
    oracleMaxAgeSec: number;
    collaboratorTimeoutMs: number;
    executionTimeoutMs: number;
    flashLoanTimeoutMs: number;
    directGasUnits: bigint;
    flashloanGasUnits: bigint;
    superProfitSlippageBps: number;
    scanIntervalMs: number;
  };
  databaseUrl: string | undefined;
}

/**
 * Parse the environment into the executor config.
 * Throws ConfigurationError with the offending fields.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment variables', {
      fields: parsed.error.flatten().fieldErrors,
    });
  }
  const env = parsed.data;

  return {
    server: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      corsOrigin: env.CORS_ORIGIN,
    },
    chain: {
      id: env.CHAIN,
      rpcUrl: env.RPC_URL,
    },
    operator: {
      address: env.OPERATOR_ADDRESS,
      apiKey: env.OPERATOR_API_KEY,
    },
    signer: {
      privateKey: env.EXECUTOR_PRIVATE_KEY,
    },
    collaborators: {
      routers: env.ROUTER_ADDRESSES,
      priceOracles: env.PRICE_ORACLE_ADDRESSES,
      priceKeys: env.PRICE_FEED_KEYS,
      gasPriceOracle: env.GAS_PRICE_ORACLE_ADDRESS,
      lendingPool: env.LENDING_POOL_ADDRESS,
      flashReceiver: env.FLASH_RECEIVER_ADDRESS,
    },
    tokens: {
      monitored: env.MONITORED_TOKENS,
      base: env.BASE_TOKEN_ADDRESS,
      stable: env.STABLE_TOKEN_ADDRESS,
    },
    thresholds: {
      gasPriceLimit: parseGwei(env.GAS_PRICE_LIMIT_GWEI),
      profitThreshold: parseUnits(env.PROFIT_THRESHOLD_USD, 18),
      superProfitThreshold: parseUnits(env.SUPER_PROFIT_THRESHOLD_USD, 18),
      liquidityThreshold: parseUnits(env.LIQUIDITY_THRESHOLD_USD, 18),
    },
    executor: {
      oracleMaxAgeSec: env.ORACLE_MAX_AGE_SEC,
      collaboratorTimeoutMs: env.COLLABORATOR_TIMEOUT_MS,
      executionTimeoutMs: env.EXECUTION_TIMEOUT_MS,
      flashLoanTimeoutMs: env.FLASHLOAN_TIMEOUT_MS,
      directGasUnits: BigInt(env.DIRECT_GAS_UNITS),
      flashloanGasUnits: BigInt(env.FLASHLOAN_GAS_UNITS),
      superProfitSlippageBps: env.SUPER_PROFIT_SLIPPAGE_BPS,
      scanIntervalMs: env.SCAN_INTERVAL_MS,
    },
    databaseUrl: env.DATABASE_URL || undefined,
  };
}
