/**
 * Wires the engine to its on-chain collaborators
 */

import { createPublicClient, http, type Chain, type PublicClient } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { mainnet } from 'viem/chains';
import type { ChainId } from '../../shared/schema.js';
import type { AppConfig } from './config/env.js';
import { ArbitrageEngine } from './services/arbitrage-engine.js';
import { WalletChainWriter } from './services/chain-writer.js';
import { AaveV3FlashLender } from './services/flash-loan.js';
import { ChainlinkGasPriceSource } from './services/gas-oracle.js';
import { ChainlinkFeedRegistrySource } from './services/price-feed.js';
import { UniswapV2Venue } from './services/swap-venue.js';
import { Erc20MetadataReader, type TokenMetadataReader } from './services/token-metadata.js';
import type { StructuredLogger } from './utils/structured-logger.js';

// Chain configurations
const CHAIN_CONFIG: Record<ChainId, Chain> = {
  ethereum: mainnet,
};

export interface Runtime {
  engine: ArbitrageEngine;
  metadata: TokenMetadataReader;
}

export function createChainClient(chain: ChainId, rpcUrl: string, timeoutMs: number): PublicClient {
  const client = createPublicClient({
    chain: CHAIN_CONFIG[chain],
    transport: http(rpcUrl, { timeout: timeoutMs }),
  });
  return client as PublicClient;
}

/**
 * Read token metadata, build the engine and seed its vault with the executor's balances
 */
export async function bootstrap(config: AppConfig, logger: StructuredLogger): Promise<Runtime> {
  const ctx = logger.startOperation('op', config.operator.address, 'bootstrap');
  const timeoutMs = config.executor.collaboratorTimeoutMs;
  const client = createChainClient(config.chain.id, config.chain.rpcUrl, timeoutMs);
  const metadata = new Erc20MetadataReader(client, timeoutMs);
  const writer = new WalletChainWriter(
    privateKeyToAccount(config.signer.privateKey),
    CHAIN_CONFIG[config.chain.id],
    config.chain.rpcUrl,
    client,
    config.executor.executionTimeoutMs
  );

  const [monitoredTokens, baseToken, stableToken] = await Promise.all([
    Promise.all(config.tokens.monitored.map((address) => metadata.describe(address))),
    metadata.describe(config.tokens.base),
    metadata.describe(config.tokens.stable),
  ]);

  const engine = new ArbitrageEngine(
    {
      operator: config.operator.address,
      executor: writer.account,
      monitoredTokens,
      baseToken,
      stableToken,
      thresholds: config.thresholds,
      oracleMaxAgeSec: config.executor.oracleMaxAgeSec,
      collaboratorTimeoutMs: timeoutMs,
      executionTimeoutMs: config.executor.executionTimeoutMs,
      flashLoanTimeoutMs: config.executor.flashLoanTimeoutMs,
      directGasUnits: config.executor.directGasUnits,
      flashloanGasUnits: config.executor.flashloanGasUnits,
      superProfitSlippageBps: config.executor.superProfitSlippageBps,
    },
    {
      venues: config.collaborators.routers.map(
        (router, index) => new UniswapV2Venue(client, router, writer, { name: `uniswap-v2-${index}` })
      ),
      priceSources: config.collaborators.priceOracles.map(
        (address) => new ChainlinkFeedRegistrySource(client, address, config.collaborators.priceKeys)
      ),
      gasSource: new ChainlinkGasPriceSource(client, config.collaborators.gasPriceOracle),
      lender: new AaveV3FlashLender(
        client,
        config.collaborators.lendingPool,
        writer,
        config.collaborators.flashReceiver
      ),
      balances: metadata,
    },
    { logger }
  );

  await engine.syncBalances();

  logger.info(ctx, 'bootstrap_complete', 'Engine initialized', {
    chain: config.chain.id,
    executor: writer.account,
    venues: config.collaborators.routers.length,
    monitored: engine.getMonitoredTokens().map((token) => token.symbol),
    balances: engine.vault.snapshot(),
  });

  return { engine, metadata };
}
