/**
 * Opportunity Scanner Tests
 * First-match ordering, eligibility, liquidity and cost accounting
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Address } from '../../../shared/schema.js';
import { ArbitrageEventBus } from '../services/events.js';
import { OpportunityScanner, type ScanRequest } from '../services/opportunity-scanner.js';
import type { SwapVenue } from '../services/swap-venue.js';
import { PriceFeed } from '../services/price-feed.js';
import { RiskGate } from '../services/risk-gate.js';
import { TokenRegistry } from '../services/token-registry.js';
import {
  BASE,
  ConstantProductVenue,
  DEFAULT_THRESHOLDS,
  FakePriceSource,
  GWEI,
  InMemoryVenue,
  NOW,
  ONE,
  OPERATOR,
  ROUTER,
  ROUTER_B,
  T1,
  T2,
  T3,
  silentLogger,
} from './helpers/fakes.js';

const AMOUNT = 100n * ONE;

describe('OpportunityScanner', () => {
  let venue: InMemoryVenue;
  let prices: FakePriceSource;
  let gate: RiskGate;
  let scanner: OpportunityScanner;
  let scannerFor: (venues: SwapVenue[]) => OpportunityScanner;

  const request = (overrides: Partial<ScanRequest> = {}): ScanRequest => ({
    amount: AMOUNT,
    gasPrice: 10n * GWEI,
    gasUnits: 0n,
    premiumBps: 0n,
    ...overrides,
  });

  const touched = (token: Address) => [...venue.quote.mock.calls, ...venue.getReserves.mock.calls].some(
    (call) => call[0] === token || call[1] === token
  );

  beforeEach(() => {
    const logger = silentLogger();
    const registry = new TokenRegistry([T1, T2, T3, BASE]);
    [T1, T2, T3, BASE].forEach((token) => registry.approve(token));

    venue = new InMemoryVenue();
    prices = new FakePriceSource();
    [T1, T2, T3].forEach((token) => prices.setPrice(token, 1n));
    prices.setPrice(BASE, 2000n);

    gate = new RiskGate({
      operator: OPERATOR,
      thresholds: DEFAULT_THRESHOLDS,
      registry,
      events: new ArbitrageEventBus(logger),
      logger,
    });
    const priceFeed = new PriceFeed([prices], { maxAgeSec: 60, timeoutMs: 100, now: () => NOW, logger });
    scannerFor = (venues) =>
      new OpportunityScanner({ registry, gate, priceFeed, venues, gasToken: BASE.address, timeoutMs: 100, logger });
    scanner = scannerFor([venue]);
  });

  it('never quotes or reads reserves for a blacklisted token', async () => {
    venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
    venue.pool(T1, T3, { num: 1n, den: 1n }, { num: 102n, den: 100n });
    gate.blacklist(OPERATOR, T2.address);

    const opportunity = await scanner.findOpportunity(request());

    expect(opportunity?.tokenIn.address).toBe(T1.address);
    expect(opportunity?.tokenOut.address).toBe(T3.address);
    expect(opportunity?.expectedProfit).toBe(2n * ONE);
    expect(touched(T2.address)).toBe(false);
  });

  it('returns the first qualifying pair in monitored order', async () => {
    venue.pool(T1, T3, { num: 1n, den: 1n }, { num: 105n, den: 100n });
    venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });

    const opportunity = await scanner.findOpportunity(request());

    // T1 -> T2 is visited before T1 -> T3 and clears the threshold
    expect(opportunity?.tokenOut.symbol).toBe('T2');
    expect(opportunity).toMatchObject({
      amount: AMOUNT,
      expectedIntermediate: AMOUNT,
      expectedReturn: 110n * ONE,
      fee: 0n,
      gasCost: 0n,
      expectedProfit: 10n * ONE,
    });
  });

  it('requires profit strictly above the threshold', async () => {
    venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 101n, den: 100n });

    expect(await scanner.findOpportunity(request())).toBeNull();
  });

  it('subtracts gas valued at the gas token price', async () => {
    venue.pool(T1, T3, { num: 1n, den: 1n }, { num: 106n, den: 100n });

    // 10 gwei * 200k gas = 0.002 of the base token at 2000 USD = 4 USD
    const opportunity = await scanner.findOpportunity(request({ gasUnits: 200_000n }));

    expect(opportunity?.gasCost).toBe(4n * ONE);
    expect(opportunity?.expectedProfit).toBe(2n * ONE);
  });

  it('subtracts the flash-loan premium', async () => {
    venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 102n, den: 100n });

    // 2 USD gross, 0.9 USD premium at 90 bps
    const opportunity = await scanner.findOpportunity(request({ premiumBps: 90n }));

    expect(opportunity?.fee).toBe(9n * 10n ** 17n);
    expect(opportunity?.expectedProfit).toBe(11n * 10n ** 17n);
  });

  it('skips pairs below the liquidity threshold', async () => {
    venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
    venue.setReserves(T1, T2, 10n * ONE, 10n * ONE);
    gate.setThresholds(OPERATOR, { ...DEFAULT_THRESHOLDS, liquidityThreshold: 21n * ONE });

    expect(await scanner.findOpportunity(request())).toBeNull();
    expect(venue.quote).not.toHaveBeenCalled();
  });

  it('skips pairs without reserves', async () => {
    venue.setRate(T1, T2, 1n).setRate(T2, T1, 2n);

    expect(await scanner.findOpportunity(request())).toBeNull();
    expect(venue.quote).not.toHaveBeenCalled();
  });

  it('only trades the requested token in', async () => {
    venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
    venue.pool(BASE, T3, { num: 2000n, den: 1n }, { num: 11n, den: 20_000n });

    const opportunity = await scanner.findOpportunity(request({ tokenIn: BASE.address, amount: ONE }));

    expect(opportunity?.tokenIn.symbol).toBe('WETH');
    expect(opportunity?.tokenOut.symbol).toBe('T3');
    expect(opportunity?.expectedReturn).toBe(11n * 10n ** 17n);
    expect(opportunity?.expectedProfit).toBe(200n * ONE);
  });

  describe('across venues', () => {
    // 1 BASE per T1 on A, 2 BASE per T1 on B
    const cheap = () => new ConstantProductVenue(ROUTER, 'venue-a').addPool(BASE, T1, 1000n * ONE, 1000n * ONE);
    const dear = () => new ConstantProductVenue(ROUTER_B, 'venue-b').addPool(BASE, T1, 2000n * ONE, 1000n * ONE);
    const baseRequest = () => request({ tokenIn: BASE.address, amount: 10n * ONE });

    it('finds nothing in a single pool, whatever its price', async () => {
      gate.setThresholds(OPERATOR, { ...DEFAULT_THRESHOLDS, profitThreshold: 0n });

      expect(await scannerFor([dear()]).findOpportunity(baseRequest())).toBeNull();
    });

    it('buys on the cheaper pool and sells on the dearer one', async () => {
      const opportunity = await scannerFor([dear(), cheap()]).findOpportunity(baseRequest());

      expect(opportunity).toMatchObject({
        buyVenue: ROUTER,
        sellVenue: ROUTER_B,
        expectedIntermediate: 9871580343970612988n,
        expectedReturn: 19492090719486852021n,
        // 9.49 BASE at 2000 USD
        expectedProfit: 18984181438973704042000n,
      });
    });

    it('skips a venue without the pair', async () => {
      const empty = new ConstantProductVenue(ROUTER_B, 'venue-b');

      const opportunity = await scannerFor([empty, cheap()]).findOpportunity(baseRequest());

      expect(opportunity).toBeNull();
      expect(empty.quote).not.toHaveBeenCalled();
    });
  });
});
