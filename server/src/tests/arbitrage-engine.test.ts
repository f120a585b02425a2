/**
 * Arbitrage Engine Tests
 * End-to-end attempts through admission, scanning, execution and settlement
 */

import { describe, it, expect, vi } from 'vitest';
import type { GasPriceReading } from '../services/gas-oracle.js';
import { AuthorizationError, ConfigurationError, RiskRejectionError } from '../errors.js';
import {
  ATTEMPT_IN_PROGRESS_REASON,
  NO_OPPORTUNITY_REASON,
  validateInitialization,
} from '../services/arbitrage-engine.js';
import {
  BASE,
  ConstantProductVenue,
  DEFAULT_THRESHOLDS,
  EXECUTOR,
  FakePriceSource,
  GWEI,
  InMemoryVenue,
  NOW,
  ONE,
  OPERATOR,
  ROUTER,
  ROUTER_B,
  STABLE,
  STRANGER,
  T1,
  T2,
  T3,
  buildEngine,
  recordEvents,
} from './helpers/fakes.js';

const AMOUNT = 100n * ONE;

describe('ArbitrageEngine', () => {
  describe('initialization', () => {
    it('appends the base and stable tokens and approves everything', () => {
      const { engine } = buildEngine({ monitoredTokens: [T1] });

      expect(engine.getMonitoredTokens().map((t) => [t.symbol, t.approved])).toEqual([
        ['T1', true],
        ['WETH', true],
        ['USDC', true],
      ]);
      expect(engine.getBlacklistedTokens()).toEqual([]);
      expect(engine.getTotalProfit()).toBe(0n);
      expect(engine.getRiskConfig()).toEqual({ ...DEFAULT_THRESHOLDS, isPaused: false });
    });

    it('does not duplicate a base token that is already monitored', () => {
      const { engine } = buildEngine({ monitoredTokens: [BASE, T1] });

      expect(engine.getMonitoredTokens().map((t) => t.symbol)).toEqual(['WETH', 'T1', 'USDC']);
    });

    it('rejects a zero router address', () => {
      expect(() =>
        buildEngine({}, { venues: [new InMemoryVenue('0x0000000000000000000000000000000000000000')] })
      ).toThrow('routers[0] must be a non-zero address');
    });

    it('requires at least one venue', () => {
      expect(() => buildEngine({}, { venues: [] })).toThrow('At least one swap venue is required');
    });

    it('rejects the same router twice', () => {
      expect(() =>
        buildEngine({}, { venues: [new InMemoryVenue(ROUTER), new InMemoryVenue(ROUTER_B), new InMemoryVenue(ROUTER)] })
      ).toThrow(`Duplicate swap venue ${ROUTER}`);
    });

    it('rejects a non-positive execution timeout', () => {
      expect(() => buildEngine({ flashLoanTimeoutMs: 0 })).toThrow('flashLoanTimeoutMs must be positive');
    });

    it('rejects an empty price oracle list', () => {
      expect(() => buildEngine({}, { priceSources: [] })).toThrow('At least one price oracle is required');
    });

    it('rejects duplicate initial tokens', () => {
      expect(() => buildEngine({ monitoredTokens: [T1, T2, T1] })).toThrow(`Duplicate monitored token ${T1.address}`);
    });

    it('rejects inconsistent thresholds', () => {
      expect(() =>
        buildEngine({ thresholds: { ...DEFAULT_THRESHOLDS, superProfitThreshold: 0n } })
      ).toThrow(ConfigurationError);
    });

    it('validates without building anything', () => {
      const { lender, gas } = buildEngine();
      expect(() =>
        validateInitialization(
          {
            operator: '0x0000000000000000000000000000000000000000',
            executor: OPERATOR,
            monitoredTokens: [],
            baseToken: BASE,
            stableToken: STABLE,
            thresholds: DEFAULT_THRESHOLDS,
            oracleMaxAgeSec: 60,
            collaboratorTimeoutMs: 100,
            executionTimeoutMs: 100,
            flashLoanTimeoutMs: 100,
            directGasUnits: 0n,
            flashloanGasUnits: 0n,
            superProfitSlippageBps: 0,
          },
          { venues: [new InMemoryVenue()], priceSources: [new FakePriceSource()], gasSource: gas, lender }
        )
      ).toThrow('operator must be a non-zero address');
    });
  });

  describe('gas price reads', () => {
    it('returns the oracle value', async () => {
      const { engine, gas } = buildEngine();
      gas.answer = 42n * GWEI;

      expect(await engine.getGasPrice()).toBe(42n * GWEI);
    });

    it('reports a non-positive oracle answer as OracleInvalid', async () => {
      const { engine, gas } = buildEngine();
      gas.answer = 0n;

      await expect(engine.getGasPrice()).rejects.toMatchObject({ code: 'ORACLE_INVALID' });
    });
  });

  describe('direct attempts', () => {
    it('settles a profitable round trip and grows the ledger', async () => {
      const { engine, venue, events } = buildEngine();
      const recorded = recordEvents(events);
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 103n, den: 100n });
      engine.vault.deposit(T1.address, AMOUNT);

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result.status).toBe('settled');
      if (result.status !== 'settled') return;
      expect(result.settlement.profit).toBe(3n * ONE);
      expect(result.totalProfit).toBe(3n * ONE);
      expect(engine.getTotalProfit()).toBe(3n * ONE);
      expect(engine.vault.balanceOf(T1.address)).toBe(103n * ONE);
      expect(recorded.log).toEqual(['arbitrageExecuted']);
      expect(recorded.executed[0]).toEqual({ profit: 3n * ONE, correlationId: result.correlationId });
      expect(engine.getStatus().state).toBe('idle');
    });

    it('rejects the attempt at admission when gas is over the limit', async () => {
      const { engine, venue, gas, events } = buildEngine({
        thresholds: { ...DEFAULT_THRESHOLDS, gasPriceLimit: 100n },
      });
      const recorded = recordEvents(events);
      gas.answer = 150n;
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
      engine.vault.deposit(T1.address, AMOUNT);

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({
        status: 'failed',
        stage: 'admission',
        code: 'RISK_REJECTED',
        reason: 'Gas price 150 exceeds limit 100',
      });
      expect(venue.getReserves).not.toHaveBeenCalled();
      expect(venue.quote).not.toHaveBeenCalled();
      expect(venue.swap).not.toHaveBeenCalled();
      expect(engine.getTotalProfit()).toBe(0n);
      expect(recorded.log).toEqual(['arbitrageFailed']);
    });

    it('reports no opportunity when no pair clears the threshold', async () => {
      const { engine, venue, events } = buildEngine();
      const recorded = recordEvents(events);
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 1005n, den: 1000n });
      engine.vault.deposit(T1.address, AMOUNT);

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({
        status: 'failed',
        stage: 'scanning',
        code: 'NO_OPPORTUNITY',
        reason: NO_OPPORTUNITY_REASON,
      });
      expect(venue.swap).not.toHaveBeenCalled();
      expect(recorded.failed).toEqual([{ code: 'NO_OPPORTUNITY', stage: 'scanning', reason: NO_OPPORTUNITY_REASON }]);
      expect(engine.getTotalProfit()).toBe(0n);
    });

    it('rejects every attempt while paused', async () => {
      const { engine, gas } = buildEngine();
      await engine.pause(OPERATOR);

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', stage: 'admission', reason: 'Trading is paused' });
      expect(gas.latestGasPrice).not.toHaveBeenCalled();
    });

    it('rolls back every balance change when a leg fails', async () => {
      const { engine, venue } = buildEngine();
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
      venue.onSwap = (order) => {
        if (order.tokenIn === T2.address) venue.setRate(T2, T1, 1n);
      };
      engine.vault.deposit(T1.address, AMOUNT);

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', stage: 'executing', code: 'SLIPPAGE_EXCEEDED' });
      expect(engine.vault.snapshot()).toEqual({ [T1.address]: AMOUNT });
      expect(engine.getTotalProfit()).toBe(0n);
    });

    it('times out a swap that never completes and refuses its late fill', async () => {
      const { engine, venue } = buildEngine({ executionTimeoutMs: 20 });
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
      engine.vault.deposit(T1.address, AMOUNT);
      let lateFill: () => void = () => undefined;
      venue.swap.mockImplementationOnce(
        (_order, account) =>
          new Promise<bigint>(() => {
            lateFill = () => account.credit(T2.address, AMOUNT);
          })
      );

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', stage: 'executing', code: 'COLLABORATOR_TIMEOUT' });
      expect(engine.vault.snapshot()).toEqual({ [T1.address]: AMOUNT });
      expect(lateFill).toThrow('Vault transaction is already closed');
      expect(engine.getStatus()).toMatchObject({ busy: false, state: 'idle' });
    });

    it('re-reads on-chain balances after a failed execution', async () => {
      const balances = { balanceOf: vi.fn(async (token: string) => (token === T1.address ? 70n * ONE : 0n)) };
      const { engine, venue } = buildEngine({}, { balances });
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
      venue.onSwap = (order) => {
        if (order.tokenIn === T2.address) venue.setRate(T2, T1, 1n);
      };
      engine.vault.deposit(T1.address, AMOUNT);

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', code: 'SLIPPAGE_EXCEEDED' });
      expect(balances.balanceOf).toHaveBeenCalledWith(T1.address, EXECUTOR);
      expect(engine.vault.balanceOf(T1.address)).toBe(70n * ONE);
      expect(engine.vault.balanceOf(T2.address)).toBe(0n);
    });

    it('settles across two pools priced apart', async () => {
      // 1 BASE per T1 on one, 2 BASE per T1 on the other
      const cheap = new ConstantProductVenue(ROUTER, 'venue-a').addPool(BASE, T1, 1000n * ONE, 1000n * ONE);
      const dear = new ConstantProductVenue(ROUTER_B, 'venue-b').addPool(BASE, T1, 2000n * ONE, 1000n * ONE);
      const { engine } = buildEngine({ monitoredTokens: [T1] }, { venues: [cheap, dear] });
      engine.vault.deposit(T1.address, 10n * ONE);

      const result = await engine.triggerDirect(OPERATOR, 10n * ONE);

      // T1 buys BASE where BASE is cheap in T1 terms and sells it back on the other pool
      expect(result).toMatchObject({ status: 'settled', totalProfit: 9303953512927482325n });
      expect(dear.swap.mock.calls[0]?.[0]).toMatchObject({ tokenIn: T1.address, tokenOut: BASE.address });
      expect(cheap.swap.mock.calls[0]?.[0]).toMatchObject({ tokenIn: BASE.address, tokenOut: T1.address });
      expect(engine.vault.balanceOf(T1.address)).toBe(19303953512927482325n);
      expect(engine.vault.balanceOf(BASE.address)).toBe(0n);
    });

    it('fails a stale price at the scanning stage', async () => {
      const { engine, venue, prices } = buildEngine();
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });
      prices.updatedAt = NOW - 7200;

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', stage: 'scanning', code: 'ORACLE_INVALID' });
    });

    it('rejects a non-positive amount', async () => {
      const { engine } = buildEngine();

      expect(await engine.triggerDirect(OPERATOR, 0n)).toMatchObject({
        status: 'failed',
        stage: 'admission',
        code: 'RISK_REJECTED',
      });
    });
  });

  describe('flash-loan attempts', () => {
    it('fails with insufficient repayment and leaves balances untouched', async () => {
      const { engine, venue, lender, events } = buildEngine({ monitoredTokens: [T1] });
      const recorded = recordEvents(events);
      lender.bps = 100n;
      venue.pool(BASE, T1, { num: 1n, den: 1n }, { num: 11n, den: 10n });
      lender.onLend = () => {
        venue.setRate(T1, BASE, 995n, 1000n);
      };

      const result = await engine.triggerFlashloan(OPERATOR, AMOUNT);

      expect(result).toMatchObject({
        status: 'failed',
        stage: 'executing',
        code: 'INSUFFICIENT_REPAYMENT',
      });
      expect(engine.vault.snapshot()).toEqual({});
      expect(engine.getTotalProfit()).toBe(0n);
      expect(recorded.log).toEqual(['arbitrageFailed']);
    });

    it('settles a profitable loan net of the premium', async () => {
      const { engine, venue, lender } = buildEngine({ monitoredTokens: [T1] });
      lender.bps = 100n;
      venue.pool(BASE, T1, { num: 1n, den: 1n }, { num: 11n, den: 10n });

      const result = await engine.triggerFlashloan(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'settled', strategy: 'flashloan', totalProfit: 9n * ONE });
      expect(engine.vault.balanceOf(BASE.address)).toBe(9n * ONE);
    });

    it('times out a loan that never settles and refuses its late fill', async () => {
      const { engine, venue, lender } = buildEngine({ monitoredTokens: [T1], flashLoanTimeoutMs: 20 });
      venue.pool(BASE, T1, { num: 1n, den: 1n }, { num: 11n, den: 10n });
      let lateFill: () => void = () => undefined;
      lender.onLend = (execution) =>
        new Promise<void>(() => {
          lateFill = () => execution.account.credit(BASE.address, AMOUNT);
        });

      const result = await engine.triggerFlashloan(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', stage: 'executing', code: 'COLLABORATOR_TIMEOUT' });
      expect(engine.vault.snapshot()).toEqual({});
      expect(lateFill).toThrow('Vault transaction is already closed');
    });

    it('gives the loan its own time budget beyond the read timeout', async () => {
      const { engine, venue, lender } = buildEngine({
        monitoredTokens: [T1],
        collaboratorTimeoutMs: 20,
        flashLoanTimeoutMs: 1000,
      });
      lender.bps = 100n;
      venue.pool(BASE, T1, { num: 1n, den: 1n }, { num: 11n, den: 10n });
      lender.onLend = () => new Promise<void>((resolve) => setTimeout(resolve, 60));

      const result = await engine.triggerFlashloan(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'settled', strategy: 'flashloan', totalProfit: 9n * ONE });
    });

    it('only scans pairs that start from the base token', async () => {
      const { engine, venue } = buildEngine();
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 110n, den: 100n });

      const result = await engine.triggerFlashloan(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'failed', code: 'NO_OPPORTUNITY' });
      expect(venue.getReserves.mock.calls.every(([tokenIn]) => tokenIn === BASE.address)).toBe(true);
    });
  });

  describe('super-profit', () => {
    it('announces the conversion before the ledger update', async () => {
      const { engine, venue, events } = buildEngine({
        thresholds: { ...DEFAULT_THRESHOLDS, superProfitThreshold: 5n * ONE },
      });
      venue.pool(T1, T2, { num: 1n, den: 1n }, { num: 106n, den: 100n });
      venue.setRate(T1, STABLE, 1n);
      engine.vault.deposit(T1.address, AMOUNT);

      const seen: Array<[string, bigint]> = [];
      events.on('superProfitConverted', (e) => {
        expect(e).toMatchObject({ token: T1.address, stableToken: STABLE.address, amount: ONE, amountOut: ONE });
        seen.push(['superProfitConverted', engine.getTotalProfit()]);
      });
      events.on('arbitrageExecuted', (e) => {
        seen.push(['arbitrageExecuted', e.profit]);
      });

      const result = await engine.triggerDirect(OPERATOR, AMOUNT);

      expect(result).toMatchObject({ status: 'settled', totalProfit: 6n * ONE });
      expect(seen).toEqual([
        ['superProfitConverted', 0n],
        ['arbitrageExecuted', 6n * ONE],
      ]);
      expect(engine.getTotalProfit()).toBe(6n * ONE);
      expect(engine.vault.balanceOf(T1.address)).toBe(105n * ONE);
      expect(engine.vault.balanceOf(STABLE.address)).toBe(ONE);
    });
  });

  describe('operator commands', () => {
    it('throws for a non-operator trigger without emitting anything', async () => {
      const { engine, events } = buildEngine();
      const recorded = recordEvents(events);

      await expect(engine.triggerDirect(STRANGER, AMOUNT)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(engine.blacklistToken(STRANGER, T1.address)).rejects.toBeInstanceOf(AuthorizationError);
      expect(recorded.log).toEqual([]);
    });

    it('adds and blacklists tokens', async () => {
      const { engine, events } = buildEngine();
      const recorded = recordEvents(events);

      await engine.addMonitoredToken(OPERATOR, T3);
      await engine.blacklistToken(OPERATOR, T2.address);

      expect(engine.getMonitoredTokens().map((t) => t.symbol)).toEqual(['T1', 'WETH', 'USDC', 'T3']);
      expect(engine.getBlacklistedTokens()).toEqual([T2.address]);
      expect(recorded.log).toEqual(['tokenApproved', 'tokenBlacklisted']);
      await expect(engine.addMonitoredToken(OPERATOR, T2)).rejects.toBeInstanceOf(RiskRejectionError);
    });

    it('updates thresholds and reflects them in the read surface', async () => {
      const { engine } = buildEngine();
      const thresholds = { ...DEFAULT_THRESHOLDS, profitThreshold: 3n * ONE };

      await engine.setThresholds(OPERATOR, thresholds);

      expect(engine.getRiskConfig()).toEqual({ ...thresholds, isPaused: false });
    });
  });

  describe('one attempt at a time', () => {
    it('rejects a second trigger and defers mutations until the first finishes', async () => {
      const { engine, gas } = buildEngine();
      let release: () => void = () => undefined;
      gas.latestGasPrice.mockImplementationOnce(
        () =>
          new Promise<GasPriceReading>((resolve) => {
            release = () => resolve({ answer: 10n * GWEI, updatedAt: NOW });
          })
      );

      const first = engine.triggerDirect(OPERATOR, AMOUNT);
      expect(engine.getStatus().busy).toBe(true);

      const second = await engine.triggerDirect(OPERATOR, AMOUNT);
      expect(second).toMatchObject({ status: 'failed', stage: 'admission', reason: ATTEMPT_IN_PROGRESS_REASON });

      let paused = false;
      const pause = engine.pause(OPERATOR).then(() => {
        paused = true;
      });
      await Promise.resolve();
      expect(paused).toBe(false);

      release();
      expect(await first).toMatchObject({ status: 'failed', code: 'NO_OPPORTUNITY' });
      await pause;
      expect(paused).toBe(true);
      expect(engine.getStatus()).toMatchObject({ busy: false, state: 'idle', risk: { isPaused: true } });
    });
  });
});
