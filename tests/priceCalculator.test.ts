import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  calculateLiquiditySol,
  calculateMarketCap,
  calculatePriceChange,
  calculatePriceFromRawBalances,
  calculatePriceImpact,
  calculateVwap,
  convertToPriceUpdate,
  getOptimalTradeSize,
  validatePriceData,
} from '../src/priceCalculator.js';
import { isAppError } from '../src/errors.js';
import type { VaultPriceUpdate } from '../src/types.js';
import { FakeChainReader, mintAccount } from './fakes.js';

const MINT = 'TestMint1111111111111111111111111111111111';

function vaultUpdate(priceSol: number, liquiditySol: number): VaultPriceUpdate {
  return {
    token_address: MINT,
    price_sol: priceSol,
    liquidity_sol: liquiditySol,
    base_balance: 1n,
    quote_balance: 1n,
    timestamp: 1_700_000_000,
  };
}

describe('calculatePriceFromRawBalances', () => {
  it('divides decimal-adjusted quote by base', () => {
    // 1000 tokens (6 decimals) against 2 SOL (9 decimals)
    assert.equal(calculatePriceFromRawBalances(1_000_000_000n, 2_000_000_000n, 6, 9), 0.002);
  });

  it('returns 0 for an empty base vault', () => {
    assert.equal(calculatePriceFromRawBalances(0n, 5_000_000_000n, 6, 9), 0);
  });
});

describe('calculateLiquiditySol', () => {
  it('doubles the quote side', () => {
    assert.equal(calculateLiquiditySol(2_000_000_000n, 9), 4);
  });
});

describe('validatePriceData', () => {
  const invalid = (error: unknown) => isAppError(error, 'InvalidPrice');

  it('rejects negative prices', () => {
    assert.throws(() => validatePriceData(-1, 10n, 10n), invalid);
  });

  it('rejects prices above 1000 SOL', () => {
    assert.throws(() => validatePriceData(1001, 10n, 10n), invalid);
  });

  it('rejects a zero base or quote balance', () => {
    assert.throws(() => validatePriceData(0.5, 0n, 10n), invalid);
    assert.throws(() => validatePriceData(0.5, 10n, 0n), invalid);
  });

  it('accepts sane data including the 1000 SOL bound', () => {
    assert.doesNotThrow(() => validatePriceData(0.5, 10n, 10n));
    assert.doesNotThrow(() => validatePriceData(1000, 10n, 10n));
  });
});

describe('calculateVwap', () => {
  it('returns null for no updates', () => {
    assert.equal(calculateVwap([]), null);
  });

  it('returns null when total liquidity is zero', () => {
    assert.equal(calculateVwap([vaultUpdate(1, 0), vaultUpdate(2, 0)]), null);
  });

  it('weights prices by liquidity', () => {
    assert.equal(calculateVwap([vaultUpdate(1, 1), vaultUpdate(3, 3)]), 2.5);
  });
});

describe('calculatePriceChange', () => {
  it('returns 0 without a previous price', () => {
    assert.equal(calculatePriceChange(0, 5), 0);
  });

  it('returns a percentage', () => {
    assert.equal(calculatePriceChange(2, 3), 50);
  });
});

describe('calculatePriceImpact', () => {
  it('follows the constant product curve', () => {
    // 1000 base / 100 quote, buying with 100 quote: price goes 0.1 -> 0.4
    const impact = calculatePriceImpact(1000n, 100n, 100, 0, 0);
    assert.ok(Math.abs(impact - 3) < 1e-9);
  });

  it('is 0 for an unpriced pool', () => {
    assert.equal(calculatePriceImpact(0n, 100n, 10, 0, 0), 0);
  });
});

describe('getOptimalTradeSize', () => {
  it('takes half the slippage fraction of the quote side', () => {
    assert.equal(getOptimalTradeSize(10_000_000_000n, 1, 9), 0.05);
  });
});

describe('calculateMarketCap', () => {
  it('multiplies supply by SOL and USD price', async () => {
    const reader = new FakeChainReader();
    reader.accounts.set(MINT, mintAccount(1_000_000_000_000n, 6));

    assert.equal(await calculateMarketCap(0.5, 150, MINT, reader), 75_000_000);
  });

  it('returns 0 when the mint is missing', async () => {
    assert.equal(await calculateMarketCap(0.5, 150, MINT, new FakeChainReader()), 0);
  });

  it('returns 0 when the fetch fails', async () => {
    const reader = new FakeChainReader();
    reader.failingAccounts.add(MINT);
    assert.equal(await calculateMarketCap(0.5, 150, MINT, reader), 0);
  });

  it('returns 0 when the mint cannot be parsed', async () => {
    const reader = new FakeChainReader();
    reader.accounts.set(MINT, Buffer.alloc(16));
    assert.equal(await calculateMarketCap(0.5, 150, MINT, reader), 0);
  });
});

describe('convertToPriceUpdate', () => {
  it('builds a Raydium price update with USD figures', async () => {
    const reader = new FakeChainReader();
    reader.accounts.set(MINT, mintAccount(1_000_000_000_000n, 6));

    const update = await convertToPriceUpdate(vaultUpdate(0.5, 4), 'Pool111', 150, reader);

    assert.deepEqual(update, {
      token_address: MINT,
      price_sol: 0.5,
      price_usd: 75,
      market_cap: 75_000_000,
      timestamp: 1_700_000_000,
      dex_type: 'Raydium',
      liquidity: 4,
      liquidity_usd: 600,
      pool_address: 'Pool111',
      volume_24h: null,
      volume_6h: null,
      volume_1h: null,
      volume_5m: null,
    });
  });
});
