import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { evaluateCopyTrade, heldBalance } from '../src/copyTradeRules.js';
import { DEFAULT_COPY_TRADE_SETTINGS, type CopyTradeSettings, type TokenInfo, type WalletInfo } from '../src/types.js';
import { observedTrade } from './fakes.js';

const settings: CopyTradeSettings = {
  ...DEFAULT_COPY_TRADE_SETTINGS,
  is_enabled: true,
  trade_amount_sol: 0.5,
  max_open_positions: 2,
  min_sol_balance: 0.1,
};

function token(address: string, balance: string): TokenInfo {
  return { address, symbol: 'T', name: 'Token', balance, metadata_uri: null, decimals: 6, market_cap: 0 };
}

function wallet(balance: number, tokens: TokenInfo[] = []): WalletInfo {
  return { balance, tokens, address: 'ServerWallet' };
}

describe('evaluateCopyTrade', () => {
  it('copies a buy with enough balance and a free position slot', () => {
    assert.deepEqual(evaluateCopyTrade(observedTrade(), settings, wallet(2)), { copy: true });
  });

  it('never copies transfers or unknown transactions', () => {
    const decision = evaluateCopyTrade(observedTrade({ transaction_type: 'Transfer' }), settings, wallet(2));
    assert.deepEqual(decision, { copy: false, reason: 'Transfer transactions are not copied' });
  });

  it('enforces the allowed token list when enabled', () => {
    const restricted = { ...settings, use_allowed_tokens_list: true, allowed_tokens: ['OtherMint'] };
    assert.equal(evaluateCopyTrade(observedTrade(), restricted, wallet(2)).copy, false);

    const allowed = { ...restricted, allowed_tokens: ['MintX'] };
    assert.equal(evaluateCopyTrade(observedTrade(), allowed, wallet(2)).copy, true);
  });

  it('keeps the minimum SOL balance', () => {
    // 0.55 - 0.5 = 0.05 < 0.1
    assert.equal(evaluateCopyTrade(observedTrade(), settings, wallet(0.55)).copy, false);
    assert.equal(evaluateCopyTrade(observedTrade(), settings, wallet(0.7)).copy, true);
  });

  it('only adds to a held token when additional buys are allowed', () => {
    const holding = wallet(2, [token('MintX', '10')]);
    assert.deepEqual(evaluateCopyTrade(observedTrade(), settings, holding), {
      copy: false,
      reason: 'additional buys are disabled',
    });
    assert.equal(evaluateCopyTrade(observedTrade(), { ...settings, allow_additional_buys: true }, holding).copy, true);
  });

  it('caps the number of open positions', () => {
    const full = wallet(2, [token('A', '1'), token('B', '2'), token('C', '0')]);
    assert.deepEqual(evaluateCopyTrade(observedTrade(), settings, full), {
      copy: false,
      reason: '2 open positions, limit is 2',
    });
  });

  it('skips a trade filled further from the market price than the slippage limit', () => {
    // (0.625 - 0.5) / 0.5 = 25%
    const moved = observedTrade({ market_price_sol: 0.5, price_per_token: 0.625 });
    assert.deepEqual(evaluateCopyTrade(moved, settings, wallet(2)), {
      copy: false,
      reason: 'price moved 25.00% from market, slippage limit is 0.1%',
    });
    assert.equal(evaluateCopyTrade(moved, { ...settings, max_slippage: 30 }, wallet(2)).copy, true);

    const sell = observedTrade({ transaction_type: 'Sell', market_price_sol: 0.5, price_per_token: 0.375 });
    assert.equal(evaluateCopyTrade(sell, settings, wallet(0, [token('MintX', '3.5')])).copy, false);
  });

  it('only sells a token the wallet holds', () => {
    const sell = observedTrade({ transaction_type: 'Sell' });
    assert.equal(evaluateCopyTrade(sell, settings, wallet(0)).copy, false);
    assert.equal(evaluateCopyTrade(sell, settings, wallet(0, [token('MintX', '3.5')])).copy, true);
  });
});

describe('heldBalance', () => {
  it('reads decimal string balances and treats junk as zero', () => {
    assert.equal(heldBalance(wallet(0, [token('MintX', '12.25')]), 'MintX'), 12.25);
    assert.equal(heldBalance(wallet(0, [token('MintX', 'abc')]), 'MintX'), 0);
    assert.equal(heldBalance(wallet(0), 'MintX'), 0);
  });
});
