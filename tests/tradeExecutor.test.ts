import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isAppError } from '../src/errors.js';
import { PaperTradeExecutor } from '../src/tradeExecutor.js';
import { DEFAULT_COPY_TRADE_SETTINGS, type CopyTradeSettings, type WalletInfo } from '../src/types.js';
import { observedTrade } from './fakes.js';

const settings: CopyTradeSettings = { ...DEFAULT_COPY_TRADE_SETTINGS, is_enabled: true, trade_amount_sol: 0.25 };

const holding: WalletInfo = {
  balance: 1,
  address: 'ServerWallet',
  tokens: [{ address: 'MintX', symbol: 'TEST', name: 'Test Coin', balance: '10', metadata_uri: null, decimals: 6, market_cap: 0 }],
};

describe('PaperTradeExecutor', () => {
  const executor = new PaperTradeExecutor();

  it('buys the configured SOL amount at the observed price', async () => {
    const execution = await executor.executeCopyTrade(observedTrade({ price_per_token: 0.125 }), settings, holding);

    assert.equal(execution.transaction_type, 'Buy');
    assert.equal(execution.amount_sol, 0.25);
    assert.equal(execution.amount_token, 2);
    assert.match(execution.signature, /^paper-/);
  });

  it('sells the whole position unless sell matching is on', async () => {
    const sell = observedTrade({ transaction_type: 'Sell', price_per_token: 0.5, position_fraction_sold: 0.5 });

    const whole = await executor.executeCopyTrade(sell, settings, holding);
    assert.equal(whole.amount_token, 10);
    assert.equal(whole.amount_sol, 5);

    const matched = await executor.executeCopyTrade(sell, { ...settings, match_sell_percentage: true }, holding);
    assert.equal(matched.amount_token, 5);
    assert.equal(matched.amount_sol, 2.5);
  });

  it('sells everything when the sold share is unknown', async () => {
    const sell = observedTrade({ transaction_type: 'Sell', price_per_token: 0.5, position_fraction_sold: null });

    const execution = await executor.executeCopyTrade(sell, { ...settings, match_sell_percentage: true }, holding);

    assert.equal(execution.amount_token, 10);
  });

  it('rejects trades it cannot price or replicate', async () => {
    await assert.rejects(
      executor.executeCopyTrade(observedTrade({ price_per_token: 0 }), settings, holding),
      (error: unknown) => isAppError(error, 'InvalidPrice')
    );
    await assert.rejects(
      executor.executeCopyTrade(observedTrade({ transaction_type: 'Transfer' }), settings, holding),
      (error: unknown) => isAppError(error, 'MessageProcessingError')
    );
    await assert.rejects(
      executor.executeCopyTrade(observedTrade({ transaction_type: 'Sell' }), settings, { ...holding, tokens: [] }),
      (error: unknown) => isAppError(error, 'MessageProcessingError')
    );
  });
});
