import { calculatePriceChange } from './priceCalculator.js';
import type { CopyTradeSettings, ObservedTrade, TokenInfo, WalletInfo } from './types.js';

export type CopyTradeDecision =
  | { copy: true }
  | { copy: false; reason: string };

/**
 * Decides whether an observed trade may be copied for one settings entry
 */
export type CopyTradePredicate = (
  trade: ObservedTrade,
  settings: CopyTradeSettings,
  wallet: WalletInfo
) => CopyTradeDecision;

function skip(reason: string): CopyTradeDecision {
  return { copy: false, reason };
}

export function heldBalance(wallet: WalletInfo, tokenAddress: string): number {
  const token = wallet.tokens.find(t => t.address === tokenAddress);
  if (!token) return 0;
  const balance = Number(token.balance);
  return Number.isFinite(balance) ? balance : 0;
}

function isOpenPosition(token: TokenInfo): boolean {
  const balance = Number(token.balance);
  return Number.isFinite(balance) && balance > 0;
}

export const evaluateCopyTrade: CopyTradePredicate = (trade, settings, wallet) => {
  if (trade.transaction_type !== 'Buy' && trade.transaction_type !== 'Sell') {
    return skip(`${trade.transaction_type} transactions are not copied`);
  }

  if (settings.use_allowed_tokens_list && !(settings.allowed_tokens ?? []).includes(trade.token_address)) {
    return skip(`token ${trade.token_address} is not in the allowed list`);
  }

  // Observed fill against the market-cap price, when the resolver knew both
  if (trade.market_price_sol !== null && trade.market_price_sol > 0 && trade.price_per_token > 0) {
    const deviation = Math.abs(calculatePriceChange(trade.market_price_sol, trade.price_per_token));
    if (deviation > settings.max_slippage) {
      return skip(`price moved ${deviation.toFixed(2)}% from market, slippage limit is ${settings.max_slippage}%`);
    }
  }

  const held = heldBalance(wallet, trade.token_address);

  if (trade.transaction_type === 'Sell') {
    return held > 0 ? { copy: true } : skip('no position to sell');
  }

  // Buy
  if (wallet.balance - settings.trade_amount_sol < settings.min_sol_balance) {
    return skip(
      `balance ${wallet.balance} SOL would drop below the ${settings.min_sol_balance} SOL minimum`
    );
  }
  if (held > 0) {
    return settings.allow_additional_buys ? { copy: true } : skip('additional buys are disabled');
  }
  const openPositions = wallet.tokens.filter(isOpenPosition).length;
  if (openPositions >= settings.max_open_positions) {
    return skip(`${openPositions} open positions, limit is ${settings.max_open_positions}`);
  }
  return { copy: true };
};
