import { randomUUID } from 'crypto';
import { heldBalance } from './copyTradeRules.js';
import { AppError } from './errors.js';
import type { CopyTradeExecution, CopyTradeSettings, ObservedTrade, WalletInfo } from './types.js';

/**
 * Submits the replica of an observed trade. Rejects when the trade could
 * not be placed.
 */
export interface TradeExecutor {
  executeCopyTrade(trade: ObservedTrade, settings: CopyTradeSettings, wallet: WalletInfo): Promise<CopyTradeExecution>;
}

/**
 * Simulated fills at the observed price. Buys spend `trade_amount_sol`.
 * Sells close the whole held balance, or with `match_sell_percentage` the
 * same share of it the tracked wallet sold.
 */
export class PaperTradeExecutor implements TradeExecutor {
  async executeCopyTrade(
    trade: ObservedTrade,
    settings: CopyTradeSettings,
    wallet: WalletInfo
  ): Promise<CopyTradeExecution> {
    if (trade.transaction_type !== 'Buy' && trade.transaction_type !== 'Sell') {
      throw new AppError('MessageProcessingError', `Cannot copy a ${trade.transaction_type} transaction`);
    }
    if (!(trade.price_per_token > 0)) {
      throw new AppError('InvalidPrice', `No usable price for ${trade.signature}: ${trade.price_per_token}`);
    }

    let amountToken: number;
    let amountSol: number;
    if (trade.transaction_type === 'Buy') {
      amountSol = settings.trade_amount_sol;
      amountToken = amountSol / trade.price_per_token;
    } else {
      const held = heldBalance(wallet, trade.token_address);
      if (held <= 0) {
        throw new AppError('MessageProcessingError', `No ${trade.token_symbol} balance to sell`);
      }
      amountToken =
        settings.match_sell_percentage && trade.position_fraction_sold !== null
          ? held * trade.position_fraction_sold
          : held;
      amountSol = amountToken * trade.price_per_token;
    }

    const execution: CopyTradeExecution = {
      signature: `paper-${randomUUID()}`,
      transaction_type: trade.transaction_type,
      amount_token: amountToken,
      amount_sol: amountSol,
      price_per_token: trade.price_per_token,
    };

    console.log(
      `[Execute] 📝 PAPER ${execution.transaction_type} ${amountToken.toFixed(4)} ${trade.token_symbol} ` +
        `for ${amountSol.toFixed(4)} SOL (slippage limit ${settings.max_slippage}%)`
    );
    return execution;
  }
}
