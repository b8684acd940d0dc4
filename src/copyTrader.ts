import { randomUUID } from 'crypto';
import { CopyTradePredicate, evaluateCopyTrade } from './copyTradeRules.js';
import { AppError, errorMessage } from './errors.js';
import { EventBus, createEvent } from './eventBus.js';
import type { TradeExecutor } from './tradeExecutor.js';
import type {
  CopyTradeExecution,
  CopyTradeSettings,
  ObservedTrade,
  TradeExecutionRequest,
  TradeExecutionResponse,
  TransactionLog,
  WalletInfo,
} from './types.js';
import type { WalletService } from './walletClient.js';

export interface CopyTraderOptions {
  bus: EventBus;
  walletService: WalletService;
  executor: TradeExecutor;
  userId: string;
  shouldCopyTrade?: CopyTradePredicate;
}

export type CopyTradeOutcome =
  | { status: 'disabled' }
  | { status: 'skipped'; reason: string }
  | { status: 'executed'; execution: CopyTradeExecution };

/**
 * Decides and replicates one observed trade, then records it.
 *
 * Every trade handed in produces exactly one `transaction-logged` and one
 * `tracked-wallet-trade` event, whatever happens to the copy.
 */
export class CopyTrader {
  private readonly bus: EventBus;
  private readonly walletService: WalletService;
  private readonly executor: TradeExecutor;
  private readonly userId: string;
  private readonly shouldCopyTrade: CopyTradePredicate;

  constructor(options: CopyTraderOptions) {
    this.bus = options.bus;
    this.walletService = options.walletService;
    this.executor = options.executor;
    this.userId = options.userId;
    this.shouldCopyTrade = options.shouldCopyTrade ?? evaluateCopyTrade;
  }

  async handleTransaction(trade: ObservedTrade, settingsList: readonly CopyTradeSettings[]): Promise<CopyTradeOutcome> {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`[CopyTrader] 📥 ${trade.transaction_type} ${trade.signature}`);
    console.log(`   Token: ${trade.token_name} (${trade.token_symbol}) - ${trade.token_address}`);
    console.log(`   Amount: ${trade.amount_token} ${trade.token_symbol} for ${trade.amount_sol} SOL`);
    console.log(`   Price: ${trade.price_per_token} SOL | DEX: ${trade.dex_type}`);
    console.log(`   Seller: ${trade.seller} | Buyer: ${trade.buyer}`);

    // Not matched to the trade's wallet: the first entry applies to every trade
    const settings = settingsList[0];

    let outcome: CopyTradeOutcome = { status: 'disabled' };
    let failure: unknown = null;
    if (settings?.is_enabled) {
      try {
        outcome = await this.copyTrade(trade, settings);
      } catch (error) {
        failure = error;
        console.error(`[CopyTrader] ❌ Copy trade failed for ${trade.signature}: ${errorMessage(error)}`);
      }
    } else {
      console.log('[CopyTrader] Copy trading disabled, recording only');
    }

    this.bus.publish(createEvent('transaction-logged', this.buildTransactionLog(trade)));
    this.bus.publish(createEvent('tracked-wallet-trade', trade));
    console.log(`${'='.repeat(60)}\n`);

    if (failure !== null) {
      throw new AppError('MessageProcessingError', `Copy trade failed: ${errorMessage(failure)}`, {
        cause: failure,
      });
    }
    return outcome;
  }

  private async copyTrade(trade: ObservedTrade, settings: CopyTradeSettings): Promise<CopyTradeOutcome> {
    let walletInfo: WalletInfo;
    try {
      walletInfo = await this.walletService.getWalletInfo();
    } catch (error) {
      throw new AppError('ServerError', `Failed to get wallet info: ${errorMessage(error)}`, { cause: error });
    }

    const decision = this.shouldCopyTrade(trade, settings, walletInfo);
    if (!decision.copy) {
      console.log(`[CopyTrader] ⏭️  Not copying: ${decision.reason}`);
      return { status: 'skipped', reason: decision.reason };
    }

    const execution = await this.executor.executeCopyTrade(trade, settings, walletInfo);
    console.log(`[CopyTrader] ✅ Copied as ${execution.signature}`);

    // The wallet service records the observed trade it was asked to mirror
    const request: TradeExecutionRequest = {
      signature: trade.signature,
      token_address: trade.token_address,
      token_name: trade.token_name,
      token_symbol: trade.token_symbol,
      transaction_type: trade.transaction_type,
      amount_token: trade.amount_token,
      amount_sol: trade.amount_sol,
      price_per_token: trade.price_per_token,
      token_image_uri: trade.token_image_uri,
    };
    let response: TradeExecutionResponse;
    try {
      response = await this.walletService.handleTradeExecution(request);
    } catch (error) {
      throw new AppError('ServerError', `Failed to update wallet: ${errorMessage(error)}`, { cause: error });
    }
    if (!response.success) {
      throw new AppError('ServerError', `Failed to update wallet: ${response.error ?? 'rejected'}`);
    }

    this.bus.publish(createEvent('copy-trade-executed', trade));
    return { status: 'executed', execution };
  }

  private buildTransactionLog(trade: ObservedTrade): TransactionLog {
    return {
      id: randomUUID(),
      user_id: this.userId,
      tracked_wallet_id: null,
      signature: trade.signature,
      transaction_type: trade.transaction_type,
      token_address: trade.token_address,
      amount: trade.amount_token,
      price_sol: trade.price_per_token,
      timestamp: new Date().toISOString(),
    };
  }
}
