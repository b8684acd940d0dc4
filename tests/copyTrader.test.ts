import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { CopyTrader } from '../src/copyTrader.js';
import { BusEvent, EventBus, EventReceiver } from '../src/eventBus.js';
import { isAppError } from '../src/errors.js';
import { MessagePipeline } from '../src/messagePipeline.js';
import { PaperTradeExecutor, type TradeExecutor } from '../src/tradeExecutor.js';
import type { WalletService } from '../src/walletClient.js';
import { StopSignal } from '../src/utils/stopSignal.js';
import {
  DEFAULT_COPY_TRADE_SETTINGS,
  type CopyTradeExecution,
  type CopyTradeSettings,
  type ObservedTrade,
  type TradeExecutionRequest,
  type TradeExecutionResponse,
  type WalletInfo,
} from '../src/types.js';
import { observedTrade } from './fakes.js';

class FakeWalletService implements WalletService {
  info: WalletInfo = { balance: 5, tokens: [], address: 'ServerWallet' };
  requests: TradeExecutionRequest[] = [];
  infoCalls = 0;

  async getWalletInfo(): Promise<WalletInfo> {
    this.infoCalls++;
    return this.info;
  }

  async handleTradeExecution(request: TradeExecutionRequest): Promise<TradeExecutionResponse> {
    this.requests.push(request);
    return { success: true, error: null };
  }
}

class CountingExecutor implements TradeExecutor {
  calls: string[] = [];
  failOn = new Set<string>();
  private readonly paper = new PaperTradeExecutor();

  async executeCopyTrade(trade: ObservedTrade, settings: CopyTradeSettings, wallet: WalletInfo): Promise<CopyTradeExecution> {
    this.calls.push(trade.signature);
    if (this.failOn.has(trade.signature)) {
      throw new Error('swap rejected');
    }
    return this.paper.executeCopyTrade(trade, settings, wallet);
  }
}

const enabled: CopyTradeSettings = {
  ...DEFAULT_COPY_TRADE_SETTINGS,
  id: 'settings-1',
  tracked_wallet_id: 'wallet-1',
  is_enabled: true,
  trade_amount_sol: 0.25,
  max_open_positions: 3,
};

function drain(receiver: EventReceiver): BusEvent[] {
  const events: BusEvent[] = [];
  for (let event = receiver.tryRecv(); event; event = receiver.tryRecv()) {
    events.push(event);
  }
  return events;
}

function kinds(events: BusEvent[]): string[] {
  return events.map(event => event.kind);
}

describe('CopyTrader', () => {
  let bus: EventBus;
  let receiver: EventReceiver;
  let walletService: FakeWalletService;
  let executor: CountingExecutor;
  let trader: CopyTrader;

  beforeEach(() => {
    bus = new EventBus();
    receiver = bus.subscribe();
    walletService = new FakeWalletService();
    executor = new CountingExecutor();
    trader = new CopyTrader({ bus, walletService, executor, userId: 'ServerWallet' });
  });

  afterEach(() => {
    receiver.close();
  });

  it('only records the trade when copying is disabled', async () => {
    const outcome = await trader.handleTransaction(observedTrade(), [{ ...enabled, is_enabled: false }]);

    assert.deepEqual(outcome, { status: 'disabled' });
    assert.deepEqual(executor.calls, []);
    assert.equal(walletService.infoCalls, 0);
    assert.deepEqual(kinds(drain(receiver)), ['transaction-logged', 'tracked-wallet-trade']);
  });

  it('only records the trade without any settings', async () => {
    const outcome = await trader.handleTransaction(observedTrade(), []);

    assert.deepEqual(outcome, { status: 'disabled' });
    assert.deepEqual(kinds(drain(receiver)), ['transaction-logged', 'tracked-wallet-trade']);
  });

  it('builds the transaction log from the observed trade', async () => {
    await trader.handleTransaction(observedTrade({ amount_token: 1234, price_per_token: 0.002 }), []);

    const logged = drain(receiver).find(event => event.kind === 'transaction-logged');
    assert.ok(logged && logged.kind === 'transaction-logged');
    const log = logged.notification.data;
    assert.equal(logged.notification.type, 'transaction_logged');
    assert.equal(log.user_id, 'ServerWallet');
    assert.equal(log.tracked_wallet_id, null);
    assert.equal(log.signature, 'Sig1');
    assert.equal(log.transaction_type, 'Buy');
    assert.equal(log.token_address, 'MintX');
    assert.equal(log.amount, 1234);
    assert.equal(log.price_sol, 0.002);
    assert.match(log.id, /^[0-9a-f-]{36}$/);
    assert.equal(new Date(log.timestamp).toISOString(), log.timestamp);
  });

  it('executes, reports the observed trade to the wallet service and announces the copy', async () => {
    const outcome = await trader.handleTransaction(observedTrade({ price_per_token: 0.125 }), [enabled]);

    assert.equal(outcome.status, 'executed');
    if (outcome.status !== 'executed') return;
    assert.equal(outcome.execution.amount_sol, 0.25);
    assert.equal(outcome.execution.amount_token, 2);
    assert.match(outcome.execution.signature, /^paper-/);
    assert.deepEqual(executor.calls, ['Sig1']);
    assert.deepEqual(walletService.requests, [
      {
        signature: 'Sig1',
        token_address: 'MintX',
        token_name: 'Test Coin',
        token_symbol: 'TEST',
        transaction_type: 'Buy',
        amount_token: 1000,
        amount_sol: 0.5,
        price_per_token: 0.125,
        token_image_uri: '',
      },
    ]);
    assert.deepEqual(kinds(drain(receiver)), ['copy-trade-executed', 'transaction-logged', 'tracked-wallet-trade']);
  });

  it('uses only the first settings entry', async () => {
    const outcome = await trader.handleTransaction(observedTrade(), [
      { ...enabled, is_enabled: false, tracked_wallet_id: 'other' },
      enabled,
    ]);

    assert.deepEqual(outcome, { status: 'disabled' });
    assert.deepEqual(executor.calls, []);
  });

  it('skips trades the predicate rejects', async () => {
    const rejecting = new CopyTrader({
      bus,
      walletService,
      executor,
      userId: 'ServerWallet',
      shouldCopyTrade: () => ({ copy: false, reason: 'not today' }),
    });

    const outcome = await rejecting.handleTransaction(observedTrade(), [enabled]);

    assert.deepEqual(outcome, { status: 'skipped', reason: 'not today' });
    assert.equal(walletService.infoCalls, 1);
    assert.deepEqual(executor.calls, []);
    assert.deepEqual(kinds(drain(receiver)), ['transaction-logged', 'tracked-wallet-trade']);
  });

  it('still records a trade whose copy failed, then raises a processing error', async () => {
    executor.failOn.add('Sig1');

    await assert.rejects(
      trader.handleTransaction(observedTrade(), [enabled]),
      (error: unknown) => isAppError(error, 'MessageProcessingError') && error.message.includes('swap rejected')
    );

    assert.deepEqual(walletService.requests, []);
    assert.deepEqual(kinds(drain(receiver)), ['transaction-logged', 'tracked-wallet-trade']);
  });

  it('treats a rejected wallet update as a failed copy', async () => {
    walletService.handleTradeExecution = async request => {
      walletService.requests.push(request);
      return { success: false, error: 'ledger locked' };
    };

    await assert.rejects(
      trader.handleTransaction(observedTrade(), [enabled]),
      (error: unknown) => isAppError(error, 'MessageProcessingError') && error.message.includes('ledger locked')
    );
    assert.deepEqual(kinds(drain(receiver)), ['transaction-logged', 'tracked-wallet-trade']);
  });
});

describe('CopyTrader in the message pipeline', () => {
  it('keeps processing after a failed copy', async () => {
    const bus = new EventBus();
    const receiver = bus.subscribe();
    const walletService = new FakeWalletService();
    const executor = new CountingExecutor();
    executor.failOn.add('Bad');
    const trader = new CopyTrader({ bus, walletService, executor, userId: 'ServerWallet' });

    const stop = new StopSignal();
    let handled = 0;
    const pipeline = new MessagePipeline(
      async trade => {
        try {
          await trader.handleTransaction(trade, [enabled]);
        } finally {
          handled++;
          if (handled === 2) stop.stop();
        }
      },
      stop,
      5
    );

    pipeline.enqueue(observedTrade({ signature: 'Bad' }));
    pipeline.enqueue(observedTrade({ signature: 'Good' }));
    await pipeline.run();

    assert.deepEqual(executor.calls, ['Bad', 'Good']);
    assert.deepEqual(pipeline.getStats(), { processed: 1, failed: 1, pending: 0 });
    assert.deepEqual(kinds(drain(receiver)), [
      'transaction-logged',
      'tracked-wallet-trade',
      'copy-trade-executed',
      'transaction-logged',
      'tracked-wallet-trade',
    ]);
    receiver.close();
  });
});
