import { AsyncQueue } from './utils/asyncQueue.js';
import type { StopSignal } from './utils/stopSignal.js';
import { errorMessage } from './errors.js';
import type { ObservedTrade } from './types.js';

export const DEFAULT_IDLE_TICK_MS = 100;

export type TradeHandler = (trade: ObservedTrade) => Promise<void>;

export interface PipelineStats {
  processed: number;
  failed: number;
  pending: number;
}

/**
 * Single consumer over a FIFO queue of observed trades. Trades are handled
 * one at a time; a failing trade is logged and the loop moves on.
 */
export class MessagePipeline {
  private readonly queue = new AsyncQueue<ObservedTrade>();
  private processed = 0;
  private failed = 0;

  constructor(
    private readonly handler: TradeHandler,
    private readonly stopSignal: StopSignal,
    private readonly idleTickMs: number = DEFAULT_IDLE_TICK_MS
  ) {}

  enqueue(trade: ObservedTrade): void {
    if (!this.queue.push(trade)) {
      console.warn(`[Pipeline] Queue closed, dropping ${trade.signature.substring(0, 12)}...`);
    }
  }

  get pending(): number {
    return this.queue.size;
  }

  getStats(): PipelineStats {
    return { processed: this.processed, failed: this.failed, pending: this.queue.size };
  }

  /**
   * Drain the queue until the stop signal is raised. Resolves once stopped.
   */
  async run(): Promise<void> {
    console.log('[Pipeline] Message processing started');
    while (!this.stopSignal.stopped) {
      const trade = await this.queue.next(this.idleTickMs, this.stopSignal.signal);
      if (!trade) continue;

      try {
        await this.handler(trade);
        this.processed++;
      } catch (error) {
        this.failed++;
        console.error(`[Pipeline] ❌ Error processing ${trade.signature}: ${errorMessage(error)}`);
      }
    }
    console.log('[Pipeline] Message processing stopped');
  }
}
