import type { CopyTrader } from './copyTrader.js';
import { ensureUserExists, type MonitorRepository } from './database.js';
import { AppError, errorMessage } from './errors.js';
import type { BusEvent, EventBus } from './eventBus.js';
import type { ConnectionState, FeedConnection, FeedFrame } from './feedConnection.js';
import { parseFeedMessage } from './feedMessages.js';
import { MessagePipeline, type PipelineStats } from './messagePipeline.js';
import type { TradeSource } from './tradeResolver.js';
import type { CopyTradeSettings, TrackedWallet, WalletStateChange } from './types.js';
import { SharedList } from './utils/sharedList.js';
import { StopSignal, delay } from './utils/stopSignal.js';

export interface WalletMonitorOptions {
  emptyPollMs: number;
  reconnectDelayMs: number;
  livenessTickMs: number;
  drainMs: number;
  receiveWaitMs: number;
  idleTickMs: number;
}

export const DEFAULT_WALLET_MONITOR_OPTIONS: WalletMonitorOptions = {
  emptyPollMs: 5_000,
  reconnectDelayMs: 1_000,
  livenessTickMs: 1_000,
  drainMs: 1_000,
  receiveWaitMs: 100,
  idleTickMs: 100,
};

export interface WalletMonitorDeps {
  bus: EventBus;
  repository: MonitorRepository;
  /** Builds the feed for one monitoring session; a stopped feed is not reused */
  createFeed: () => FeedConnection;
  tradeSource: TradeSource;
  copyTrader: CopyTrader;
  userId: string;
  options?: Partial<WalletMonitorOptions>;
  /** Resolves true when the monitor stopped during the wait */
  sleep?: (ms: number) => Promise<boolean>;
}

export interface WalletMonitorStatus {
  running: boolean;
  userId: string;
  trackedWallets: number;
  activeWallets: number;
  settings: number;
  feedState: ConnectionState;
  pipeline: PipelineStats;
}

/**
 * Watches the tracked wallets on the RPC log feed and copies their trades.
 *
 * Owns the shared wallet and settings lists, the feed loop, the trade
 * pipeline and the supervisor that applies bus events and checks both
 * loops are still alive.
 */
export class WalletMonitor {
  private readonly wallets: SharedList<TrackedWallet>;
  private readonly settings: SharedList<CopyTradeSettings>;
  private readonly stopSignal = new StopSignal();
  private readonly pipeline: MessagePipeline;
  private readonly options: WalletMonitorOptions;
  private running = false;
  private walletsChanged = false;

  private readonly bus: EventBus;
  private readonly createFeed: () => FeedConnection;
  private feed: FeedConnection | null = null;
  private readonly sleep: (ms: number) => Promise<boolean>;
  private readonly tradeSource: TradeSource;
  private readonly copyTrader: CopyTrader;
  private readonly userId: string;

  constructor(
    deps: Omit<WalletMonitorDeps, 'repository'>,
    wallets: readonly TrackedWallet[],
    settings: readonly CopyTradeSettings[]
  ) {
    this.bus = deps.bus;
    this.createFeed = deps.createFeed;
    this.sleep = deps.sleep ?? (ms => this.stopSignal.sleep(ms));
    this.tradeSource = deps.tradeSource;
    this.copyTrader = deps.copyTrader;
    this.userId = deps.userId;
    this.options = { ...DEFAULT_WALLET_MONITOR_OPTIONS, ...deps.options };
    this.wallets = new SharedList(wallets);
    this.settings = new SharedList(settings);
    this.pipeline = new MessagePipeline(
      async trade => {
        await this.copyTrader.handleTransaction(trade, this.settings.snapshot());
      },
      this.stopSignal,
      this.options.idleTickMs
    );
  }

  /**
   * Make sure the owning user exists, then load wallets and settings.
   */
  static async create(deps: WalletMonitorDeps): Promise<WalletMonitor> {
    console.log(`[Monitor] Initializing for user ${deps.userId}`);
    await ensureUserExists(deps.repository, deps.userId);

    let wallets: TrackedWallet[];
    let settings: CopyTradeSettings[];
    try {
      wallets = await deps.repository.getTrackedWallets();
    } catch (error) {
      throw new AppError('InitializationError', `Failed to fetch wallets: ${errorMessage(error)}`, { cause: error });
    }
    try {
      settings = await deps.repository.getCopyTradeSettings();
    } catch (error) {
      throw new AppError('InitializationError', `Failed to fetch settings: ${errorMessage(error)}`, { cause: error });
    }

    console.log(`[Monitor] Fetched ${wallets.length} tracked wallet(s)`);
    console.log(`[Monitor] Fetched ${settings.length} copy trade setting(s)`);
    return new WalletMonitor(deps, wallets, settings);
  }

  getTrackedWallets(): TrackedWallet[] {
    return this.wallets.snapshot();
  }

  getSettings(): CopyTradeSettings[] {
    return this.settings.snapshot();
  }

  getStatus(): WalletMonitorStatus {
    const wallets = this.wallets.snapshot();
    return {
      running: this.running,
      userId: this.userId,
      trackedWallets: wallets.length,
      activeWallets: wallets.filter(wallet => wallet.is_active).length,
      settings: this.settings.length,
      feedState: this.feed?.state ?? 'Disconnected',
      pipeline: this.pipeline.getStats(),
    };
  }

  /**
   * Run a monitoring session. Resolves after `stop()`; rejects with a
   * ServerError when the feed loop or the pipeline ends on its own.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new AppError('ServerError', 'Wallet monitor is already running');
    }
    console.log('[Monitor] Starting...');
    this.stopSignal.reset();
    this.running = true;
    const feed = this.createFeed();
    this.feed = feed;

    const finished = { feed: false, pipeline: false };
    void this.runFeedLoop(feed)
      .catch(error => console.error(`[Monitor] ❌ Feed loop failed: ${errorMessage(error)}`))
      .finally(() => {
        finished.feed = true;
      });
    void this.pipeline
      .run()
      .catch(error => console.error(`[Monitor] ❌ Pipeline failed: ${errorMessage(error)}`))
      .finally(() => {
        finished.pipeline = true;
      });

    const receiver = this.bus.subscribe();
    console.log('[Monitor] ✅ Started, waiting for tasks');

    try {
      while (!this.stopSignal.stopped) {
        const event = await receiver.recv(this.options.livenessTickMs, this.stopSignal.signal);
        if (event) {
          try {
            this.handleEvent(event);
          } catch (error) {
            console.error(`[Monitor] Failed to apply ${event.kind}: ${errorMessage(error)}`);
          }
        }

        if (!this.stopSignal.stopped && (finished.feed || finished.pipeline)) {
          const task = finished.feed ? 'feed loop' : 'pipeline';
          throw new AppError('ServerError', `The ${task} finished unexpectedly`);
        }
      }
      console.log('[Monitor] Stop signal received, shutting down');
    } finally {
      receiver.close();
      this.stopSignal.stop();
      this.running = false;
    }
  }

  async stop(): Promise<void> {
    console.log('[Monitor] Stopping...');
    this.stopSignal.stop();
    await delay(this.options.drainMs);
    console.log('[Monitor] Stopped');
  }

  // ============================================================================
  // SHARED STATE
  // ============================================================================

  private handleEvent(event: BusEvent): void {
    switch (event.kind) {
      case 'settings-updated': {
        const incoming = event.notification.data;
        const outcome = this.settings.upsert(
          existing => existing.tracked_wallet_id === incoming.tracked_wallet_id,
          incoming
        );
        console.log(`[Monitor] Settings ${outcome} for tracked wallet ${incoming.tracked_wallet_id ?? '(none)'}`);
        break;
      }
      case 'settings-deleted': {
        const { settings_id } = event.notification.data;
        const removed = this.settings.remove(existing => existing.id === settings_id);
        console.log(`[Monitor] Settings ${settings_id} deleted (${removed} removed)`);
        break;
      }
      case 'wallet-state-changed':
        this.applyWalletChange(event.notification.data);
        break;
      default:
        break;
    }
  }

  private applyWalletChange(change: WalletStateChange): void {
    const address = change.wallet_address;
    const matches = (wallet: TrackedWallet): boolean => wallet.wallet_address === address;
    const now = new Date().toISOString();

    switch (change.change_type) {
      case 'Added': {
        const existing = this.wallets.snapshot().find(matches);
        this.wallets.upsert(matches, {
          id: change.details?.id ?? existing?.id ?? null,
          user_id: existing?.user_id ?? this.userId,
          wallet_address: address,
          is_active: change.details?.is_active ?? true,
          created_at: existing?.created_at ?? now,
          updated_at: now,
        });
        break;
      }
      case 'Archived':
      case 'Unarchived':
      case 'Updated': {
        const isActive =
          change.change_type === 'Archived' ? false : change.change_type === 'Unarchived' ? true : change.details?.is_active;
        if (isActive === undefined) return;
        this.wallets.update(draft => {
          for (let i = 0; i < draft.length; i++) {
            if (matches(draft[i])) {
              draft[i] = { ...draft[i], is_active: isActive, updated_at: now };
            }
          }
        });
        break;
      }
      case 'Deleted':
        this.wallets.remove(matches);
        break;
      default:
        console.warn(`[Monitor] Ignoring unknown wallet change ${String(change.change_type)} for ${address}`);
        return;
    }

    console.log(`[Monitor] Wallet ${address} ${change.change_type.toLowerCase()}`);
    this.walletsChanged = true;
  }

  private activeAddresses(): string[] {
    return this.wallets
      .snapshot()
      .filter(wallet => wallet.is_active)
      .map(wallet => wallet.wallet_address);
  }

  // ============================================================================
  // FEED LOOP
  // ============================================================================

  private async runFeedLoop(feed: FeedConnection): Promise<void> {
    try {
      while (!this.stopSignal.stopped) {
        const addresses = this.activeAddresses();
        if (addresses.length === 0) {
          await this.sleep(this.options.emptyPollMs);
          continue;
        }

        try {
          await feed.ensureConnection();
        } catch (error) {
          console.error(`[Monitor] Failed to ensure connection: ${errorMessage(error)}`);
          await this.sleep(this.options.reconnectDelayMs);
          continue;
        }

        this.walletsChanged = false;
        try {
          await feed.subscribe(addresses);
        } catch (error) {
          console.error(`[Monitor] Failed to subscribe to wallets: ${errorMessage(error)}`);
          feed.reset();
          await this.sleep(this.options.reconnectDelayMs);
          continue;
        }

        await this.drainFeed(feed);
      }
    } finally {
      await feed.shutdown();
    }
  }

  /**
   * Read frames until the connection drops, the wallet set changes or the
   * monitor stops. A changed wallet set drops the connection so the next
   * pass subscribes afresh.
   */
  private async drainFeed(feed: FeedConnection): Promise<void> {
    while (!this.stopSignal.stopped) {
      if (this.walletsChanged) {
        console.log('[Monitor] Tracked wallets changed, resubscribing');
        feed.reset();
        return;
      }

      let frame: FeedFrame;
      try {
        frame = await feed.receiveMessage(this.options.receiveWaitMs);
      } catch (error) {
        console.error(`[Monitor] WebSocket error: ${errorMessage(error)}`);
        return;
      }

      switch (frame.kind) {
        case 'idle':
        case 'binary':
          break;
        case 'close':
          console.warn(`[Monitor] Feed closed (${frame.code}${frame.reason ? `: ${frame.reason}` : ''})`);
          feed.reset();
          return;
        case 'text':
          try {
            await this.handleFeedText(feed, frame.data);
          } catch (error) {
            console.error(`[Monitor] Message handling error: ${errorMessage(error)}`);
          }
          break;
      }
    }
  }

  private async handleFeedText(feed: FeedConnection, text: string): Promise<void> {
    const message = parseFeedMessage(text);
    switch (message.kind) {
      case 'subscription-ack':
        feed.confirmSubscription(message.id, message.subscriptionId);
        break;
      case 'error':
        console.warn(`[Monitor] Feed error for request ${message.id ?? '-'}: ${message.message}`);
        break;
      case 'logs': {
        if (message.failed) {
          console.log(`[Monitor] ⏭️ Skipping failed transaction ${message.signature.substring(0, 12)}...`);
          return;
        }
        const address = feed.addressForSubscription(message.subscriptionId);
        const trade = await this.tradeSource.resolve(message.signature, address);
        if (trade) {
          this.pipeline.enqueue(trade);
        }
        break;
      }
      case 'unknown':
        break;
    }
  }
}
