import { Redis } from 'ioredis';
import type { ConnectionMonitor } from './connectionMonitor.js';
import { AppError, errorMessage } from './errors.js';
import { EventBus, createEvent } from './eventBus.js';
import {
  parseCopyTradeSettings,
  parsePriceUpdate,
  parseSettingsDeletion,
  parseSolPriceUpdate,
  parseTrackedWalletUpdate,
  walletChangeTypeForAction,
} from './relayPayloads.js';
import type {
  CopyTradeSettings,
  PriceUpdate,
  SolPriceUpdate,
  TrackedWallet,
  TrackedWalletAction,
  TrackedWalletUpdate,
} from './types.js';
import { isRecord } from './utils/jsonGuards.js';
import { delay } from './utils/stopSignal.js';

export const SETTINGS_CHANNEL = 'settings';
export const TRACKED_WALLETS_CHANNEL = 'tracked_wallets';
export const PRICE_UPDATES_CHANNEL = 'price_updates';
export const SOL_PRICE_UPDATES_CHANNEL = 'sol_price_updates';

export const RELAY_CHANNELS = [
  SETTINGS_CHANNEL,
  TRACKED_WALLETS_CHANNEL,
  PRICE_UPDATES_CHANNEL,
  SOL_PRICE_UPDATES_CHANNEL,
] as const;

export const RECONNECT_DELAY_MS = 1000;
export const MAX_RETRIES = 5;
export const KEEP_ALIVE_INTERVAL_MS = 30_000;

/**
 * Message seen on the subscriber connection
 */
export interface RelayFrame {
  channel: string;
  payload: string;
}

/**
 * The slice of ioredis the relay uses
 */
export interface RelayRedisClient {
  publish(channel: string, message: string): Promise<number>;
  subscribe(...channels: string[]): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'ready' | 'reconnecting' | 'end', listener: () => void): unknown;
}

export interface RedisRelayOptions {
  clientFactory?: (url: string) => RelayRedisClient;
  sleep?: (ms: number) => Promise<void>;
  maxRetries?: number;
  retryDelayMs?: number;
  keepAliveIntervalMs?: number;
}

function createRedisClient(url: string): RelayRedisClient {
  return new Redis(url, {
    enableReadyCheck: true,
    maxRetriesPerRequest: 2,
    autoResubscribe: true,
  });
}

/**
 * Mirrors bus events to Redis pub/sub and back, so sibling instances see
 * the same settings, wallet and price changes.
 *
 * Publishing and subscribing use separate connections: a Redis connection
 * in subscriber mode cannot publish.
 */
export class RedisRelay {
  private readonly publisher: RelayRedisClient;
  private subscriber: RelayRedisClient | null = null;
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private forwarders: Array<() => void> = [];

  private readonly clientFactory: (url: string) => RelayRedisClient;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly keepAliveIntervalMs: number;

  constructor(
    private readonly redisUrl: string,
    private readonly bus: EventBus,
    private readonly connectionMonitor: ConnectionMonitor,
    options: RedisRelayOptions = {}
  ) {
    this.clientFactory = options.clientFactory ?? createRedisClient;
    this.sleep = options.sleep ?? delay;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? RECONNECT_DELAY_MS;
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? KEEP_ALIVE_INTERVAL_MS;

    this.publisher = this.clientFactory(this.redisUrl);
    this.publisher.on('error', error => {
      console.error(`[Relay] Publisher error: ${error.message}`);
    });
    this.publisher.on('reconnecting', () => {
      this.connectionMonitor.updateStatus('Redis', 'Reconnecting');
    });
    this.publisher.on('ready', () => {
      this.connectionMonitor.updateStatus('Redis', 'Connected');
    });
  }

  async connect(): Promise<void> {
    this.connectionMonitor.updateStatus('Redis', 'Connecting');
    try {
      await this.publisher.ping();
    } catch (error) {
      this.connectionMonitor.updateStatus('Redis', 'Error', errorMessage(error));
      throw new AppError('InitializationError', `Redis connection failed: ${errorMessage(error)}`, { cause: error });
    }
    this.connectionMonitor.updateStatus('Redis', 'Connected');
    console.log('[Relay] ✅ Redis connected');
  }

  // ============================================================================
  // PUBLISHING
  // ============================================================================

  async publishSettingsUpdate(settings: CopyTradeSettings): Promise<void> {
    await this.publishWithRetry(SETTINGS_CHANNEL, JSON.stringify(settings), 'settings update');
  }

  async publishSettingsDelete(settingsId: string): Promise<void> {
    await this.publishWithRetry(SETTINGS_CHANNEL, JSON.stringify({ settings_id: settingsId }), 'settings delete');
  }

  async publishTrackedWalletUpdate(wallet: TrackedWallet, action: TrackedWalletAction): Promise<void> {
    const payload: TrackedWalletUpdate = {
      wallet_address: wallet.wallet_address,
      action,
      is_active: wallet.is_active,
      id: wallet.id,
    };
    await this.publishWithRetry(TRACKED_WALLETS_CHANNEL, JSON.stringify(payload), 'tracked wallet update');
  }

  async publishWalletAddressUpdate(walletAddress: string, action: TrackedWalletAction): Promise<void> {
    const payload: TrackedWalletUpdate = { wallet_address: walletAddress, action };
    await this.publishWithRetry(TRACKED_WALLETS_CHANNEL, JSON.stringify(payload), 'wallet address update');
  }

  async publishPriceUpdate(update: PriceUpdate): Promise<void> {
    await this.publishWithRetry(PRICE_UPDATES_CHANNEL, JSON.stringify(update), 'price update');
  }

  async publishSolPriceUpdate(update: SolPriceUpdate): Promise<void> {
    await this.publishWithRetry(SOL_PRICE_UPDATES_CHANNEL, JSON.stringify(update), 'SOL price update');
  }

  private async publishWithRetry(channel: string, message: string, label: string): Promise<void> {
    let retries = 0;
    for (;;) {
      try {
        await this.publisher.publish(channel, message);
        return;
      } catch (error) {
        if (retries >= this.maxRetries) {
          this.connectionMonitor.updateStatus('Redis', 'Error', `Failed to publish ${label}`);
          throw new AppError(
            'RedisError',
            `Failed to publish ${label} after ${retries} retries: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        retries++;
        console.warn(
          `[Relay] Publish of ${label} failed (retry ${retries}/${this.maxRetries} in ${this.retryDelayMs}ms): ${errorMessage(error)}`
        );
        await this.sleep(this.retryDelayMs);
      }
    }
  }

  /**
   * Publish locally originated settings and price events. Events that came
   * in from Redis are not sent back.
   */
  forwardLocalEvents(): () => void {
    const forward = (label: string, publish: () => Promise<void>): void => {
      publish().catch(error => {
        console.error(`[Relay] Failed to forward ${label}: ${errorMessage(error)}`);
      });
    };

    this.forwarders.push(
      this.bus.on('settings-updated', event => {
        if (event.origin !== 'local') return;
        forward('settings update', () => this.publishSettingsUpdate(event.notification.data));
      }),
      this.bus.on('settings-deleted', event => {
        if (event.origin !== 'local') return;
        forward('settings delete', () => this.publishSettingsDelete(event.notification.data.settings_id));
      }),
      this.bus.on('price-updated', event => {
        if (event.origin !== 'local') return;
        forward('price update', () => this.publishPriceUpdate(event.notification.data));
      }),
      this.bus.on('sol-price-updated', event => {
        if (event.origin !== 'local') return;
        forward('SOL price update', () => this.publishSolPriceUpdate(event.notification.data));
      })
    );

    return () => this.stopForwarding();
  }

  // ============================================================================
  // SUBSCRIBING
  // ============================================================================

  async subscribeToUpdates(): Promise<void> {
    if (this.subscriber) return;

    const subscriber = this.clientFactory(this.redisUrl);
    this.subscriber = subscriber;
    subscriber.on('error', error => {
      console.error(`[Relay] Subscriber error: ${error.message}`);
    });
    subscriber.on('message', (channel, payload) => {
      this.handleFrame({ channel, payload });
    });

    try {
      await subscriber.subscribe(...RELAY_CHANNELS);
    } catch (error) {
      throw new AppError('RedisError', `Failed to subscribe to relay channels: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    console.log(`[Relay] 📡 Subscribed to ${RELAY_CHANNELS.join(', ')}`);

    this.startKeepAlive(subscriber);
  }

  /**
   * Turn one subscriber frame into a bus event. Bad payloads are logged and
   * dropped.
   */
  handleFrame(frame: RelayFrame): void {
    let value: unknown;
    try {
      value = JSON.parse(frame.payload);
    } catch (error) {
      console.error(`[Relay] Malformed payload on ${frame.channel}: ${errorMessage(error)}`);
      return;
    }

    switch (frame.channel) {
      case SETTINGS_CHANNEL:
        this.handleSettingsPayload(value);
        break;
      case TRACKED_WALLETS_CHANNEL:
        this.handleTrackedWalletPayload(value);
        break;
      case PRICE_UPDATES_CHANNEL: {
        const update = parsePriceUpdate(value);
        if (!update) {
          console.error('[Relay] Invalid price update payload');
          return;
        }
        this.bus.publish(createEvent('price-updated', update, 'relay'));
        break;
      }
      case SOL_PRICE_UPDATES_CHANNEL: {
        const update = parseSolPriceUpdate(value);
        if (!update) {
          console.error('[Relay] Invalid SOL price update payload');
          return;
        }
        this.bus.publish(createEvent('sol-price-updated', update, 'relay'));
        break;
      }
      default:
        console.warn(`[Relay] Message on unexpected channel ${frame.channel}`);
    }
  }

  private handleSettingsPayload(value: unknown): void {
    if (isRecord(value) && 'settings_id' in value && !('trade_amount_sol' in value)) {
      const deletion = parseSettingsDeletion(value);
      if (!deletion) {
        console.error('[Relay] Invalid settings delete payload');
        return;
      }
      this.bus.publish(createEvent('settings-deleted', deletion, 'relay'));
      return;
    }

    const settings = parseCopyTradeSettings(value);
    if (!settings) {
      console.error('[Relay] Invalid settings payload');
      return;
    }
    this.bus.publish(createEvent('settings-updated', settings, 'relay'));
  }

  private handleTrackedWalletPayload(value: unknown): void {
    const update = parseTrackedWalletUpdate(value);
    if (!update) {
      console.error('[Relay] Invalid tracked wallet payload');
      return;
    }

    const changeType = walletChangeTypeForAction(update.action);
    if (!changeType) {
      console.warn(`[Relay] Ignoring unknown wallet action "${update.action}"`);
      return;
    }

    this.bus.publish(
      createEvent(
        'wallet-state-changed',
        {
          wallet_address: update.wallet_address,
          change_type: changeType,
          timestamp: Math.floor(Date.now() / 1000),
          details: update,
        },
        'relay'
      )
    );
  }

  // ============================================================================
  // HEALTH & LIFECYCLE
  // ============================================================================

  private startKeepAlive(subscriber: RelayRedisClient): void {
    this.stopKeepAlive();
    this.keepAliveTimer = setInterval(() => {
      subscriber.ping().catch(error => {
        console.error(`[Relay] Keep-alive ping failed, stopping keep-alive: ${errorMessage(error)}`);
        this.stopKeepAlive();
        this.connectionMonitor.updateStatus('Redis', 'Error', 'Keep-alive ping failed');
      });
    }, this.keepAliveIntervalMs);
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private stopForwarding(): void {
    for (const off of this.forwarders.splice(0)) {
      off();
    }
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.publisher.ping()) === 'PONG';
    } catch (error) {
      console.warn(`[Relay] Health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    this.stopKeepAlive();
    this.stopForwarding();

    const clients = this.subscriber ? [this.subscriber, this.publisher] : [this.publisher];
    this.subscriber = null;
    for (const client of clients) {
      try {
        await client.quit();
      } catch (error) {
        console.error(`[Relay] Redis disconnect error: ${errorMessage(error)}`);
      }
    }
    this.connectionMonitor.updateStatus('Redis', 'Disconnected');
  }
}
