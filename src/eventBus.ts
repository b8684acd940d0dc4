import { EventEmitter } from 'events';
import { AsyncQueue } from './utils/asyncQueue.js';
import { errorMessage } from './errors.js';
import type {
  ConnectionStatusChange,
  CopyTradeSettings,
  Notification,
  ObservedTrade,
  PriceUpdate,
  SettingsDeletion,
  SolPriceUpdate,
  TransactionLog,
  WalletStateChange,
} from './types.js';

export const DEFAULT_RECEIVER_CAPACITY = 1024;

/**
 * Payload carried by each event kind
 */
export interface EventPayloads {
  'settings-updated': CopyTradeSettings;
  'settings-deleted': SettingsDeletion;
  'wallet-state-changed': WalletStateChange;
  'transaction-logged': TransactionLog;
  'copy-trade-executed': ObservedTrade;
  'tracked-wallet-trade': ObservedTrade;
  'price-updated': PriceUpdate;
  'sol-price-updated': SolPriceUpdate;
  'connection-status-changed': ConnectionStatusChange;
}

export type EventKind = keyof EventPayloads;

// Where the event entered this process. Relay-originated events are never
// published back to Redis.
export type EventOrigin = 'local' | 'relay';

export const NOTIFICATION_TYPES: Record<EventKind, string> = {
  'settings-updated': 'settings_updated',
  'settings-deleted': 'settings_deleted',
  'wallet-state-changed': 'wallet_state_change',
  'transaction-logged': 'transaction_logged',
  'copy-trade-executed': 'copy_trade_executed',
  'tracked-wallet-trade': 'tracked_wallet_trade',
  'price-updated': 'price_update',
  'sol-price-updated': 'sol_price_update',
  'connection-status-changed': 'connection_status',
};

export type EventOf<K extends EventKind> = {
  kind: K;
  origin: EventOrigin;
  notification: Notification<EventPayloads[K]>;
};

export type BusEvent = { [K in EventKind]: EventOf<K> }[EventKind];

export function createEvent<K extends EventKind>(
  kind: K,
  data: EventPayloads[K],
  origin: EventOrigin = 'local'
): EventOf<K> {
  return {
    kind,
    origin,
    notification: { type: NOTIFICATION_TYPES[kind], data },
  };
}

/**
 * Independent view of the bus with its own bounded buffer. A slow reader
 * loses its oldest events, never blocks the publisher.
 */
export class EventReceiver {
  private readonly queue: AsyncQueue<BusEvent>;

  constructor(capacity: number, private readonly onClose: (receiver: EventReceiver) => void) {
    this.queue = new AsyncQueue<BusEvent>(capacity);
  }

  get lagged(): number {
    return this.queue.dropped;
  }

  get pending(): number {
    return this.queue.size;
  }

  deliver(event: BusEvent): void {
    this.queue.push(event);
  }

  recv(waitMs: number, signal?: AbortSignal): Promise<BusEvent | undefined> {
    return this.queue.next(waitMs, signal);
  }

  tryRecv(): BusEvent | undefined {
    return this.queue.tryNext();
  }

  close(): void {
    this.queue.close();
    this.onClose(this);
  }
}

/**
 * Process-wide broadcast channel
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly receivers = new Set<EventReceiver>();

  constructor(private readonly defaultCapacity: number = DEFAULT_RECEIVER_CAPACITY) {
    this.emitter.setMaxListeners(0);
  }

  get receiverCount(): number {
    return this.receivers.size;
  }

  /**
   * Fire-and-forget. Returns the number of receivers the event reached.
   */
  publish(event: BusEvent): number {
    for (const receiver of this.receivers) {
      receiver.deliver(event);
    }
    this.emitter.emit(event.kind, event);
    return this.receivers.size;
  }

  subscribe(capacity: number = this.defaultCapacity): EventReceiver {
    const receiver = new EventReceiver(capacity, closed => this.receivers.delete(closed));
    this.receivers.add(receiver);
    return receiver;
  }

  /**
   * Register a synchronous handler for one event kind. A throwing handler
   * is logged and does not affect the publisher or other handlers.
   */
  on<K extends EventKind>(kind: K, handler: (event: EventOf<K>) => void): () => void {
    const listener = (event: EventOf<K>): void => {
      try {
        handler(event);
      } catch (error) {
        console.error(`[EventBus] Handler for ${kind} failed: ${errorMessage(error)}`);
      }
    };
    this.emitter.on(kind, listener);
    return () => {
      this.emitter.off(kind, listener);
    };
  }
}
