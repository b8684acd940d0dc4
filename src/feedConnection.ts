import WebSocket from 'ws';
import { AppError, errorMessage } from './errors.js';
import { buildLogsSubscribeRequest } from './feedMessages.js';
import type { ConnectionMonitor } from './connectionMonitor.js';
import type { ConnectionStatus } from './types.js';
import { AsyncQueue } from './utils/asyncQueue.js';
import { delay } from './utils/stopSignal.js';

export type ConnectionState = 'Disconnected' | 'Connecting' | 'Connected' | 'Subscribed' | 'Closing';

export interface FeedConnectionConfig {
  healthCheckIntervalMs: number;
  connectionTimeoutMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  maxRetries: number;
}

export const DEFAULT_FEED_CONNECTION_CONFIG: FeedConnectionConfig = {
  healthCheckIntervalMs: 30_000,
  connectionTimeoutMs: 5_000,
  initialBackoffMs: 1_000,
  maxBackoffMs: 60_000,
  maxRetries: 3,
};

export type FeedFrame =
  | { kind: 'text'; data: string }
  | { kind: 'binary'; data: Buffer }
  | { kind: 'close'; code: number; reason: string }
  | { kind: 'idle' };

type InboundItem = Exclude<FeedFrame, { kind: 'idle' }> | { kind: 'error'; error: AppError };

/**
 * Socket surface the manager drives. `ws` satisfies it; tests pass a fake.
 */
export interface FeedSocket {
  readonly readyState: number;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(): void;
  terminate(): void;
  removeAllListeners(): unknown;
}

export type SocketFactory = (url: string) => FeedSocket;

/**
 * The manager's contract as the wallet monitor uses it
 */
export interface FeedConnection {
  readonly state: ConnectionState;
  ensureConnection(): Promise<void>;
  subscribe(addresses: readonly string[]): Promise<void>;
  receiveMessage(waitMs: number): Promise<FeedFrame>;
  confirmSubscription(requestId: number, subscriptionId: number): void;
  addressForSubscription(subscriptionId: number): string | undefined;
  reset(): void;
  shutdown(): Promise<void>;
}

export interface FeedConnectionOptions {
  socketFactory?: SocketFactory;
  sleep?: (ms: number) => Promise<void>;
  connectionMonitor?: ConnectionMonitor;
}

/**
 * Delay before retry `attempt` (0-based): initial * 2^attempt, capped
 */
export function computeBackoff(
  attempt: number,
  initialBackoffMs: number = DEFAULT_FEED_CONNECTION_CONFIG.initialBackoffMs,
  maxBackoffMs: number = DEFAULT_FEED_CONNECTION_CONFIG.maxBackoffMs
): number {
  return Math.min(initialBackoffMs * 2 ** attempt, maxBackoffMs);
}

const WS_OPEN = 1;

function rawDataToBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * One resilient WebSocket connection to the Solana RPC feed.
 *
 * Frames are buffered in arrival order and drained by `receiveMessage`.
 * Transport failures surface as a rejected receive so the caller's loop can
 * fall back to `ensureConnection`.
 */
export class FeedConnectionManager implements FeedConnection {
  private socket: FeedSocket | null = null;
  private inbound = new AsyncQueue<InboundItem>();
  private currentState: ConnectionState = 'Disconnected';
  private healthTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;
  private backoffAttempt = 0;
  private nextRequestId = 1;
  private pendingRequests = new Map<number, string>();
  private subscriptions = new Map<number, string>();
  private handshake: { resolve: () => void; reject: (error: AppError) => void } | null = null;

  private readonly config: FeedConnectionConfig;
  private readonly socketFactory: SocketFactory;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly connectionMonitor: ConnectionMonitor | undefined;

  constructor(
    private readonly url: string,
    config: Partial<FeedConnectionConfig> = {},
    options: FeedConnectionOptions = {}
  ) {
    this.config = { ...DEFAULT_FEED_CONNECTION_CONFIG, ...config };
    this.socketFactory = options.socketFactory ?? ((target: string) => new WebSocket(target));
    this.sleep = options.sleep ?? delay;
    this.connectionMonitor = options.connectionMonitor;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  async ensureConnection(): Promise<void> {
    if (this.currentState === 'Connected' || this.currentState === 'Subscribed') {
      return;
    }
    if (this.currentState === 'Closing') {
      throw new AppError('WebSocketStateError', 'Connection manager has been shut down');
    }

    this.setState('Connecting');
    console.log(`[Feed] Connecting to ${this.url}...`);

    this.inbound = new AsyncQueue<InboundItem>();
    const socket = this.socketFactory(this.url);
    this.socket = socket;
    this.attach(socket);

    try {
      await this.awaitHandshake(socket);
    } catch (error) {
      this.teardownSocket();
      this.setState('Disconnected', errorMessage(error));
      throw error;
    }

    this.backoffAttempt = 0;
    this.setState('Connected');
    console.log('[Feed] ✅ Connected');
    this.startHealthCheck();
  }

  /**
   * Send one logsSubscribe per address, retrying the batch with backoff up
   * to `maxRetries` attempts.
   */
  async subscribe(addresses: readonly string[]): Promise<void> {
    let attempt = 0;
    for (;;) {
      try {
        await this.sendSubscriptions(addresses);
        this.backoffAttempt = 0;
        this.setState('Subscribed');
        console.log(`[Feed] 📡 Subscribed to ${addresses.length} wallet(s)`);
        return;
      } catch (error) {
        attempt++;
        if (attempt >= this.config.maxRetries) {
          throw new AppError(
            'WebSocketSendError',
            `Subscription failed after ${attempt} attempts: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        const backoff = computeBackoff(this.backoffAttempt, this.config.initialBackoffMs, this.config.maxBackoffMs);
        this.backoffAttempt++;
        console.warn(`[Feed] Subscribe attempt ${attempt} failed (${errorMessage(error)}), retrying in ${backoff}ms`);
        await this.sleep(backoff);
      }
    }
  }

  async receiveMessage(waitMs: number): Promise<FeedFrame> {
    const item = this.inbound.tryNext() ?? (this.socket ? await this.inbound.next(waitMs) : undefined);

    if (!item) {
      if (!this.socket) {
        return { kind: 'close', code: 1006, reason: 'not connected' };
      }
      return { kind: 'idle' };
    }
    if (item.kind === 'error') {
      this.reset();
      throw item.error;
    }
    return item;
  }

  confirmSubscription(requestId: number, subscriptionId: number): void {
    const address = this.pendingRequests.get(requestId);
    if (address === undefined) return;
    this.pendingRequests.delete(requestId);
    this.subscriptions.set(subscriptionId, address);
  }

  addressForSubscription(subscriptionId: number): string | undefined {
    return this.subscriptions.get(subscriptionId);
  }

  /**
   * Drop the current socket so the next `ensureConnection` starts fresh.
   * Buffered frames from the old socket are discarded.
   */
  reset(): void {
    this.teardownSocket();
    this.inbound = new AsyncQueue<InboundItem>();
    if (this.currentState !== 'Closing' && this.currentState !== 'Disconnected') {
      this.setState('Disconnected');
    }
  }

  async shutdown(): Promise<void> {
    this.setState('Closing');
    try {
      this.teardownSocket();
    } catch (error) {
      console.warn(`[Feed] Error while closing socket: ${errorMessage(error)}`);
    }
    this.inbound.close();
  }

  private attach(socket: FeedSocket): void {
    socket.on('open', () => {
      this.handshake?.resolve();
    });

    socket.on('message', (data, isBinary) => {
      if (socket !== this.socket) return;
      if (isBinary) {
        this.inbound.push({ kind: 'binary', data: rawDataToBuffer(data) });
      } else {
        this.inbound.push({ kind: 'text', data: rawDataToBuffer(data).toString('utf8') });
      }
    });

    socket.on('close', (code, reason) => {
      if (socket !== this.socket) return;
      const text = reason.toString();
      if (this.handshake) {
        this.handshake.reject(new AppError('WebSocketConnectionError', `Closed during handshake (code ${code})`));
        return;
      }
      console.log(`[Feed] ⚠️ Connection closed (code: ${code}, reason: ${text})`);
      this.stopHealthCheck();
      this.socket = null;
      this.inbound.push({ kind: 'close', code, reason: text });
      if (this.currentState !== 'Closing') {
        this.setState('Disconnected', `code ${code}`);
      }
    });

    socket.on('error', error => {
      if (socket !== this.socket) return;
      console.error(`[Feed] ❌ Connection error: ${error.message}`);
      if (this.handshake) {
        this.handshake.reject(new AppError('WebSocketConnectionError', error.message, { cause: error }));
        return;
      }
      this.inbound.push({ kind: 'error', error: new AppError('WebSocketReceiveError', error.message, { cause: error }) });
    });

    socket.on('pong', () => {
      this.awaitingPong = false;
    });
  }

  private awaitHandshake(socket: FeedSocket): Promise<void> {
    if (socket.readyState === WS_OPEN) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.handshake = null;
        reject(new AppError('WebSocketTimeout', `Handshake timed out after ${this.config.connectionTimeoutMs}ms`));
      }, this.config.connectionTimeoutMs);

      this.handshake = {
        resolve: () => {
          clearTimeout(timer);
          this.handshake = null;
          resolve();
        },
        reject: (error: AppError) => {
          clearTimeout(timer);
          this.handshake = null;
          reject(error);
        },
      };
    });
  }

  private async sendSubscriptions(addresses: readonly string[]): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WS_OPEN) {
      throw new AppError('WebSocketStateError', 'Socket is not open');
    }

    this.pendingRequests.clear();
    this.subscriptions.clear();

    for (const address of addresses) {
      const id = this.nextRequestId++;
      this.pendingRequests.set(id, address);
      await new Promise<void>((resolve, reject) => {
        socket.send(buildLogsSubscribeRequest(id, address), err => {
          if (err) {
            reject(new AppError('WebSocketSendError', err.message, { cause: err }));
          } else {
            resolve();
          }
        });
      });
    }
  }

  private startHealthCheck(): void {
    this.stopHealthCheck();
    this.awaitingPong = false;
    this.healthTimer = setInterval(() => this.checkHealth(), this.config.healthCheckIntervalMs);
  }

  private checkHealth(): void {
    const socket = this.socket;
    if (!socket) return;

    if (this.awaitingPong) {
      console.error('[Feed] ❌ Health check failed: no pong since last ping');
      this.stopHealthCheck();
      this.inbound.push({
        kind: 'error',
        error: new AppError('WebSocketReceiveError', 'Health check failed: connection is unresponsive'),
      });
      socket.terminate();
      return;
    }

    this.awaitingPong = true;
    try {
      socket.ping();
    } catch (error) {
      console.warn(`[Feed] Ping failed: ${errorMessage(error)}`);
    }
  }

  private stopHealthCheck(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  private teardownSocket(): void {
    this.stopHealthCheck();
    const socket = this.socket;
    this.socket = null;
    this.pendingRequests.clear();
    this.subscriptions.clear();
    if (!socket) return;

    socket.removeAllListeners();
    // ws emits 'error' on terminate of a connecting socket; keep one sink
    socket.on('error', () => undefined);
    if (socket.readyState === WS_OPEN) {
      socket.close();
    } else {
      socket.terminate();
    }
  }

  private setState(state: ConnectionState, details?: string): void {
    if (this.currentState === state) return;
    this.currentState = state;
    if (!this.connectionMonitor) return;

    const statusByState: Record<ConnectionState, ConnectionStatus> = {
      Disconnected: 'Disconnected',
      Connecting: 'Connecting',
      Connected: 'Connected',
      Subscribed: 'Connected',
      Closing: 'Disconnected',
    };
    this.connectionMonitor.updateStatus('WebSocket', statusByState[state], details ?? null);
  }
}
