import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'http';
import axios, { type AxiosInstance } from 'axios';
import { ConnectionMonitor } from '../src/connectionMonitor.js';
import { EventBus } from '../src/eventBus.js';
import { PriceStore } from '../src/priceStore.js';
import { createServer, startServer } from '../src/server.js';
import type { WalletMonitorStatus } from '../src/walletMonitor.js';
import type { PriceUpdate } from '../src/types.js';

const STATUS: WalletMonitorStatus = {
  running: true,
  userId: 'ServerWallet',
  trackedWallets: 2,
  activeWallets: 1,
  settings: 1,
  feedState: 'Subscribed',
  pipeline: { processed: 3, failed: 1, pending: 0 },
};

const PRICE: PriceUpdate = {
  token_address: 'MintA',
  price_sol: 0.5,
  price_usd: 50,
  market_cap: 50_000,
  timestamp: 100,
  dex_type: 'Raydium',
  liquidity: 4,
  liquidity_usd: 400,
  pool_address: 'PoolA',
  volume_24h: null,
  volume_6h: null,
  volume_1h: null,
  volume_5m: null,
};

describe('status API', () => {
  let server: Server;
  let client: AxiosInstance;

  before(async () => {
    const bus = new EventBus();
    const connectionMonitor = new ConnectionMonitor(bus);
    connectionMonitor.updateStatus('WebSocket', 'Connected');
    const priceStore = new PriceStore();
    priceStore.recordPrice(PRICE);

    const app = createServer({
      monitor: { getStatus: () => STATUS },
      priceStore,
      connectionMonitor,
      relay: { isHealthy: async () => true },
    });
    server = await startServer(app, 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  it('answers the health check', async () => {
    const response = await client.get('/health');
    assert.equal(response.status, 200);
    assert.equal(response.data.status, 'ok');
  });

  it('reports monitor, relay and connection status', async () => {
    const response = await client.get('/api/status');

    assert.equal(response.status, 200);
    assert.deepEqual(response.data.monitor, STATUS);
    assert.equal(response.data.relayHealthy, true);
    assert.equal(response.data.solPrice, null);
    assert.deepEqual(
      response.data.connections.map((change: { connection_type: string; status: string }) => [change.connection_type, change.status]),
      [['WebSocket', 'Connected']]
    );
  });

  it('lists known prices', async () => {
    const response = await client.get('/api/prices');

    assert.equal(response.status, 200);
    assert.equal(response.data.count, 1);
    assert.deepEqual(response.data.prices, [PRICE]);
  });

  it('returns one token price or 404', async () => {
    const found = await client.get('/api/prices/MintA');
    assert.equal(found.status, 200);
    assert.deepEqual(found.data.price, PRICE);

    const missing = await client.get('/api/prices/MintZ');
    assert.equal(missing.status, 404);
    assert.equal(missing.data.error, 'No price for token MintZ');
  });

  it('returns JSON for unknown API routes', async () => {
    const response = await client.get('/api/nothing-here');

    assert.equal(response.status, 404);
    assert.equal(response.data.success, false);
    assert.equal(response.data.error, 'Route not found: GET /api/nothing-here');
  });
});
