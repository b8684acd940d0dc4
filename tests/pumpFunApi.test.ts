import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'http';
import express, { Request, Response } from 'express';
import { PumpFunApi } from '../src/pumpFunApi.js';
import { startServer } from '../src/server.js';

describe('PumpFunApi', () => {
  let server: Server;
  let baseUrl: string;
  const requests: string[] = [];

  before(async () => {
    const app = express();
    app.get('/coins/:mint', (req: Request, res: Response) => {
      const mint = req.params.mint;
      requests.push(mint);
      if (mint === 'Missing') {
        return res.status(404).json({ error: 'not found' });
      }
      if (mint === 'Broken') {
        return res.json({ name: 'No mint field' });
      }
      res.json({
        mint,
        name: `Coin ${mint}`,
        symbol: 'COIN',
        bonding_curve: `Curve${mint}`,
        total_supply: 1_000_000_000_000_000,
        market_cap: 30,
        complete: false,
      });
    });
    server = await startServer(app, 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    requests.length = 0;
  });

  it('parses coin data and serves repeat lookups from the cache', async () => {
    const api = new PumpFunApi(baseUrl);

    const first = await api.getCoinData('MintA');
    const second = await api.getCoinData('MintA');

    assert.equal(first?.bonding_curve, 'CurveMintA');
    assert.equal(first?.name, 'Coin MintA');
    assert.equal(first?.virtual_sol_reserves, 0);
    assert.deepEqual(second, first);
    assert.deepEqual(requests, ['MintA']);
  });

  it('evicts the oldest lookups beyond the size limit', async () => {
    const api = new PumpFunApi(baseUrl, { maxCacheEntries: 2 });

    for (const mint of ['MintA', 'MintB', 'MintC', 'MintA', 'MintC']) {
      await api.getCoinData(mint);
    }

    assert.deepEqual(requests, ['MintA', 'MintB', 'MintC', 'MintA']);
  });

  it('fetches again once an entry has expired', async () => {
    const api = new PumpFunApi(baseUrl, { cacheTtlMs: 0 });

    await api.getCoinData('MintA');
    await api.getCoinData('MintA');

    assert.deepEqual(requests, ['MintA', 'MintA']);
  });

  it('reads unexpected payloads and failed requests as no data', async () => {
    const api = new PumpFunApi(baseUrl);

    assert.equal(await api.getCoinData('Broken'), null);
    assert.equal(await api.getCoinData('Missing'), null);
    assert.deepEqual(requests, ['Broken', 'Missing']);
  });
});
