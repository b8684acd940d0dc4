import { Router, Request, Response } from 'express';
import type { ConnectionMonitor } from '../connectionMonitor.js';
import { errorMessage } from '../errors.js';
import type { PriceStore } from '../priceStore.js';
import type { WalletMonitorStatus } from '../walletMonitor.js';

/**
 * What the status API reads from. Each piece is owned elsewhere; the routes
 * only look.
 */
export interface StatusSources {
  monitor: { getStatus(): WalletMonitorStatus };
  priceStore: PriceStore;
  connectionMonitor: ConnectionMonitor;
  relay?: { isHealthy(): Promise<boolean> };
}

/**
 * Read-only status routes
 */
export function createRoutes(sources: StatusSources): Router {
  const router = Router();

  // ============================================================================
  // MONITOR STATUS
  // ============================================================================

  router.get('/status', async (req: Request, res: Response) => {
    try {
      const relayHealthy = sources.relay ? await sources.relay.isHealthy() : null;
      res.json({
        success: true,
        monitor: sources.monitor.getStatus(),
        relayHealthy,
        connections: sources.connectionMonitor.getAll(),
        solPrice: sources.priceStore.getSolPrice(),
      });
    } catch (error) {
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  // ============================================================================
  // PRICES
  // ============================================================================

  router.get('/prices', (req: Request, res: Response) => {
    const prices = sources.priceStore.getAllPrices();
    res.json({ success: true, count: prices.length, prices });
  });

  router.get('/prices/:tokenAddress', (req: Request, res: Response) => {
    const price = sources.priceStore.getPrice(req.params.tokenAddress);
    if (!price) {
      return res.status(404).json({ success: false, error: `No price for token ${req.params.tokenAddress}` });
    }
    res.json({ success: true, price });
  });

  return router;
}
