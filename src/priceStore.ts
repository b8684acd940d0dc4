import type { EventBus } from './eventBus.js';
import type { PriceUpdate, SolPriceUpdate } from './types.js';

/**
 * Latest price per token and the latest SOL/USD quote, as seen on the bus
 * (local and relayed alike).
 */
export class PriceStore {
  private prices = new Map<string, PriceUpdate>();
  private solPrice: SolPriceUpdate | null = null;

  attach(bus: EventBus): () => void {
    const offPrice = bus.on('price-updated', event => this.recordPrice(event.notification.data));
    const offSol = bus.on('sol-price-updated', event => this.recordSolPrice(event.notification.data));
    return () => {
      offPrice();
      offSol();
    };
  }

  // Older updates never replace newer ones
  recordPrice(update: PriceUpdate): void {
    const current = this.prices.get(update.token_address);
    if (current && current.timestamp > update.timestamp) return;
    this.prices.set(update.token_address, update);
  }

  recordSolPrice(update: SolPriceUpdate): void {
    if (this.solPrice && this.solPrice.timestamp > update.timestamp) return;
    this.solPrice = update;
  }

  getPrice(tokenAddress: string): PriceUpdate | null {
    return this.prices.get(tokenAddress) ?? null;
  }

  getAllPrices(): PriceUpdate[] {
    return Array.from(this.prices.values());
  }

  getSolPrice(): SolPriceUpdate | null {
    return this.solPrice;
  }
}
