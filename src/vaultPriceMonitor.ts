import fs from 'fs';
import { decodeTokenAccountBalance } from './accountDecoders.js';
import type { ChainReader } from './chainReader.js';
import { AppError, errorMessage } from './errors.js';
import { EventBus, createEvent } from './eventBus.js';
import {
  calculateLiquiditySol,
  calculatePriceFromRawBalances,
  convertToPriceUpdate,
  validatePriceData,
} from './priceCalculator.js';
import type { PriceStore } from './priceStore.js';
import type { PriceUpdate, VaultPriceUpdate } from './types.js';
import { isRecord, readNumber, readString } from './utils/jsonGuards.js';

/**
 * One AMM pool whose vaults are polled. Base is the token, quote is SOL.
 */
export interface PoolConfig {
  pool_address: string;
  token_address: string;
  base_vault: string;
  quote_vault: string;
  base_decimals: number;
  quote_decimals: number;
}

export function parsePoolConfigs(value: unknown): PoolConfig[] {
  if (!Array.isArray(value)) {
    throw new AppError('ConfigError', 'Pool list must be a JSON array');
  }

  return value.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new AppError('ConfigError', `Pool #${index} is not an object`);
    }
    const poolAddress = readString(entry, 'pool_address');
    const tokenAddress = readString(entry, 'token_address');
    const baseVault = readString(entry, 'base_vault');
    const quoteVault = readString(entry, 'quote_vault');
    if (!poolAddress || !tokenAddress || !baseVault || !quoteVault) {
      throw new AppError('ConfigError', `Pool #${index} is missing an address field`);
    }
    return {
      pool_address: poolAddress,
      token_address: tokenAddress,
      base_vault: baseVault,
      quote_vault: quoteVault,
      base_decimals: readNumber(entry, 'base_decimals') ?? 6,
      quote_decimals: readNumber(entry, 'quote_decimals') ?? 9,
    };
  });
}

export function loadPoolConfigs(filePath: string): PoolConfig[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new AppError('ConfigError', `Cannot read pool list ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  try {
    return parsePoolConfigs(JSON.parse(raw));
  } catch (error) {
    throw AppError.from(error, 'ConfigError');
  }
}

/**
 * Polls pool vault balances, prices them and publishes `price-updated`
 * events. Runs only once a SOL/USD price is known.
 */
export class VaultPriceMonitor {
  private timer: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(
    private readonly reader: ChainReader,
    private readonly bus: EventBus,
    private readonly priceStore: PriceStore,
    private readonly pools: readonly PoolConfig[],
    private readonly intervalMs: number = 10_000
  ) {}

  start(): void {
    if (this.timer) return;
    console.log(`[VaultMonitor] Polling ${this.pools.length} pool(s) every ${this.intervalMs / 1000}s`);
    this.timer = setInterval(() => {
      this.pollOnce().catch(error => {
        console.error(`[VaultMonitor] Poll failed: ${errorMessage(error)}`);
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Price every pool once. Pools that fail to read or validate are skipped.
   */
  async pollOnce(): Promise<PriceUpdate[]> {
    if (this.polling) return [];
    const solPrice = this.priceStore.getSolPrice();
    if (!solPrice) {
      console.warn('[VaultMonitor] No SOL/USD price yet, skipping poll');
      return [];
    }

    this.polling = true;
    const published: PriceUpdate[] = [];
    try {
      for (const pool of this.pools) {
        try {
          const vaultUpdate = await this.readPool(pool);
          const update = await convertToPriceUpdate(vaultUpdate, pool.pool_address, solPrice.price_usd, this.reader);
          this.bus.publish(createEvent('price-updated', update));
          published.push(update);
        } catch (error) {
          console.warn(`[VaultMonitor] ⚠️ Skipping pool ${pool.pool_address}: ${errorMessage(error)}`);
        }
      }
    } finally {
      this.polling = false;
    }
    return published;
  }

  async readPool(pool: PoolConfig): Promise<VaultPriceUpdate> {
    const [baseData, quoteData] = await Promise.all([
      this.reader.getAccountData(pool.base_vault),
      this.reader.getAccountData(pool.quote_vault),
    ]);
    if (!baseData || !quoteData) {
      throw new AppError('RequestError', 'vault account not found');
    }

    const baseBalance = decodeTokenAccountBalance(baseData);
    const quoteBalance = decodeTokenAccountBalance(quoteData);
    const priceSol = calculatePriceFromRawBalances(baseBalance, quoteBalance, pool.base_decimals, pool.quote_decimals);
    validatePriceData(priceSol, baseBalance, quoteBalance);

    return {
      token_address: pool.token_address,
      price_sol: priceSol,
      liquidity_sol: calculateLiquiditySol(quoteBalance, pool.quote_decimals),
      base_balance: baseBalance,
      quote_balance: quoteBalance,
      timestamp: Math.floor(Date.now() / 1000),
    };
  }
}
