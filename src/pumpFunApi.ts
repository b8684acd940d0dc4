import axios, { AxiosInstance } from 'axios';
import { errorMessage } from './errors.js';
import { JsonRecord, isRecord, readNumber, readString } from './utils/jsonGuards.js';

/**
 * Coin record from the pump.fun frontend API. Reserve figures are raw
 * integer amounts (lamports / token base units).
 */
export interface PumpFunCoinData {
  mint: string;
  name: string;
  symbol: string;
  image_uri: string;
  bonding_curve: string;
  virtual_sol_reserves: number;
  virtual_token_reserves: number;
  total_supply: number;
  market_cap: number;
  usd_market_cap: number;
  complete: boolean;
}

export interface CoinDataSource {
  getCoinData(mint: string): Promise<PumpFunCoinData | null>;
}

const DEFAULT_CACHE_TTL_MS = 60_000;
const DEFAULT_MAX_CACHE_ENTRIES = 500;

export interface PumpFunApiOptions {
  cacheTtlMs?: number;
  maxCacheEntries?: number;
}

export function parseCoinData(value: unknown): PumpFunCoinData | null {
  if (!isRecord(value)) return null;
  const record: JsonRecord = value;

  const mint = readString(record, 'mint');
  const bondingCurve = readString(record, 'bonding_curve');
  if (!mint || !bondingCurve) return null;

  return {
    mint,
    name: readString(record, 'name') ?? 'Unknown',
    symbol: readString(record, 'symbol') ?? 'UNKNOWN',
    image_uri: readString(record, 'image_uri') ?? '',
    bonding_curve: bondingCurve,
    virtual_sol_reserves: readNumber(record, 'virtual_sol_reserves') ?? 0,
    virtual_token_reserves: readNumber(record, 'virtual_token_reserves') ?? 0,
    total_supply: readNumber(record, 'total_supply') ?? 0,
    market_cap: readNumber(record, 'market_cap') ?? 0,
    usd_market_cap: readNumber(record, 'usd_market_cap') ?? 0,
    complete: record['complete'] === true,
  };
}

/**
 * pump.fun coin metadata client. Lookups are best-effort: failures are
 * logged and read as "no data".
 */
export class PumpFunApi implements CoinDataSource {
  private client: AxiosInstance;
  private cache = new Map<string, { data: PumpFunCoinData; fetchedAt: number }>();
  private readonly cacheTtlMs: number;
  private readonly maxCacheEntries: number;

  constructor(baseUrl: string, options: PumpFunApiOptions = {}) {
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxCacheEntries = options.maxCacheEntries ?? DEFAULT_MAX_CACHE_ENTRIES;
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: 10000,
      headers: {
        Accept: 'application/json',
      },
    });
  }

  async getCoinData(mint: string): Promise<PumpFunCoinData | null> {
    const cached = this.cache.get(mint);
    if (cached && Date.now() - cached.fetchedAt < this.cacheTtlMs) {
      return cached.data;
    }

    try {
      const response = await this.client.get<unknown>(`/coins/${mint}`);
      const data = parseCoinData(response.data);
      if (!data) {
        console.warn(`[PumpFun] Unexpected coin payload for ${mint.substring(0, 8)}...`);
        return null;
      }
      this.remember(mint, data);
      return data;
    } catch (error) {
      console.warn(`[PumpFun] Coin lookup failed for ${mint.substring(0, 8)}...: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Cache a lookup. Expired entries go first, then the oldest ones while
   * the cache is over its size limit.
   */
  private remember(mint: string, data: PumpFunCoinData): void {
    const now = Date.now();
    for (const [key, entry] of this.cache) {
      if (now - entry.fetchedAt >= this.cacheTtlMs) {
        this.cache.delete(key);
      }
    }

    this.cache.delete(mint);
    this.cache.set(mint, { data, fetchedAt: now });
    for (const key of this.cache.keys()) {
      if (this.cache.size <= this.maxCacheEntries) break;
      this.cache.delete(key);
    }
  }
}
