import { decodeMintSupply } from './accountDecoders.js';
import type { ChainReader } from './chainReader.js';
import { AppError, errorMessage } from './errors.js';
import type { PriceUpdate, VaultPriceUpdate } from './types.js';

export const MAX_REASONABLE_PRICE_SOL = 1000;

function toUiAmount(raw: bigint | number, decimals: number): number {
  return Number(raw) / 10 ** decimals;
}

/**
 * SOL per token from raw vault balances. An empty base vault prices at 0
 * rather than failing; `validatePriceData` is where zero balances are
 * rejected.
 */
export function calculatePriceFromRawBalances(
  baseBalance: bigint,
  quoteBalance: bigint,
  baseDecimals: number,
  quoteDecimals: number
): number {
  if (baseBalance === 0n) {
    return 0;
  }
  const baseAmount = toUiAmount(baseBalance, baseDecimals);
  const quoteAmount = toUiAmount(quoteBalance, quoteDecimals);
  return quoteAmount / baseAmount;
}

// Pool liquidity is approximated as twice the quote side
export function calculateLiquiditySol(quoteBalance: bigint, quoteDecimals: number): number {
  return toUiAmount(quoteBalance, quoteDecimals) * 2;
}

/**
 * Fractional price move a buy of `tradeAmountSol` would cause on a
 * constant-product pool. Approximate: ignores fees.
 */
export function calculatePriceImpact(
  baseBalance: bigint,
  quoteBalance: bigint,
  tradeAmountSol: number,
  baseDecimals: number,
  quoteDecimals: number
): number {
  const currentPrice = calculatePriceFromRawBalances(baseBalance, quoteBalance, baseDecimals, quoteDecimals);
  if (currentPrice === 0) {
    return 0;
  }

  const baseAmount = toUiAmount(baseBalance, baseDecimals);
  const quoteAmount = toUiAmount(quoteBalance, quoteDecimals);
  const newQuoteAmount = quoteAmount + tradeAmountSol;
  const newBaseAmount = (baseAmount * quoteAmount) / newQuoteAmount;
  const newPrice = newQuoteAmount / newBaseAmount;

  return Math.abs((newPrice - currentPrice) / currentPrice);
}

/**
 * USD market cap from the mint's supply. Returns 0 when the mint cannot be
 * fetched or parsed.
 */
export async function calculateMarketCap(
  priceSol: number,
  solPriceUsd: number,
  tokenAddress: string,
  reader: ChainReader
): Promise<number> {
  let data: Buffer | null;
  try {
    data = await reader.getAccountData(tokenAddress);
  } catch (error) {
    console.warn(`[Prices] Failed to fetch mint account for ${tokenAddress}: ${errorMessage(error)}`);
    return 0;
  }
  if (!data) {
    console.warn(`[Prices] Mint account ${tokenAddress} not found`);
    return 0;
  }

  try {
    const mint = decodeMintSupply(data);
    const totalSupply = toUiAmount(mint.supply, mint.decimals);
    return totalSupply * priceSol * solPriceUsd;
  } catch (error) {
    console.warn(`[Prices] Failed to parse mint account for ${tokenAddress}: ${errorMessage(error)}`);
    return 0;
  }
}

export function validatePriceData(priceSol: number, baseBalance: bigint, quoteBalance: bigint): void {
  if (priceSol < 0) {
    throw new AppError('InvalidPrice', 'Negative price');
  }
  if (priceSol > MAX_REASONABLE_PRICE_SOL) {
    throw new AppError('InvalidPrice', 'Unreasonably high price');
  }
  if (baseBalance === 0n || quoteBalance === 0n) {
    throw new AppError('InvalidPrice', 'Zero balance detected');
  }
}

/**
 * Liquidity-weighted average price. null for no updates or no liquidity.
 */
export function calculateVwap(updates: readonly VaultPriceUpdate[]): number | null {
  if (updates.length === 0) {
    return null;
  }
  const totalLiquidity = updates.reduce((sum, update) => sum + update.liquidity_sol, 0);
  if (totalLiquidity === 0) {
    return null;
  }
  const weighted = updates.reduce((sum, update) => sum + update.price_sol * update.liquidity_sol, 0);
  return weighted / totalLiquidity;
}

// Percent change; 0 when there is no previous price
export function calculatePriceChange(oldPrice: number, newPrice: number): number {
  if (oldPrice === 0) {
    return 0;
  }
  return ((newPrice - oldPrice) / oldPrice) * 100;
}

/**
 * Rough trade size (SOL) that stays within `maxSlippagePercent`. Half the
 * slippage fraction of the quote side.
 */
export function getOptimalTradeSize(quoteBalance: bigint, maxSlippagePercent: number, quoteDecimals: number): number {
  return toUiAmount(quoteBalance, quoteDecimals) * (maxSlippagePercent / 100) * 0.5;
}

export async function convertToPriceUpdate(
  vaultUpdate: VaultPriceUpdate,
  poolAddress: string,
  solPriceUsd: number,
  reader: ChainReader
): Promise<PriceUpdate> {
  const marketCap = await calculateMarketCap(vaultUpdate.price_sol, solPriceUsd, vaultUpdate.token_address, reader);

  return {
    token_address: vaultUpdate.token_address,
    price_sol: vaultUpdate.price_sol,
    price_usd: vaultUpdate.price_sol * solPriceUsd,
    market_cap: marketCap,
    timestamp: vaultUpdate.timestamp,
    dex_type: 'Raydium',
    liquidity: vaultUpdate.liquidity_sol,
    liquidity_usd: vaultUpdate.liquidity_sol * solPriceUsd,
    pool_address: poolAddress,
    volume_24h: null,
    volume_6h: null,
    volume_1h: null,
    volume_5m: null,
  };
}
