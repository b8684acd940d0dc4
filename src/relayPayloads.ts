import type {
  CopyTradeSettings,
  DexType,
  PriceSource,
  PriceUpdate,
  SettingsDeletion,
  SolPriceUpdate,
  TrackedWalletUpdate,
  WalletStateChangeType,
} from './types.js';
import {
  JsonRecord,
  isRecord,
  readBoolean,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
  readStringArray,
} from './utils/jsonGuards.js';

const DEX_TYPES: readonly DexType[] = ['PumpFun', 'Raydium', 'Unknown'];
const PRICE_SOURCES: readonly PriceSource[] = ['Pyth', 'Raydium'];

const WALLET_ACTIONS = new Map<string, WalletStateChangeType>([
  ['add', 'Added'],
  ['archive', 'Archived'],
  ['unarchive', 'Unarchived'],
  ['delete', 'Deleted'],
]);

export function walletChangeTypeForAction(action: string): WalletStateChangeType | null {
  return WALLET_ACTIONS.get(action) ?? null;
}

/**
 * Settings values breaking the business invariants are rejected as a whole.
 */
export function parseCopyTradeSettings(value: unknown): CopyTradeSettings | null {
  if (!isRecord(value)) return null;
  const record: JsonRecord = value;

  const id = readNullableString(record, 'id');
  const userId = readNullableString(record, 'user_id');
  const trackedWalletId = readNullableString(record, 'tracked_wallet_id');
  const isEnabled = readBoolean(record, 'is_enabled');
  const tradeAmountSol = readNumber(record, 'trade_amount_sol');
  const maxSlippage = readNumber(record, 'max_slippage');
  const maxOpenPositions = readNumber(record, 'max_open_positions');
  const allowedTokens = readStringArray(record, 'allowed_tokens');
  const useAllowedTokensList = readBoolean(record, 'use_allowed_tokens_list');
  const allowAdditionalBuys = readBoolean(record, 'allow_additional_buys');
  const matchSellPercentage = readBoolean(record, 'match_sell_percentage');
  const minSolBalance = readNumber(record, 'min_sol_balance');
  const createdAt = readNullableString(record, 'created_at');
  const updatedAt = readNullableString(record, 'updated_at');

  if (
    id === undefined ||
    userId === undefined ||
    trackedWalletId === undefined ||
    isEnabled === undefined ||
    tradeAmountSol === undefined ||
    maxSlippage === undefined ||
    maxOpenPositions === undefined ||
    allowedTokens === undefined ||
    useAllowedTokensList === undefined ||
    allowAdditionalBuys === undefined ||
    matchSellPercentage === undefined ||
    minSolBalance === undefined ||
    createdAt === undefined ||
    updatedAt === undefined
  ) {
    return null;
  }

  if (tradeAmountSol <= 0 || maxSlippage < 0 || maxSlippage > 100 || maxOpenPositions < 0) {
    return null;
  }

  return {
    id,
    user_id: userId,
    tracked_wallet_id: trackedWalletId,
    is_enabled: isEnabled,
    trade_amount_sol: tradeAmountSol,
    max_slippage: maxSlippage,
    max_open_positions: maxOpenPositions,
    allowed_tokens: allowedTokens,
    use_allowed_tokens_list: useAllowedTokensList,
    allow_additional_buys: allowAdditionalBuys,
    match_sell_percentage: matchSellPercentage,
    min_sol_balance: minSolBalance,
    created_at: createdAt,
    updated_at: updatedAt,
  };
}

export function parseSettingsDeletion(value: unknown): SettingsDeletion | null {
  if (!isRecord(value)) return null;
  const settingsId = readString(value, 'settings_id');
  return settingsId ? { settings_id: settingsId } : null;
}

export function parseTrackedWalletUpdate(value: unknown): TrackedWalletUpdate | null {
  if (!isRecord(value)) return null;
  const walletAddress = readString(value, 'wallet_address');
  const action = readString(value, 'action');
  if (!walletAddress || !action) return null;

  const update: TrackedWalletUpdate = { wallet_address: walletAddress, action };
  const isActive = readBoolean(value, 'is_active');
  if (isActive !== undefined) update.is_active = isActive;
  const id = readNullableString(value, 'id');
  if (typeof id === 'string') update.id = id;
  return update;
}

export function parsePriceUpdate(value: unknown): PriceUpdate | null {
  if (!isRecord(value)) return null;

  const tokenAddress = readString(value, 'token_address');
  const priceSol = readNumber(value, 'price_sol');
  const marketCap = readNumber(value, 'market_cap');
  const timestamp = readNumber(value, 'timestamp');
  const dexType = readString(value, 'dex_type');
  const priceUsd = readNullableNumber(value, 'price_usd');
  const liquidity = readNullableNumber(value, 'liquidity');
  const liquidityUsd = readNullableNumber(value, 'liquidity_usd');
  const poolAddress = readNullableString(value, 'pool_address');

  const dex = DEX_TYPES.find(candidate => candidate === dexType);
  if (
    !tokenAddress ||
    priceSol === undefined ||
    marketCap === undefined ||
    timestamp === undefined ||
    !dex ||
    priceUsd === undefined ||
    liquidity === undefined ||
    liquidityUsd === undefined ||
    poolAddress === undefined
  ) {
    return null;
  }

  return {
    token_address: tokenAddress,
    price_sol: priceSol,
    price_usd: priceUsd,
    market_cap: marketCap,
    timestamp,
    dex_type: dex,
    liquidity,
    liquidity_usd: liquidityUsd,
    pool_address: poolAddress,
    volume_24h: readNullableNumber(value, 'volume_24h') ?? null,
    volume_6h: readNullableNumber(value, 'volume_6h') ?? null,
    volume_1h: readNullableNumber(value, 'volume_1h') ?? null,
    volume_5m: readNullableNumber(value, 'volume_5m') ?? null,
  };
}

export function parseSolPriceUpdate(value: unknown): SolPriceUpdate | null {
  if (!isRecord(value)) return null;

  const priceUsd = readNumber(value, 'price_usd');
  const sourceName = readString(value, 'source');
  const timestamp = readNumber(value, 'timestamp');
  const confidence = readNullableNumber(value, 'confidence');
  const source = PRICE_SOURCES.find(candidate => candidate === sourceName);

  if (priceUsd === undefined || !source || timestamp === undefined || confidence === undefined) {
    return null;
  }
  return { price_usd: priceUsd, source, timestamp, confidence };
}
