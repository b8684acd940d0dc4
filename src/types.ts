/**
 * Wire and domain types. Field names follow the snake_case JSON contract
 * shared with the sibling services on the relay.
 */

export type TransactionType = 'Buy' | 'Sell' | 'Transfer' | 'Unknown';

export type DexType = 'PumpFun' | 'Raydium' | 'Unknown';

export type PriceSource = 'Pyth' | 'Raydium';

export type ConnectionType = 'WebSocket' | 'Grpc' | 'Redis' | 'Database';

export type ConnectionStatus = 'Connected' | 'Disconnected' | 'Error' | 'Reconnecting' | 'Connecting';

export type WalletStateChangeType = 'Added' | 'Archived' | 'Unarchived' | 'Updated' | 'Deleted';

/**
 * Wallet being watched for trades
 */
export interface TrackedWallet {
  id: string | null;
  user_id: string | null;
  wallet_address: string;
  is_active: boolean;
  created_at: string | null;
  updated_at: string | null;
}

/**
 * Per-user copy-trade rules
 */
export interface CopyTradeSettings {
  id: string | null;
  user_id: string | null;
  tracked_wallet_id: string | null;
  is_enabled: boolean;
  trade_amount_sol: number;
  max_slippage: number; // Percent, 0-100
  max_open_positions: number;
  allowed_tokens: string[] | null;
  use_allowed_tokens_list: boolean;
  allow_additional_buys: boolean;
  match_sell_percentage: boolean;
  min_sol_balance: number;
  created_at: string | null;
  updated_at: string | null;
}

export const DEFAULT_COPY_TRADE_SETTINGS: Readonly<CopyTradeSettings> = Object.freeze({
  id: null,
  user_id: null,
  tracked_wallet_id: null,
  is_enabled: false,
  trade_amount_sol: 0.01,
  max_slippage: 0.1,
  max_open_positions: 1,
  allowed_tokens: null,
  use_allowed_tokens_list: false,
  allow_additional_buys: false,
  match_sell_percentage: false,
  min_sol_balance: 0.01,
  created_at: null,
  updated_at: null,
});

/**
 * A trade made by a tracked wallet, as resolved from the feed.
 * Frozen once built.
 */
export interface ClientTxInfo {
  signature: string;
  token_address: string;
  token_name: string;
  token_symbol: string;
  transaction_type: TransactionType;
  amount_token: number;
  amount_sol: number;
  price_per_token: number;
  token_image_uri: string;
  market_cap: number;
  usd_market_cap: number;
  timestamp: number; // Unix seconds
  seller: string;
  buyer: string;
  dex_type: DexType;
  /** SOL per whole token implied by `market_cap` and the coin's supply */
  market_price_sol: number | null;
  /** Share (0-1] of its position the tracked wallet sold; null unless a Sell */
  position_fraction_sold: number | null;
}

export type ObservedTrade = Readonly<ClientTxInfo>;

export interface TransactionLog {
  id: string;
  user_id: string;
  tracked_wallet_id: string | null;
  signature: string;
  transaction_type: TransactionType;
  token_address: string;
  amount: number;
  price_sol: number;
  timestamp: string; // ISO-8601
}

export interface PriceUpdate {
  token_address: string;
  price_sol: number;
  price_usd: number | null;
  market_cap: number;
  timestamp: number;
  dex_type: DexType;
  liquidity: number | null;
  liquidity_usd: number | null;
  pool_address: string | null;
  volume_24h: number | null;
  volume_6h: number | null;
  volume_1h: number | null;
  volume_5m: number | null;
}

/**
 * Price derived from a pool's vault balances before USD conversion
 */
export interface VaultPriceUpdate {
  token_address: string;
  price_sol: number;
  liquidity_sol: number;
  base_balance: bigint;
  quote_balance: bigint;
  timestamp: number;
}

export interface SolPriceUpdate {
  price_usd: number;
  source: PriceSource;
  timestamp: number;
  confidence: number | null;
}

export interface WalletStateChange {
  wallet_address: string;
  change_type: WalletStateChangeType;
  timestamp: number;
  details: TrackedWalletUpdate | null;
}

export interface ConnectionStatusChange {
  connection_type: ConnectionType;
  status: ConnectionStatus;
  timestamp: number;
  details: string | null;
}

export type TrackedWalletAction = 'add' | 'archive' | 'unarchive' | 'delete';

/**
 * Payload on the tracked_wallets relay channel. The address-only form
 * omits is_active and id.
 */
export interface TrackedWalletUpdate {
  wallet_address: string;
  action: string;
  is_active?: boolean;
  id?: string | null;
}

export interface SettingsDeletion {
  settings_id: string;
}

export interface Notification<T> {
  type: string;
  data: T;
}

// ============================================================================
// WALLET SERVICE
// ============================================================================

export interface TokenInfo {
  address: string;
  symbol: string;
  name: string;
  balance: string; // UI amount as a decimal string
  metadata_uri: string | null;
  decimals: number;
  market_cap: number;
}

export interface WalletInfo {
  balance: number; // SOL
  tokens: TokenInfo[];
  address: string;
}

export interface TradeExecutionRequest {
  signature: string;
  token_address: string;
  token_name: string;
  token_symbol: string;
  transaction_type: string;
  amount_token: number;
  amount_sol: number;
  price_per_token: number;
  token_image_uri: string;
}

export interface TradeExecutionResponse {
  success: boolean;
  error: string | null;
}

/**
 * Result of replicating a trade through an execution adapter
 */
export interface CopyTradeExecution {
  signature: string;
  transaction_type: 'Buy' | 'Sell';
  amount_token: number;
  amount_sol: number;
  price_per_token: number;
}
