import dotenv from 'dotenv';
import path from 'path';
import { AppError } from './errors.js';
import { parseBooleanEnv, parseIntegerEnv } from './utils/envParsing.js';

dotenv.config();

// Helper function to ensure URLs have a protocol prefix
function ensureProtocol(url: string, defaultUrl: string, protocol: 'https' | 'wss' = 'https'): string {
  if (!url) return defaultUrl;
  if (!/^[a-z]+:\/\//i.test(url)) {
    console.warn(`[CONFIG] URL "${url}" is missing protocol, auto-prepending ${protocol}://`);
    return `${protocol}://${url}`;
  }
  return url;
}

export const config = {
  // Solana RPC (HTTP for account and transaction reads, WebSocket for the log feed)
  solanaRpcHttpUrl: ensureProtocol(process.env.SOLANA_RPC_HTTP_URL || '', ''),
  solanaRpcWsUrl: ensureProtocol(process.env.SOLANA_RPC_WS_URL || '', '', 'wss'),

  // Relay between sibling instances
  redisUrl: process.env.REDIS_URL || '',

  // The server wallet doubles as the user id that owns the tracked wallets
  serverWalletAddress: process.env.SERVER_WALLET_ADDRESS || '',

  // Wallet custody service (gRPC, host:port)
  walletServiceUrl: process.env.WALLET_SERVICE_URL || '',
  walletServiceProtoPath: process.env.WALLET_SERVICE_PROTO_PATH || path.join(process.cwd(), 'proto', 'wallet.proto'),
  walletServiceTimeoutMs: parseIntegerEnv(process.env.WALLET_SERVICE_TIMEOUT_MS, 10000),

  pumpFunApiUrl: ensureProtocol(process.env.PUMP_FUN_API_URL || '', 'https://frontend-api.pump.fun'),

  // Status server
  statusApiEnabled: parseBooleanEnv(process.env.STATUS_API_ENABLED, true),
  port: parseIntegerEnv(process.env.PORT, 3001),

  // Data directory
  dataDir: process.env.DATA_DIR || './data',

  // Vault price feed. No pools file means no vault polling.
  priceFeedPoolsFile: process.env.PRICE_FEED_POOLS_FILE || '',
  vaultPollIntervalMs: parseIntegerEnv(process.env.VAULT_POLL_INTERVAL_MS, 10000),

  // Validate required configuration
  validate(): void {
    const required: Array<[string, string]> = [
      ['SOLANA_RPC_HTTP_URL', this.solanaRpcHttpUrl],
      ['SOLANA_RPC_WS_URL', this.solanaRpcWsUrl],
      ['REDIS_URL', this.redisUrl],
      ['SERVER_WALLET_ADDRESS', this.serverWalletAddress],
      ['WALLET_SERVICE_URL', this.walletServiceUrl],
    ];
    const missing = required.filter(([, value]) => !value).map(([name]) => name);

    if (missing.length > 0) {
      console.error('\n❌ ERROR: Missing required configuration!\n');
      for (const name of missing) {
        console.error(`   ${name}`);
      }
      console.error('\n   Add them to your .env file (see .env.example).\n');
      throw new AppError('ConfigError', `Missing required environment variables: ${missing.join(', ')}`);
    }

    if (!this.priceFeedPoolsFile) {
      console.warn('⚠️  PRICE_FEED_POOLS_FILE not set, vault price polling is disabled');
    }
  },
};
