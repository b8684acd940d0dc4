import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { config } from './config.js';
import { AppError, errorMessage } from './errors.js';
import type { EventBus } from './eventBus.js';
import type { CopyTradeSettings, TrackedWallet, TransactionLog } from './types.js';

const DB_FILENAME = 'monitor.sqlite';

/**
 * Store behind the monitor: users, tracked wallets, copy-trade settings and
 * the transaction log.
 */
export interface MonitorRepository {
  userExists(walletAddress: string): Promise<boolean>;
  createUser(walletAddress: string): Promise<void>;
  getTrackedWallets(): Promise<TrackedWallet[]>;
  getCopyTradeSettings(): Promise<CopyTradeSettings[]>;
  insertTransactionLog(log: TransactionLog): Promise<void>;
}

interface TrackedWalletRow {
  id: string;
  user_id: string | null;
  wallet_address: string;
  is_active: number;
  created_at: string | null;
  updated_at: string | null;
}

interface CopyTradeSettingsRow {
  id: string;
  user_id: string | null;
  tracked_wallet_id: string | null;
  is_enabled: number;
  trade_amount_sol: number;
  max_slippage: number;
  max_open_positions: number;
  allowed_tokens: string | null;
  use_allowed_tokens_list: number;
  allow_additional_buys: number;
  match_sell_percentage: number;
  min_sol_balance: number;
  created_at: string | null;
  updated_at: string | null;
}

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    fs.mkdirSync(config.dataDir, { recursive: true });
    db = openDatabase(path.join(config.dataDir, DB_FILENAME));
  }

  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export function openDatabase(filePath: string): Database.Database {
  const database = new Database(filePath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  initializeSchema(database);
  return database;
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      wallet_address TEXT UNIQUE NOT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS tracked_wallets (
      id TEXT PRIMARY KEY,
      user_id TEXT REFERENCES users(wallet_address) ON DELETE CASCADE,
      wallet_address TEXT NOT NULL,
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
      UNIQUE (user_id, wallet_address)
    );

    CREATE TABLE IF NOT EXISTS copy_trade_settings (
      id TEXT PRIMARY KEY,
      user_id TEXT REFERENCES users(wallet_address) ON DELETE CASCADE,
      tracked_wallet_id TEXT REFERENCES tracked_wallets(id) ON DELETE CASCADE,
      is_enabled INTEGER NOT NULL DEFAULT 0,
      trade_amount_sol REAL NOT NULL,
      max_slippage REAL NOT NULL DEFAULT 1.0,
      max_open_positions INTEGER NOT NULL DEFAULT 1,
      allow_additional_buys INTEGER NOT NULL DEFAULT 0,
      match_sell_percentage INTEGER NOT NULL DEFAULT 0,
      allowed_tokens TEXT,
      use_allowed_tokens_list INTEGER NOT NULL DEFAULT 0,
      min_sol_balance REAL NOT NULL DEFAULT 0.01,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
      UNIQUE (user_id, tracked_wallet_id)
    );

    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      user_id TEXT REFERENCES users(wallet_address) ON DELETE CASCADE,
      tracked_wallet_id TEXT REFERENCES tracked_wallets(id) ON DELETE SET NULL,
      signature TEXT NOT NULL,
      transaction_type TEXT NOT NULL,
      token_address TEXT NOT NULL,
      amount REAL NOT NULL,
      price_sol REAL NOT NULL,
      timestamp TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_transactions_signature ON transactions (signature);
  `);
}

function parseAllowedTokens(raw: string | null): string[] | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : null;
  } catch (error) {
    console.warn(`[Database] Ignoring malformed allowed_tokens value: ${errorMessage(error)}`);
    return null;
  }
}

function toTrackedWallet(row: TrackedWalletRow): TrackedWallet {
  return {
    id: row.id,
    user_id: row.user_id,
    wallet_address: row.wallet_address,
    is_active: row.is_active === 1,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function toCopyTradeSettings(row: CopyTradeSettingsRow): CopyTradeSettings {
  return {
    id: row.id,
    user_id: row.user_id,
    tracked_wallet_id: row.tracked_wallet_id,
    is_enabled: row.is_enabled === 1,
    trade_amount_sol: row.trade_amount_sol,
    max_slippage: row.max_slippage,
    max_open_positions: row.max_open_positions,
    allowed_tokens: parseAllowedTokens(row.allowed_tokens),
    use_allowed_tokens_list: row.use_allowed_tokens_list === 1,
    allow_additional_buys: row.allow_additional_buys === 1,
    match_sell_percentage: row.match_sell_percentage === 1,
    min_sol_balance: row.min_sol_balance,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * SQLite-backed repository. better-sqlite3 is synchronous; the async
 * surface matches the MonitorRepository contract.
 */
export class SqliteMonitorRepository implements MonitorRepository {
  constructor(private readonly database: Database.Database = getDatabase()) {}

  async userExists(walletAddress: string): Promise<boolean> {
    return this.run('check user', () => {
      const row = this.database
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM users WHERE wallet_address = ?')
        .get(walletAddress);
      return row !== undefined;
    });
  }

  async createUser(walletAddress: string): Promise<void> {
    this.run('create user', () => {
      this.database
        .prepare('INSERT OR IGNORE INTO users (id, wallet_address) VALUES (?, ?)')
        .run(randomUUID(), walletAddress);
    });
  }

  async getTrackedWallets(): Promise<TrackedWallet[]> {
    return this.run('load tracked wallets', () =>
      this.database
        .prepare<[], TrackedWalletRow>('SELECT * FROM tracked_wallets ORDER BY created_at, rowid')
        .all()
        .map(toTrackedWallet)
    );
  }

  async getCopyTradeSettings(): Promise<CopyTradeSettings[]> {
    return this.run('load copy trade settings', () =>
      this.database
        .prepare<[], CopyTradeSettingsRow>('SELECT * FROM copy_trade_settings ORDER BY created_at, rowid')
        .all()
        .map(toCopyTradeSettings)
    );
  }

  async insertTransactionLog(log: TransactionLog): Promise<void> {
    this.run('insert transaction log', () => {
      this.database
        .prepare(`
          INSERT INTO transactions (id, user_id, tracked_wallet_id, signature, transaction_type, token_address, amount, price_sol, timestamp)
          VALUES (@id, @user_id, @tracked_wallet_id, @signature, @transaction_type, @token_address, @amount, @price_sol, @timestamp)
        `)
        .run(log);
    });
  }

  // ============================================================================
  // WRITES USED BY SEEDING AND THE OPERATOR TOOLING
  // ============================================================================

  addTrackedWallet(userId: string, walletAddress: string, isActive = true): TrackedWallet {
    return this.run('add tracked wallet', () => {
      const id = randomUUID();
      this.database
        .prepare('INSERT INTO tracked_wallets (id, user_id, wallet_address, is_active) VALUES (?, ?, ?, ?)')
        .run(id, userId, walletAddress, isActive ? 1 : 0);
      const row = this.database
        .prepare<[string], TrackedWalletRow>('SELECT * FROM tracked_wallets WHERE id = ?')
        .get(id);
      if (!row) {
        throw new Error(`tracked wallet ${id} missing after insert`);
      }
      return toTrackedWallet(row);
    });
  }

  saveCopyTradeSettings(settings: CopyTradeSettings): CopyTradeSettings {
    return this.run('save copy trade settings', () => {
      const id = settings.id ?? randomUUID();
      this.database
        .prepare(`
          INSERT INTO copy_trade_settings (
            id, user_id, tracked_wallet_id, is_enabled, trade_amount_sol, max_slippage, max_open_positions,
            allow_additional_buys, match_sell_percentage, allowed_tokens, use_allowed_tokens_list, min_sol_balance
          ) VALUES (
            @id, @user_id, @tracked_wallet_id, @is_enabled, @trade_amount_sol, @max_slippage, @max_open_positions,
            @allow_additional_buys, @match_sell_percentage, @allowed_tokens, @use_allowed_tokens_list, @min_sol_balance
          )
          ON CONFLICT (id) DO UPDATE SET
            is_enabled = excluded.is_enabled,
            trade_amount_sol = excluded.trade_amount_sol,
            max_slippage = excluded.max_slippage,
            max_open_positions = excluded.max_open_positions,
            allow_additional_buys = excluded.allow_additional_buys,
            match_sell_percentage = excluded.match_sell_percentage,
            allowed_tokens = excluded.allowed_tokens,
            use_allowed_tokens_list = excluded.use_allowed_tokens_list,
            min_sol_balance = excluded.min_sol_balance,
            updated_at = CURRENT_TIMESTAMP
        `)
        .run({
          id,
          user_id: settings.user_id,
          tracked_wallet_id: settings.tracked_wallet_id,
          is_enabled: settings.is_enabled ? 1 : 0,
          trade_amount_sol: settings.trade_amount_sol,
          max_slippage: settings.max_slippage,
          max_open_positions: settings.max_open_positions,
          allow_additional_buys: settings.allow_additional_buys ? 1 : 0,
          match_sell_percentage: settings.match_sell_percentage ? 1 : 0,
          allowed_tokens: settings.allowed_tokens ? JSON.stringify(settings.allowed_tokens) : null,
          use_allowed_tokens_list: settings.use_allowed_tokens_list ? 1 : 0,
          min_sol_balance: settings.min_sol_balance,
        });
      const row = this.database
        .prepare<[string], CopyTradeSettingsRow>('SELECT * FROM copy_trade_settings WHERE id = ?')
        .get(id);
      if (!row) {
        throw new Error(`copy trade settings ${id} missing after save`);
      }
      return toCopyTradeSettings(row);
    });
  }

  countTransactions(signature?: string): number {
    return this.run('count transactions', () => {
      const row = signature
        ? this.database
            .prepare<[string], { count: number }>('SELECT COUNT(1) AS count FROM transactions WHERE signature = ?')
            .get(signature)
        : this.database.prepare<[], { count: number }>('SELECT COUNT(1) AS count FROM transactions').get();
      return row?.count ?? 0;
    });
  }

  private run<T>(operation: string, action: () => T): T {
    try {
      return action();
    } catch (error) {
      throw new AppError('DatabaseError', `Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Make sure the server wallet has a users row before anything references it
 */
export async function ensureUserExists(repository: MonitorRepository, walletAddress: string): Promise<void> {
  const exists = await repository.userExists(walletAddress);
  if (exists) return;

  console.log('[Database] Creating new user in database');
  try {
    await repository.createUser(walletAddress);
  } catch (error) {
    throw new AppError('InitializationError', `Failed to create user: ${errorMessage(error)}`, { cause: error });
  }
  console.log('[Database] ✅ User created');
}

/**
 * Append every `transaction-logged` event to the repository. Returns a
 * function that stops listening.
 */
export function persistTransactionLogs(bus: EventBus, repository: MonitorRepository): () => void {
  return bus.on('transaction-logged', event => {
    const log = event.notification.data;
    repository.insertTransactionLog(log).catch(error => {
      console.error(`[Database] Failed to persist transaction ${log.signature}: ${errorMessage(error)}`);
    });
  });
}
