import { LAMPORTS_PER_SOL } from '@solana/web3.js';
import { NATIVE_MINT } from '@solana/spl-token';
import { bondingCurveMarketCapSol, getBondingCurveInfo } from './bondingCurve.js';
import type { ChainReader, ChainTokenBalance, ChainTransaction } from './chainReader.js';
import { errorMessage } from './errors.js';
import type { CoinDataSource, PumpFunCoinData } from './pumpFunApi.js';
import type { DexType, ObservedTrade, TransactionType } from './types.js';

export const PUMP_FUN_PROGRAM_ID = '6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P';
export const RAYDIUM_AMM_V4_PROGRAM_ID = '675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8';

// Below this, a SOL balance change is just the network fee
const FEE_TOLERANCE_SOL = 0.00001;

const WSOL_MINT = NATIVE_MINT.toBase58();

export interface TradeSource {
  resolve(signature: string, walletAddress?: string): Promise<ObservedTrade | null>;
}

interface TokenDelta {
  mint: string;
  delta: number;
}

function uiAmount(balance: ChainTokenBalance): number {
  return Number(balance.uiTokenAmount.amount) / 10 ** balance.uiTokenAmount.decimals;
}

/**
 * Largest non-SOL token balance change for `owner`
 */
export function largestTokenDelta(
  owner: string,
  pre: readonly ChainTokenBalance[],
  post: readonly ChainTokenBalance[]
): TokenDelta | null {
  const deltas = new Map<string, number>();
  for (const balance of pre) {
    if (balance.owner === owner && balance.mint !== WSOL_MINT) {
      deltas.set(balance.mint, (deltas.get(balance.mint) ?? 0) - uiAmount(balance));
    }
  }
  for (const balance of post) {
    if (balance.owner === owner && balance.mint !== WSOL_MINT) {
      deltas.set(balance.mint, (deltas.get(balance.mint) ?? 0) + uiAmount(balance));
    }
  }

  let best: TokenDelta | null = null;
  for (const [mint, delta] of deltas) {
    if (delta !== 0 && (!best || Math.abs(delta) > Math.abs(best.delta))) {
      best = { mint, delta };
    }
  }
  return best;
}

export function classifyTrade(tokenDelta: number, solDelta: number): TransactionType {
  if (tokenDelta !== 0 && Math.abs(solDelta) < FEE_TOLERANCE_SOL) return 'Transfer';
  if (tokenDelta > 0 && solDelta < 0) return 'Buy';
  if (tokenDelta < 0 && solDelta > 0) return 'Sell';
  return 'Unknown';
}

export function detectDex(accountKeys: readonly string[]): DexType {
  if (accountKeys.includes(PUMP_FUN_PROGRAM_ID)) return 'PumpFun';
  if (accountKeys.includes(RAYDIUM_AMM_V4_PROGRAM_ID)) return 'Raydium';
  return 'Unknown';
}

function heldAmount(owner: string, mint: string, balances: readonly ChainTokenBalance[]): number {
  return balances
    .filter(balance => balance.owner === owner && balance.mint === mint)
    .reduce((total, balance) => total + uiAmount(balance), 0);
}

function mintDecimals(mint: string, balances: readonly ChainTokenBalance[]): number | undefined {
  return balances.find(balance => balance.mint === mint)?.uiTokenAmount.decimals;
}

/**
 * Owner on the other side of the token movement, if the transaction shows one
 */
function findCounterparty(
  owner: string,
  mint: string,
  tokenDelta: number,
  pre: readonly ChainTokenBalance[],
  post: readonly ChainTokenBalance[]
): string {
  for (const after of post) {
    if (after.mint !== mint || !after.owner || after.owner === owner) continue;
    const before = pre.find(balance => balance.accountIndex === after.accountIndex);
    const delta = uiAmount(after) - (before ? uiAmount(before) : 0);
    if (delta !== 0 && Math.sign(delta) !== Math.sign(tokenDelta)) {
      return after.owner;
    }
  }
  return '';
}

/**
 * Turns a signature seen on the feed into an ObservedTrade by reading the
 * confirmed transaction and diffing the tracked wallet's balances.
 */
export class TradeResolver implements TradeSource {
  constructor(
    private readonly reader: ChainReader,
    private readonly coinData: CoinDataSource
  ) {}

  async resolve(signature: string, walletAddress?: string): Promise<ObservedTrade | null> {
    const transaction = await this.reader.getParsedTransaction(signature);
    if (!transaction) {
      console.warn(`[Resolver] Transaction ${signature.substring(0, 12)}... not found`);
      return null;
    }
    return this.fromTransaction(signature, transaction, walletAddress);
  }

  async fromTransaction(
    signature: string,
    transaction: ChainTransaction,
    walletAddress?: string
  ): Promise<ObservedTrade | null> {
    const meta = transaction.meta;
    if (!meta || (meta.err !== null && meta.err !== undefined)) {
      return null;
    }

    const accountKeys = transaction.transaction.message.accountKeys.map(key => key.pubkey.toBase58());
    const signerIndex = walletAddress
      ? accountKeys.indexOf(walletAddress)
      : transaction.transaction.message.accountKeys.findIndex(key => key.signer);
    if (signerIndex < 0) {
      return null;
    }
    const wallet = accountKeys[signerIndex];

    const pre = meta.preTokenBalances ?? [];
    const post = meta.postTokenBalances ?? [];
    const token = largestTokenDelta(wallet, pre, post);
    if (!token) {
      return null;
    }

    const solDelta = ((meta.postBalances[signerIndex] ?? 0) - (meta.preBalances[signerIndex] ?? 0)) / LAMPORTS_PER_SOL;
    const transactionType = classifyTrade(token.delta, solDelta);
    const dexType = detectDex(accountKeys);
    const amountToken = Math.abs(token.delta);
    const amountSol = transactionType === 'Transfer' ? 0 : Math.abs(solDelta);
    const counterparty = findCounterparty(wallet, token.mint, token.delta, pre, post);
    const walletReceived = token.delta > 0;

    const coin = await this.coinData.getCoinData(token.mint);
    const marketCap = coin ? await this.resolveMarketCap(coin, dexType) : 0;
    const decimals = mintDecimals(token.mint, [...pre, ...post]);
    const marketPrice =
      coin && coin.total_supply > 0 && marketCap > 0 && decimals !== undefined
        ? marketCap / (coin.total_supply / 10 ** decimals)
        : null;
    const heldBefore = heldAmount(wallet, token.mint, pre);
    const fractionSold =
      transactionType === 'Sell' && heldBefore > 0 ? Math.min(1, amountToken / heldBefore) : null;

    return Object.freeze({
      signature,
      token_address: token.mint,
      token_name: coin?.name ?? 'Unknown',
      token_symbol: coin?.symbol ?? 'UNKNOWN',
      transaction_type: transactionType,
      amount_token: amountToken,
      amount_sol: amountSol,
      price_per_token: amountToken > 0 ? amountSol / amountToken : 0,
      token_image_uri: coin?.image_uri ?? '',
      market_cap: marketCap,
      usd_market_cap: coin?.usd_market_cap ?? 0,
      timestamp: transaction.blockTime ?? Math.floor(Date.now() / 1000),
      seller: walletReceived ? counterparty : wallet,
      buyer: walletReceived ? wallet : counterparty,
      dex_type: dexType,
      market_price_sol: marketPrice,
      position_fraction_sold: fractionSold,
    });
  }

  // On-chain curve reserves win over the API figure while the coin is on
  // its bonding curve
  private async resolveMarketCap(coin: PumpFunCoinData, dexType: DexType): Promise<number> {
    if (dexType !== 'PumpFun' || coin.complete || coin.total_supply <= 0) {
      return coin.market_cap;
    }
    try {
      const reserves = await getBondingCurveInfo(this.reader, coin);
      return bondingCurveMarketCapSol(reserves, coin.total_supply);
    } catch (error) {
      console.warn(`[Resolver] Bonding curve read failed for ${coin.mint.substring(0, 8)}...: ${errorMessage(error)}`);
      return coin.market_cap;
    }
  }
}
