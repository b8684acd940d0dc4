import { Connection, PublicKey } from '@solana/web3.js';
import { AppError } from './errors.js';

/**
 * Token balance entry as reported in a transaction's meta
 */
export interface ChainTokenBalance {
  accountIndex: number;
  mint: string;
  owner?: string;
  uiTokenAmount: {
    amount: string;
    decimals: number;
  };
}

/**
 * The parts of a parsed transaction the trade resolver reads.
 * `ParsedTransactionWithMeta` from @solana/web3.js satisfies it.
 */
export interface ChainTransaction {
  blockTime?: number | null;
  transaction: {
    signatures: string[];
    message: {
      accountKeys: Array<{
        pubkey: { toBase58(): string };
        signer: boolean;
      }>;
    };
  };
  meta: {
    err: unknown;
    preBalances: number[];
    postBalances: number[];
    preTokenBalances?: ChainTokenBalance[] | null;
    postTokenBalances?: ChainTokenBalance[] | null;
  } | null;
}

/**
 * Read-only chain access used by the decoders and the trade resolver
 */
export interface ChainReader {
  getAccountData(address: string): Promise<Buffer | null>;
  getParsedTransaction(signature: string): Promise<ChainTransaction | null>;
}

export class RpcChainReader implements ChainReader {
  private connection: Connection;

  constructor(rpcUrl: string) {
    this.connection = new Connection(rpcUrl, 'confirmed');
  }

  async getAccountData(address: string): Promise<Buffer | null> {
    let publicKey: PublicKey;
    try {
      publicKey = new PublicKey(address);
    } catch (error) {
      throw new AppError('RequestError', `Invalid account address ${address}`, { cause: error });
    }

    const info = await this.connection.getAccountInfo(publicKey);
    return info ? info.data : null;
  }

  async getParsedTransaction(signature: string): Promise<ChainTransaction | null> {
    return this.connection.getParsedTransaction(signature, {
      commitment: 'confirmed',
      maxSupportedTransactionVersion: 0,
    });
  }
}
