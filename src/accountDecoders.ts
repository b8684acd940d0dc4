import { MINT_SIZE, MintLayout } from '@solana/spl-token';
import { AppError } from './errors.js';

// pump.fun bonding curve account:
// Offset 0-7:   Anchor discriminator
// Offset 8-15:  Virtual token reserves (i64 LE)
// Offset 16-23: Virtual SOL reserves (i64 LE)
// Offset 24+:   Real reserves, supply, completion flag
const BONDING_CURVE_MIN_LENGTH = 24;

// SPL token account:
// Offset 0-31:  Mint
// Offset 32-63: Owner
// Offset 64-71: Amount (u64 LE)
const TOKEN_ACCOUNT_AMOUNT_OFFSET = 64;
const TOKEN_ACCOUNT_MIN_LENGTH = 72;

export interface BondingCurveReserves {
  virtual_token_reserves: bigint;
  virtual_sol_reserves: bigint;
}

export interface MintSupply {
  supply: bigint;
  decimals: number;
}

export function decodeBondingCurveData(data: Buffer | Uint8Array): BondingCurveReserves {
  const buffer = Buffer.isBuffer(data) ? data : Buffer.from(data);

  if (buffer.length < BONDING_CURVE_MIN_LENGTH) {
    throw new AppError('DecodeError', `Bonding curve data too short: ${buffer.length} bytes`);
  }

  return {
    virtual_token_reserves: buffer.readBigInt64LE(8),
    virtual_sol_reserves: buffer.readBigInt64LE(16),
  };
}

export function decodeTokenAccountBalance(data: Buffer | Uint8Array): bigint {
  const buffer = Buffer.isBuffer(data) ? data : Buffer.from(data);

  if (buffer.length < TOKEN_ACCOUNT_MIN_LENGTH) {
    throw new AppError('DecodeError', `Token account too short: ${buffer.length} bytes`);
  }

  return buffer.readBigUInt64LE(TOKEN_ACCOUNT_AMOUNT_OFFSET);
}

export function decodeMintSupply(data: Buffer | Uint8Array): MintSupply {
  if (data.length < MINT_SIZE) {
    throw new AppError('DecodeError', `Mint account too short: ${data.length} bytes`);
  }

  const mint = MintLayout.decode(data);
  if (!mint.isInitialized) {
    throw new AppError('DecodeError', 'Mint account is not initialized');
  }
  return { supply: mint.supply, decimals: mint.decimals };
}
