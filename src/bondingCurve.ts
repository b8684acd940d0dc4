import { BondingCurveReserves, decodeBondingCurveData } from './accountDecoders.js';
import type { ChainReader } from './chainReader.js';
import { AppError } from './errors.js';
import type { PumpFunCoinData } from './pumpFunApi.js';

export const BONDING_CURVE_MARGIN_OF_ERROR = 0.05;

const LAMPORTS_PER_SOL = 1_000_000_000;
const PUMP_FUN_TOKEN_DECIMALS = 6;

/**
 * True when the API figures are not far below the on-chain ones:
 * `onChain * (1 - margin) < reported` for both reserves.
 */
export function reservesWithinThreshold(
  onChain: BondingCurveReserves,
  reported: { virtual_sol_reserves: number; virtual_token_reserves: number },
  margin: number = BONDING_CURVE_MARGIN_OF_ERROR
): boolean {
  const solFloor = Number(onChain.virtual_sol_reserves) * (1 - margin);
  const tokenFloor = Number(onChain.virtual_token_reserves) * (1 - margin);
  return solFloor < reported.virtual_sol_reserves && tokenFloor < reported.virtual_token_reserves;
}

/**
 * Read the coin's bonding curve account. The on-chain reserves win; a
 * mismatch against the API is only logged.
 */
export async function getBondingCurveInfo(reader: ChainReader, coin: PumpFunCoinData): Promise<BondingCurveReserves> {
  const data = await reader.getAccountData(coin.bonding_curve);
  if (!data) {
    throw new AppError('RequestError', `Bonding curve account ${coin.bonding_curve} not found`);
  }

  const reserves = decodeBondingCurveData(data);
  if (!reservesWithinThreshold(reserves, coin)) {
    console.warn(
      `[BondingCurve] Reserves for ${coin.mint.substring(0, 8)}... differ from API by more than ` +
        `${BONDING_CURVE_MARGIN_OF_ERROR * 100}% (on-chain sol=${reserves.virtual_sol_reserves} ` +
        `token=${reserves.virtual_token_reserves}, api sol=${coin.virtual_sol_reserves} ` +
        `token=${coin.virtual_token_reserves})`
    );
  }
  return reserves;
}

// SOL per whole token implied by the virtual reserves
export function bondingCurvePriceSol(reserves: BondingCurveReserves): number {
  if (reserves.virtual_token_reserves <= 0n) return 0;
  const sol = Number(reserves.virtual_sol_reserves) / LAMPORTS_PER_SOL;
  const tokens = Number(reserves.virtual_token_reserves) / 10 ** PUMP_FUN_TOKEN_DECIMALS;
  return sol / tokens;
}

/**
 * Market cap in SOL. `totalSupply` is in base units, as the API reports it.
 */
export function bondingCurveMarketCapSol(reserves: BondingCurveReserves, totalSupply: number): number {
  return bondingCurvePriceSol(reserves) * (totalSupply / 10 ** PUMP_FUN_TOKEN_DECIMALS);
}
