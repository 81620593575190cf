import {
  FEE_DENOMINATOR,
  FEE_NUMERATOR,
  INITIAL_RESERVE,
} from "./constants";
import { DivisionByZeroError } from "./errors";
import { OutcomePool } from "./types";

/// Constant-product bonding curve against a synthetic share reserve
///
/// amountOut = amountIn * 997 * reserve / (totalStaked * 1000 + amountIn * 997)
///
/// totalStaked already counts the incoming stake, so the very first stake
/// into a pool buys 997/1997 of the reserve rather than all of it.
///
/// Earlier stakes meet a fuller reserve and a smaller staked side, so they
/// receive more shares per unit of value. At settlement the winning side
/// splits the whole pot pro rata by shares, with no time weighting.

/// Shares a stake would buy from `pool` as it stands before the stake
export function quoteShares(pool: OutcomePool, amountIn: bigint): bigint {
  if (amountIn <= 0n) {
    return 0n;
  }
  const amountInWithFee = amountIn * FEE_NUMERATOR;
  const denominator =
    (pool.total_staked + amountIn) * FEE_DENOMINATOR + amountInWithFee;
  return (amountInWithFee * pool.reserve) / denominator;
}

/// Pool after a stake of amountIn bought `shares` off the curve
export function applyCurveStake(
  pool: OutcomePool,
  shares: bigint
): OutcomePool {
  return { ...pool, reserve: pool.reserve - shares };
}

/// Shares issued so far on one side
export const sharesIssued = (pool: OutcomePool): bigint =>
  INITIAL_RESERVE - pool.reserve;

export function curvePayout(
  pot: bigint,
  shares: bigint,
  winningPool: OutcomePool
): bigint {
  const issued = sharesIssued(winningPool);
  if (issued <= 0n) {
    throw new DivisionByZeroError();
  }
  return (pot * shares) / issued;
}
