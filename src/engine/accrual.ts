import { SCALE } from "./constants";
import { OutcomePool, StakePosition } from "./types";

/// Lazy time-weighted reward accrual
///
/// rewardPerUnitStored grows by elapsed / totalStaked (scaled by SCALE) for
/// every second the pool holds stake before endTime, so a position accrues
/// roughly ∫ balance(t) / totalStaked(t) dt over the window it was held.

export interface CheckpointResult {
  pool: OutcomePool;
  position: StakePosition | null;
}

export const emptyPool = (
  startTime: number,
  reserve: bigint = 0n
): OutcomePool => ({
  total_staked: 0n,
  reward_per_unit_stored: 0n,
  last_accrual_time: startTime,
  reserve,
});

export const emptyPosition = (): StakePosition => ({
  balance: 0n,
  reward_units_paid: 0n,
  pending_reward_units: 0n,
  shares: 0n,
});

/// Bring the pool accumulator current as of min(now, endTime)
export function accruePool(
  pool: OutcomePool,
  now: number,
  endTime: number
): OutcomePool {
  const applicableTime = Math.min(now, endTime);
  if (applicableTime <= pool.last_accrual_time) {
    return pool;
  }

  // An empty pool accrues nothing; only the clock moves forward
  const rewardPerUnitStored =
    pool.total_staked > 0n
      ? pool.reward_per_unit_stored +
        (BigInt(applicableTime - pool.last_accrual_time) * SCALE) /
          pool.total_staked
      : pool.reward_per_unit_stored;

  return {
    ...pool,
    reward_per_unit_stored: rewardPerUnitStored,
    last_accrual_time: applicableTime,
  };
}

/// Units a position has earned against an already-accrued pool
export function pendingUnits(
  pool: OutcomePool,
  position: StakePosition
): bigint {
  return (
    (position.balance *
      (pool.reward_per_unit_stored - position.reward_units_paid)) /
      SCALE +
    position.pending_reward_units
  );
}

/**
 * Checkpoint a pool and, optionally, one position in it.
 * Pass `null` as the position for a read-only probe of the pool.
 * Inputs are never mutated.
 */
export function checkpoint(
  pool: OutcomePool,
  position: StakePosition | null,
  now: number,
  endTime: number
): CheckpointResult {
  const accrued = accruePool(pool, now, endTime);
  if (!position) {
    return { pool: accrued, position: null };
  }

  return {
    pool: accrued,
    position: {
      ...position,
      pending_reward_units: pendingUnits(accrued, position),
      reward_units_paid: accrued.reward_per_unit_stored,
    },
  };
}

/// Read-only view of what a checkpoint would leave in pending_reward_units
export function earned(
  pool: OutcomePool,
  position: StakePosition,
  now: number,
  endTime: number
): bigint {
  return pendingUnits(accruePool(pool, now, endTime), position);
}
