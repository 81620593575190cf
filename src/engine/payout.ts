import { DivisionByZeroError } from "./errors";
import { MarketHeader, OutcomePair, OutcomePool, Outcome, opposite } from "./types";

/// Losing pool value spread evenly over each second of the open window
export function rewardRate(
  header: Pick<MarketHeader, "start_time" | "end_time">,
  losingPool: OutcomePool
): bigint {
  const duration = BigInt(header.end_time - header.start_time);
  if (duration <= 0n) {
    throw new DivisionByZeroError();
  }
  return losingPool.total_staked / duration;
}

/// Principal back plus the time-weighted cut of the losing pool
export function accrualPayout(
  header: Pick<MarketHeader, "start_time" | "end_time">,
  pools: OutcomePair<OutcomePool>,
  winning: Outcome,
  balance: bigint,
  earnedUnits: bigint
): bigint {
  const rate = rewardRate(header, pools[opposite(winning)]);
  return balance + earnedUnits * rate;
}
