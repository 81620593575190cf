import { emptyPosition } from "./accrual";
import {
  AccountPositions,
  Outcome,
  OutcomePair,
  OutcomePool,
  StakePosition,
} from "./types";

/// Stake ledger: per-outcome totals and per-account balances.
/// Every helper returns new records; callers keep the old ones for rollback.

export function replaceOutcome<T>(
  pair: OutcomePair<T>,
  outcome: Outcome,
  value: T
): OutcomePair<T> {
  return outcome === "yes" ? { ...pair, yes: value } : { ...pair, no: value };
}

export function positionsOf(
  positions: ReadonlyMap<string, AccountPositions>,
  account: string
): AccountPositions {
  return positions.get(account) ?? { yes: emptyPosition(), no: emptyPosition() };
}

export function withPositions(
  positions: ReadonlyMap<string, AccountPositions>,
  account: string,
  entry: AccountPositions
): Map<string, AccountPositions> {
  const next = new Map(positions);
  const isEmpty = (p: StakePosition) =>
    p.balance === 0n && p.pending_reward_units === 0n && p.shares === 0n;
  if (isEmpty(entry.yes) && isEmpty(entry.no)) {
    next.delete(account);
  } else {
    next.set(account, entry);
  }
  return next;
}

export function recordStake(
  pool: OutcomePool,
  position: StakePosition,
  amount: bigint
): { pool: OutcomePool; position: StakePosition } {
  return {
    pool: { ...pool, total_staked: pool.total_staked + amount },
    position: { ...position, balance: position.balance + amount },
  };
}

/// Remove a position's principal from its pool and zero the position
export function releasePosition(
  pool: OutcomePool,
  position: StakePosition
): { pool: OutcomePool; position: StakePosition } {
  return {
    pool: { ...pool, total_staked: pool.total_staked - position.balance },
    position: emptyPosition(),
  };
}
