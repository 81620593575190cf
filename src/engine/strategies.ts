import { emptyPool } from "./accrual";
import { applyCurveStake, curvePayout, quoteShares } from "./bondingCurve";
import { INITIAL_RESERVE } from "./constants";
import { EconomicError } from "./errors";
import { accrualPayout } from "./payout";
import {
  MarketHeader,
  Outcome,
  OutcomePair,
  OutcomePool,
  SettlementStrategyKind,
  StakePosition,
} from "./types";

export interface StakeEffect {
  pool: OutcomePool;
  position: StakePosition;
  shares?: bigint;
}

export interface ClaimQuote {
  payout: bigint;
  settled_pot: bigint | null;
}

/**
 * How a market turns stakes into a claim. One strategy per market;
 * the lifecycle, ledger and checkpoint steps are shared.
 */
export interface SettlementStrategy {
  readonly kind: SettlementStrategyKind;
  initialPool(startTime: number): OutcomePool;
  /** Called with the checkpointed pool/position before the ledger records the stake */
  applyStake(
    pool: OutcomePool,
    position: StakePosition,
    amount: bigint
  ): StakeEffect;
  /** Throws "Nothing to claim" when the position is owed nothing */
  quoteClaim(
    header: MarketHeader,
    pools: OutcomePair<OutcomePool>,
    winning: Outcome,
    position: StakePosition
  ): ClaimQuote;
}

const nothingToClaim = () => new EconomicError("Nothing to claim");

export const accrualStrategy: SettlementStrategy = {
  kind: "accrual",

  initialPool: (startTime) => emptyPool(startTime),

  applyStake: (pool, position) => ({ pool, position }),

  quoteClaim(header, pools, winning, position) {
    if (position.pending_reward_units === 0n) {
      throw nothingToClaim();
    }
    return {
      payout: accrualPayout(
        header,
        pools,
        winning,
        position.balance,
        position.pending_reward_units
      ),
      settled_pot: header.settled_pot,
    };
  },
};

export const bondingCurveStrategy: SettlementStrategy = {
  kind: "bonding-curve",

  initialPool: (startTime) => emptyPool(startTime, INITIAL_RESERVE),

  applyStake(pool, position, amount) {
    const shares = quoteShares(pool, amount);
    return {
      pool: applyCurveStake(pool, shares),
      position: { ...position, shares: position.shares + shares },
      shares,
    };
  },

  quoteClaim(header, pools, winning, position) {
    if (position.shares === 0n) {
      throw nothingToClaim();
    }
    const pot =
      header.settled_pot ?? pools.yes.total_staked + pools.no.total_staked;
    return {
      payout: curvePayout(pot, position.shares, pools[winning]),
      settled_pot: pot,
    };
  },
};

export function strategyFor(kind: SettlementStrategyKind): SettlementStrategy {
  switch (kind) {
    case "accrual":
      return accrualStrategy;
    case "bonding-curve":
      return bondingCurveStrategy;
    default:
      throw new Error(`Unknown settlement strategy: ${String(kind)}`);
  }
}
