export type Outcome = "yes" | "no";

export const OUTCOMES: readonly Outcome[] = ["yes", "no"] as const;

export type SettlementStrategyKind = "accrual" | "bonding-curve";

export enum LifecycleState {
  PREDICTING = "PREDICTING",
  AWAITING_RESOLUTION = "AWAITING_RESOLUTION",
  RESOLVED = "RESOLVED",
  EXPIRED = "EXPIRED",
}

/**
 * Immutable market boundaries plus the one field that may change
 * (`resolution`, set at most once). All times are unix seconds.
 */
export interface MarketHeader {
  id: string;
  name: string;
  authority: string;
  start_time: number;
  end_time: number;
  expiry_time: number;
  strategy: SettlementStrategyKind;
  resolution: Outcome | null;
  // Bonding curve only: pooled value frozen at the first claim
  settled_pot: bigint | null;
}

export interface OutcomePool {
  total_staked: bigint;
  reward_per_unit_stored: bigint;
  last_accrual_time: number;
  reserve: bigint;
}

export interface StakePosition {
  balance: bigint;
  reward_units_paid: bigint;
  pending_reward_units: bigint;
  shares: bigint;
}

/** One record per outcome. Exactly two outcomes, never a generic map. */
export interface OutcomePair<T> {
  yes: T;
  no: T;
}

export type AccountPositions = OutcomePair<StakePosition>;

export interface MarketSnapshot {
  header: MarketHeader;
  pools: OutcomePair<OutcomePool>;
  positions: ReadonlyMap<string, AccountPositions>;
}

export type MarketEvent =
  | {
      type: "stake";
      market_id: string;
      account: string;
      outcome: Outcome;
      amount: bigint;
      shares?: bigint;
    }
  | { type: "claim"; market_id: string; account: string; amount: bigint }
  | {
      type: "expired-withdrawal";
      market_id: string;
      account: string;
      amount: bigint;
    }
  | { type: "resolved"; market_id: string; outcome: Outcome };

export interface Clock {
  now(): number;
}

/** Moves value to an account. Rejects when the payment did not happen. */
export type Transfer = (account: string, amount: bigint) => Promise<void>;

/** Takes value from an account into the market. Rejects when it cannot be covered. */
export type Collect = (account: string, amount: bigint) => Promise<void>;

export type Authorizer = (caller: string, header: MarketHeader) => boolean;

export const opposite = (outcome: Outcome): Outcome =>
  outcome === "yes" ? "no" : "yes";

export const isOutcome = (value: unknown): value is Outcome =>
  value === "yes" || value === "no";
