import {
  AccountPositions,
  LifecycleState,
  MarketEvent,
  MarketHeader,
  OutcomePair,
  OutcomePool,
  StakePosition,
} from "../engine/types";

/// Wire shapes. Amounts leave the process as decimal strings of wei.

export interface MarketHeaderJson {
  id: string;
  name: string;
  authority: string;
  start_time: number;
  end_time: number;
  expiry_time: number;
  strategy: string;
  resolution: string | null;
  settled_pot: string | null;
}

export interface OutcomePoolJson {
  total_staked: string;
  reward_per_unit_stored: string;
  last_accrual_time: number;
  reserve: string;
}

export interface StakePositionJson {
  balance: string;
  reward_units_paid: string;
  pending_reward_units: string;
  shares: string;
}

export type MarketEventJson = Record<string, string | number | boolean>;

export const serializeHeader = (header: MarketHeader): MarketHeaderJson => ({
  ...header,
  settled_pot:
    header.settled_pot === null ? null : header.settled_pot.toString(),
});

export const serializePool = (pool: OutcomePool): OutcomePoolJson => ({
  total_staked: pool.total_staked.toString(),
  reward_per_unit_stored: pool.reward_per_unit_stored.toString(),
  last_accrual_time: pool.last_accrual_time,
  reserve: pool.reserve.toString(),
});

export const serializePools = (
  pools: OutcomePair<OutcomePool>
): OutcomePair<OutcomePoolJson> => ({
  yes: serializePool(pools.yes),
  no: serializePool(pools.no),
});

export const serializePosition = (
  position: StakePosition
): StakePositionJson => ({
  balance: position.balance.toString(),
  reward_units_paid: position.reward_units_paid.toString(),
  pending_reward_units: position.pending_reward_units.toString(),
  shares: position.shares.toString(),
});

export const serializePositions = (
  positions: AccountPositions
): OutcomePair<StakePositionJson> => ({
  yes: serializePosition(positions.yes),
  no: serializePosition(positions.no),
});

export function serializeMarket(
  header: MarketHeader,
  pools: OutcomePair<OutcomePool>,
  state: LifecycleState
) {
  return {
    ...serializeHeader(header),
    state,
    pools: serializePools(pools),
  };
}

export function serializeEvent(event: MarketEvent): MarketEventJson {
  const result: MarketEventJson = {};
  for (const [key, value] of Object.entries(event)) {
    if (typeof value === "bigint") {
      result[key] = value.toString();
    } else if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      result[key] = value;
    }
  }
  return result;
}
