import { Pool, PoolClient } from "pg";
import { getPool } from "../db";
import { Outcome, OutcomePair, OutcomePool } from "../engine/types";

type QueryClient = Pool | PoolClient;

interface OutcomePoolRow {
  market_id: string;
  outcome: string;
  total_staked: string;
  reward_per_unit_stored: string;
  last_accrual_time: string;
  reserve: string;
}

const toOutcomePool = (row: OutcomePoolRow): OutcomePool => ({
  total_staked: BigInt(row.total_staked),
  reward_per_unit_stored: BigInt(row.reward_per_unit_stored),
  last_accrual_time: Number(row.last_accrual_time),
  reserve: BigInt(row.reserve),
});

export class OutcomePoolModel {
  /**
   * Both pools of a market. Throws if either row is missing, since a market
   * is always written with exactly two.
   */
  static async findByMarket(
    market_id: string,
    client?: QueryClient
  ): Promise<OutcomePair<OutcomePool>> {
    const db = client || getPool();
    const result = await db.query<OutcomePoolRow>(
      `SELECT * FROM outcome_pools WHERE market_id = $1`,
      [market_id]
    );
    const yes = result.rows.find((row) => row.outcome === "yes");
    const no = result.rows.find((row) => row.outcome === "no");
    if (!yes || !no) {
      throw new Error(`Outcome pools missing for market ${market_id}`);
    }
    return { yes: toOutcomePool(yes), no: toOutcomePool(no) };
  }

  static async upsert(
    market_id: string,
    outcome: Outcome,
    pool: OutcomePool,
    client?: QueryClient
  ): Promise<void> {
    const db = client || getPool();
    await db.query(
      `INSERT INTO outcome_pools (
         market_id, outcome, total_staked, reward_per_unit_stored, last_accrual_time, reserve
       ) VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (market_id, outcome) DO UPDATE SET
         total_staked = EXCLUDED.total_staked,
         reward_per_unit_stored = EXCLUDED.reward_per_unit_stored,
         last_accrual_time = EXCLUDED.last_accrual_time,
         reserve = EXCLUDED.reserve`,
      [
        market_id,
        outcome,
        pool.total_staked.toString(),
        pool.reward_per_unit_stored.toString(),
        pool.last_accrual_time,
        pool.reserve.toString(),
      ]
    );
  }
}
