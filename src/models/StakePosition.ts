import { Pool, PoolClient } from "pg";
import { getPool } from "../db";
import { emptyPosition } from "../engine/accrual";
import {
  AccountPositions,
  Outcome,
  StakePosition,
  isOutcome,
} from "../engine/types";

type QueryClient = Pool | PoolClient;

interface StakePositionRow {
  market_id: string;
  account: string;
  outcome: string;
  balance: string;
  reward_units_paid: string;
  pending_reward_units: string;
  shares: string;
}

const toStakePosition = (row: StakePositionRow): StakePosition => ({
  balance: BigInt(row.balance),
  reward_units_paid: BigInt(row.reward_units_paid),
  pending_reward_units: BigInt(row.pending_reward_units),
  shares: BigInt(row.shares),
});

export class StakePositionModel {
  /**
   * Positions of the given accounts in one market. Accounts without rows
   * are absent from the result.
   */
  static async findByAccounts(
    market_id: string,
    accounts: string[],
    client?: QueryClient,
    forUpdate: boolean = false
  ): Promise<Map<string, AccountPositions>> {
    const positions = new Map<string, AccountPositions>();
    if (accounts.length === 0) {
      return positions;
    }

    const db = client || getPool();
    const result = await db.query<StakePositionRow>(
      `SELECT * FROM stake_positions
       WHERE market_id = $1 AND account = ANY($2::text[])${
         forUpdate ? " FOR UPDATE" : ""
       }`,
      [market_id, accounts]
    );

    for (const row of result.rows) {
      if (!isOutcome(row.outcome)) continue;
      const entry = positions.get(row.account) ?? {
        yes: emptyPosition(),
        no: emptyPosition(),
      };
      positions.set(
        row.account,
        row.outcome === "yes"
          ? { ...entry, yes: toStakePosition(row) }
          : { ...entry, no: toStakePosition(row) }
      );
    }
    return positions;
  }

  static async upsert(
    market_id: string,
    account: string,
    outcome: Outcome,
    position: StakePosition,
    client?: QueryClient
  ): Promise<void> {
    const db = client || getPool();
    await db.query(
      `INSERT INTO stake_positions (
         market_id, account, outcome, balance, reward_units_paid, pending_reward_units, shares
       ) VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (market_id, account, outcome) DO UPDATE SET
         balance = EXCLUDED.balance,
         reward_units_paid = EXCLUDED.reward_units_paid,
         pending_reward_units = EXCLUDED.pending_reward_units,
         shares = EXCLUDED.shares,
         updated_at = EXTRACT(EPOCH FROM NOW())::BIGINT`,
      [
        market_id,
        account,
        outcome,
        position.balance.toString(),
        position.reward_units_paid.toString(),
        position.pending_reward_units.toString(),
        position.shares.toString(),
      ]
    );
  }

  static async deleteByAccount(
    market_id: string,
    account: string,
    client?: QueryClient
  ): Promise<void> {
    const db = client || getPool();
    await db.query(
      `DELETE FROM stake_positions WHERE market_id = $1 AND account = $2`,
      [market_id, account]
    );
  }
}
