import { Pool, PoolClient } from "pg";
import { getPool } from "../db";

type QueryClient = Pool | PoolClient;

export class AccountBalanceModel {
  /**
   * Credit an account. Runs inside the caller's transaction so a later
   * failure rolls the credit back with everything else.
   */
  static async credit(
    account: string,
    amount: bigint,
    client?: QueryClient
  ): Promise<bigint> {
    const db = client || getPool();
    const result = await db.query<{ balance: string }>(
      `INSERT INTO account_balances (account, balance)
       VALUES ($1, $2)
       ON CONFLICT (account) DO UPDATE SET
         balance = account_balances.balance + EXCLUDED.balance,
         updated_at = EXTRACT(EPOCH FROM NOW())::BIGINT
       RETURNING balance`,
      [account, amount.toString()]
    );
    if (!result.rows[0]) {
      throw new Error(`Failed to credit account ${account}`);
    }
    return BigInt(result.rows[0].balance);
  }

  /**
   * Take `amount` from an account if it holds at least that much.
   * Returns the new balance, or null when the balance would go negative.
   */
  static async debit(
    account: string,
    amount: bigint,
    client?: QueryClient
  ): Promise<bigint | null> {
    const db = client || getPool();
    const result = await db.query<{ balance: string }>(
      `UPDATE account_balances
       SET balance = balance - $2,
           updated_at = EXTRACT(EPOCH FROM NOW())::BIGINT
       WHERE account = $1 AND balance >= $2
       RETURNING balance`,
      [account, amount.toString()]
    );
    return result.rows[0] ? BigInt(result.rows[0].balance) : null;
  }

  static async findByAccount(
    account: string,
    client?: QueryClient
  ): Promise<bigint> {
    const db = client || getPool();
    const result = await db.query<{ balance: string }>(
      "SELECT balance FROM account_balances WHERE account = $1",
      [account]
    );
    return result.rows[0] ? BigInt(result.rows[0].balance) : 0n;
  }
}
