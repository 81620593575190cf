import { PoolClient } from "pg";
import { getPool } from "../db";

export interface TransactionOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

const isDeadlock = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  return code === "40P01" || error.message.includes("deadlock detected");
};

/**
 * Transaction helper to eliminate repetitive BEGIN/COMMIT/ROLLBACK code.
 * Any error rolls back; deadlocks are retried with exponential backoff.
 *
 * @example
 * await withTransaction(async (client) => {
 *   const market = await MarketModel.findById(marketId, client, true);
 *   if (!market) {
 *     throw new MarketNotFoundError(marketId);
 *   }
 *   await MarketModel.updateSettlement(market, client);
 * });
 */
export async function withTransaction<T>(
  callback: (client: PoolClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const { maxRetries = 3, initialDelayMs = 100, maxDelayMs = 2000 } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const client = await getPool().connect();

    try {
      await client.query("BEGIN");
      const result = await callback(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");

      // Business errors and exhausted retries go straight back to the caller
      if (!isDeadlock(error) || attempt >= maxRetries) {
        throw error;
      }

      lastError = error;

      const delay = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
      const jitter = Math.random() * 0.1 * delay;
      const totalDelay = delay + jitter;

      console.warn(
        `[Transaction] Deadlock detected, retrying in ${totalDelay.toFixed(
          0
        )}ms (attempt ${attempt + 1}/${maxRetries + 1})`
      );
      await new Promise((resolve) => setTimeout(resolve, totalDelay));
    } finally {
      client.release();
    }
  }

  throw lastError;
}
