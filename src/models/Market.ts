import { Pool, PoolClient } from "pg";
import { getPool } from "../db";
import {
  MarketHeader,
  SettlementStrategyKind,
  isOutcome,
} from "../engine/types";

type QueryClient = Pool | PoolClient;

// BIGINT and NUMERIC columns come back from pg as strings
export interface MarketRow {
  id: string;
  name: string;
  authority: string;
  start_time: string;
  end_time: string;
  expiry_time: string;
  strategy: string;
  resolution: string | null;
  settled_pot: string | null;
  created_at: string;
  updated_at: string;
}

const toStrategy = (value: string): SettlementStrategyKind => {
  if (value === "accrual" || value === "bonding-curve") {
    return value;
  }
  throw new Error(`Unknown settlement strategy in database: ${value}`);
};

export function toMarketHeader(row: MarketRow): MarketHeader {
  return {
    id: row.id,
    name: row.name,
    authority: row.authority,
    start_time: Number(row.start_time),
    end_time: Number(row.end_time),
    expiry_time: Number(row.expiry_time),
    strategy: toStrategy(row.strategy),
    resolution: isOutcome(row.resolution) ? row.resolution : null,
    settled_pot: row.settled_pot === null ? null : BigInt(row.settled_pot),
  };
}

export class MarketModel {
  static async create(
    header: MarketHeader,
    client?: QueryClient
  ): Promise<MarketHeader> {
    const db = client || getPool();
    const query = `
      INSERT INTO markets (
        id,
        name,
        authority,
        start_time,
        end_time,
        expiry_time,
        strategy,
        resolution,
        settled_pot
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING *
    `;
    const result = await db.query<MarketRow>(query, [
      header.id,
      header.name,
      header.authority,
      header.start_time,
      header.end_time,
      header.expiry_time,
      header.strategy,
      header.resolution,
      header.settled_pot === null ? null : header.settled_pot.toString(),
    ]);
    return toMarketHeader(result.rows[0]);
  }

  /**
   * Find market by id. With `forUpdate` the row stays locked until the
   * surrounding transaction ends.
   */
  static async findById(
    id: string,
    client?: QueryClient,
    forUpdate: boolean = false
  ): Promise<MarketHeader | null> {
    const db = client || getPool();
    const query = `SELECT * FROM markets WHERE id = $1${
      forUpdate ? " FOR UPDATE" : ""
    }`;
    const result = await db.query<MarketRow>(query, [id]);
    return result.rows[0] ? toMarketHeader(result.rows[0]) : null;
  }

  static async findAll(
    limit: number = 100,
    client?: QueryClient
  ): Promise<MarketHeader[]> {
    const db = client || getPool();
    const result = await db.query<MarketRow>(
      "SELECT * FROM markets ORDER BY created_at DESC LIMIT $1",
      [limit]
    );
    return result.rows.map(toMarketHeader);
  }

  /**
   * Persist the mutable part of the header
   */
  static async updateSettlement(
    header: MarketHeader,
    client?: QueryClient
  ): Promise<void> {
    const db = client || getPool();
    await db.query(
      `UPDATE markets
       SET resolution = $2,
           settled_pot = $3,
           updated_at = EXTRACT(EPOCH FROM NOW())::BIGINT
       WHERE id = $1`,
      [
        header.id,
        header.resolution,
        header.settled_pot === null ? null : header.settled_pot.toString(),
      ]
    );
  }
}
