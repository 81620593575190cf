import { PoolClient } from "pg";
import {
  InsufficientBalanceError,
  MarketNotFoundError,
} from "../engine/errors";
import {
  AccountPositions,
  Collect,
  MarketHeader,
  MarketSnapshot,
  OUTCOMES,
  Transfer,
} from "../engine/types";
import { AccountBalanceModel } from "../models/AccountBalance";
import { MarketModel } from "../models/Market";
import { OutcomePoolModel } from "../models/OutcomePool";
import { StakePositionModel } from "../models/StakePosition";
import { withTransaction } from "../utils/transaction";

/**
 * A market loaded for one operation. `snapshot.positions` only holds the
 * accounts the operation asked for. `collect` debits a stake and `transfer`
 * pays out inside the same unit of work, so a failure after either rolls
 * the balance change back too.
 */
export interface MarketUnitOfWork {
  snapshot: MarketSnapshot;
  transfer: Transfer;
  collect: Collect;
}

export interface UnitOfWorkResult<T> {
  snapshot: MarketSnapshot;
  result: T;
}

export interface MarketStore {
  insert(snapshot: MarketSnapshot): Promise<void>;
  list(limit?: number): Promise<MarketHeader[]>;
  /** Read-only load; positions limited to `accounts` */
  load(marketId: string, accounts: string[]): Promise<MarketSnapshot | null>;
  /**
   * Load, run `work`, persist the returned snapshot. Nothing is persisted
   * when `work` throws.
   */
  update<T>(
    marketId: string,
    accounts: string[],
    work: (uow: MarketUnitOfWork) => Promise<UnitOfWorkResult<T>>
  ): Promise<T>;
  /** Settlement balance an account can stake from; 0 when never funded */
  getBalance(account: string): Promise<bigint>;
  /** Add funds to an account. Returns the new balance. */
  deposit(account: string, amount: bigint): Promise<bigint>;
}

/**
 * Postgres-backed store. Each update runs in one transaction with the
 * market row locked.
 */
export class PgMarketStore implements MarketStore {
  async insert(snapshot: MarketSnapshot): Promise<void> {
    await withTransaction(async (client) => {
      await MarketModel.create(snapshot.header, client);
      for (const outcome of OUTCOMES) {
        await OutcomePoolModel.upsert(
          snapshot.header.id,
          outcome,
          snapshot.pools[outcome],
          client
        );
      }
    });
  }

  async list(limit: number = 100): Promise<MarketHeader[]> {
    return MarketModel.findAll(limit);
  }

  async load(
    marketId: string,
    accounts: string[]
  ): Promise<MarketSnapshot | null> {
    const header = await MarketModel.findById(marketId);
    if (!header) {
      return null;
    }
    const pools = await OutcomePoolModel.findByMarket(marketId);
    const positions = await StakePositionModel.findByAccounts(
      marketId,
      accounts
    );
    return { header, pools, positions };
  }

  async update<T>(
    marketId: string,
    accounts: string[],
    work: (uow: MarketUnitOfWork) => Promise<UnitOfWorkResult<T>>
  ): Promise<T> {
    return withTransaction(async (client) => {
      const header = await MarketModel.findById(marketId, client, true);
      if (!header) {
        throw new MarketNotFoundError(marketId);
      }
      const pools = await OutcomePoolModel.findByMarket(marketId, client);
      const positions = await StakePositionModel.findByAccounts(
        marketId,
        accounts,
        client,
        true
      );
      const before: MarketSnapshot = { header, pools, positions };

      const { snapshot, result } = await work({
        snapshot: before,
        transfer: async (account, amount) => {
          await AccountBalanceModel.credit(account, amount, client);
        },
        collect: async (account, amount) => {
          const remaining = await AccountBalanceModel.debit(
            account,
            amount,
            client
          );
          if (remaining === null) {
            throw new InsufficientBalanceError(account);
          }
        },
      });

      if (snapshot.header !== before.header) {
        await MarketModel.updateSettlement(snapshot.header, client);
      }
      for (const outcome of OUTCOMES) {
        if (snapshot.pools[outcome] !== before.pools[outcome]) {
          await OutcomePoolModel.upsert(
            marketId,
            outcome,
            snapshot.pools[outcome],
            client
          );
        }
      }
      for (const account of accounts) {
        await this.savePositions(
          marketId,
          account,
          before.positions.get(account),
          snapshot.positions.get(account),
          client
        );
      }
      return result;
    });
  }

  async getBalance(account: string): Promise<bigint> {
    return AccountBalanceModel.findByAccount(account);
  }

  async deposit(account: string, amount: bigint): Promise<bigint> {
    return AccountBalanceModel.credit(account, amount);
  }

  private async savePositions(
    marketId: string,
    account: string,
    previous: AccountPositions | undefined,
    next: AccountPositions | undefined,
    client: PoolClient
  ): Promise<void> {
    if (previous === next) {
      return;
    }
    if (!next) {
      await StakePositionModel.deleteByAccount(marketId, account, client);
      return;
    }
    for (const outcome of OUTCOMES) {
      if (previous?.[outcome] !== next[outcome]) {
        await StakePositionModel.upsert(
          marketId,
          account,
          outcome,
          next[outcome],
          client
        );
      }
    }
  }
}
