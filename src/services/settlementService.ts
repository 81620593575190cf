import { randomUUID } from "crypto";
import {
  EconomicError,
  MarketNotFoundError,
  UnauthorizedError,
} from "../engine/errors";
import {
  CreateMarketInput,
  MarketDependencies,
  PredictionMarket,
  StakeReceipt,
} from "../engine/market";
import {
  AccountPositions,
  Authorizer,
  Clock,
  LifecycleState,
  MarketEvent,
  MarketHeader,
  Outcome,
  OutcomePair,
  OutcomePool,
  SettlementStrategyKind,
  Transfer,
} from "../engine/types";
import { formatEther } from "../utils/amounts";
import { MarketStore } from "./marketStore";
import { withMarketQueue } from "./marketQueue";

export interface SettlementServiceOptions {
  store: MarketStore;
  clock: Clock;
  /** Accounts allowed to create markets */
  adminAccounts: string[];
  defaultStrategy?: SettlementStrategyKind;
  /** Capability check for resolve; defaults to the market authority */
  authorize?: Authorizer;
  onEvent?: (event: MarketEvent) => void;
}

export interface NewMarketRequest {
  name: string;
  start_time: number;
  end_time: number;
  expiry_time: number;
  strategy?: SettlementStrategyKind;
}

export interface MarketView {
  header: MarketHeader;
  pools: OutcomePair<OutcomePool>;
  state: LifecycleState;
}

export interface PositionView {
  account: string;
  positions: AccountPositions;
  earned: OutcomePair<bigint>;
}

const noTransfer: Transfer = async () => {
  throw new Error("Read-only market view cannot move value");
};

/**
 * Runs market operations against the store: one queued unit of work per
 * call, with the engine's stake collection and payout transfer bound to
 * that unit of work.
 */
export class SettlementService {
  constructor(private readonly options: SettlementServiceOptions) {}

  isAdmin(account: string): boolean {
    return this.options.adminAccounts.includes(account);
  }

  async createMarket(
    caller: string,
    request: NewMarketRequest
  ): Promise<MarketView> {
    if (!this.isAdmin(caller)) {
      throw new UnauthorizedError("Only admins can create markets");
    }

    const input: CreateMarketInput = {
      id: randomUUID(),
      name: request.name,
      authority: caller,
      start_time: request.start_time,
      end_time: request.end_time,
      expiry_time: request.expiry_time,
      strategy: request.strategy ?? this.options.defaultStrategy,
    };
    const market = PredictionMarket.create(input, this.readOnlyDeps());
    await this.options.store.insert(market.snapshot());

    console.log(
      `[Settlement] Market ${input.id} created by ${caller} (${market.header.strategy})`
    );
    return this.view(market);
  }

  async getBalance(account: string): Promise<bigint> {
    return this.options.store.getBalance(account);
  }

  /** Fund an account's settlement balance. Admins only. */
  async deposit(
    caller: string,
    account: string,
    amount: bigint
  ): Promise<bigint> {
    if (!this.isAdmin(caller)) {
      throw new UnauthorizedError("Only admins can fund accounts");
    }
    if (amount <= 0n) {
      throw new EconomicError("Deposit must be positive");
    }
    const balance = await this.options.store.deposit(account, amount);
    console.log(
      `[Settlement] ${caller} deposited ${formatEther(amount)} to ${account}`
    );
    return balance;
  }

  async listMarkets(limit?: number): Promise<MarketHeader[]> {
    return this.options.store.list(limit);
  }

  async getMarket(marketId: string): Promise<MarketView> {
    return this.view(await this.loadReadOnly(marketId, []));
  }

  async getPosition(marketId: string, account: string): Promise<PositionView> {
    const market = await this.loadReadOnly(marketId, [account]);
    return {
      account,
      positions: market.position(account),
      earned: {
        yes: market.earned(account, "yes"),
        no: market.earned(account, "no"),
      },
    };
  }

  async quote(
    marketId: string,
    outcome: Outcome,
    amount: bigint
  ): Promise<bigint> {
    const market = await this.loadReadOnly(marketId, []);
    return market.quote(outcome, amount);
  }

  async stake(
    marketId: string,
    account: string,
    outcome: Outcome,
    amount: bigint
  ): Promise<StakeReceipt> {
    return this.mutate(marketId, [account], (market) =>
      market.stake(account, outcome, amount)
    );
  }

  async resolve(
    marketId: string,
    caller: string,
    outcome: Outcome
  ): Promise<void> {
    await this.mutate(marketId, [], (market) =>
      market.resolve(caller, outcome)
    );
    console.log(`[Settlement] Market ${marketId} resolved to ${outcome}`);
  }

  async claim(marketId: string, account: string): Promise<bigint> {
    const payout = await this.mutate(marketId, [account], (market) =>
      market.claim(account)
    );
    console.log(
      `[Settlement] ${account} claimed ${formatEther(payout)} from ${marketId}`
    );
    return payout;
  }

  async withdrawExpired(marketId: string, account: string): Promise<bigint> {
    const amount = await this.mutate(marketId, [account], (market) =>
      market.withdrawExpired(account)
    );
    if (amount > 0n) {
      console.log(
        `[Settlement] ${account} withdrew ${formatEther(amount)} from expired market ${marketId}`
      );
    }
    return amount;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private readOnlyDeps(): MarketDependencies {
    return {
      clock: this.options.clock,
      transfer: noTransfer,
      authorize: this.options.authorize,
    };
  }

  private view(market: PredictionMarket): MarketView {
    return {
      header: market.header,
      pools: market.pools,
      state: market.lifecycle(),
    };
  }

  private async loadReadOnly(
    marketId: string,
    accounts: string[]
  ): Promise<PredictionMarket> {
    const snapshot = await this.options.store.load(marketId, accounts);
    if (!snapshot) {
      throw new MarketNotFoundError(marketId);
    }
    return PredictionMarket.restore(snapshot, this.readOnlyDeps());
  }

  /**
   * Queue the operation behind any other on the same market, run it in one
   * unit of work and publish its events only after the store committed.
   */
  private async mutate<T>(
    marketId: string,
    accounts: string[],
    operation: (market: PredictionMarket) => Promise<T>
  ): Promise<T> {
    const events: MarketEvent[] = [];

    const result = await withMarketQueue(marketId, () =>
      this.options.store.update(marketId, accounts, async (uow) => {
        // A retried unit of work starts over
        events.length = 0;
        const market = PredictionMarket.restore(uow.snapshot, {
          clock: this.options.clock,
          transfer: uow.transfer,
          collect: uow.collect,
          authorize: this.options.authorize,
          onEvent: (event) => events.push(event),
        });
        const value = await operation(market);
        return { snapshot: market.snapshot(), result: value };
      })
    );

    for (const event of events) {
      this.options.onEvent?.(event);
    }
    return result;
  }
}
