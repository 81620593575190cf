import { checkpoint, earned as earnedUnits } from "./accrual";
import { quoteShares } from "./bondingCurve";
import {
  EconomicError,
  MarketValidationError,
  ReentrancyError,
  TransferFailedError,
  UnauthorizedError,
} from "./errors";
import {
  assertCanClaim,
  assertCanResolve,
  assertCanStake,
  assertCanWithdrawExpired,
  lifecycleState,
  validateWindow,
} from "./lifecycle";
import {
  positionsOf,
  recordStake,
  releasePosition,
  replaceOutcome,
  withPositions,
} from "./ledger";
import { rewardRate } from "./payout";
import { SettlementStrategy, strategyFor } from "./strategies";
import {
  AccountPositions,
  Authorizer,
  Clock,
  Collect,
  LifecycleState,
  MarketEvent,
  MarketHeader,
  MarketSnapshot,
  Outcome,
  OutcomePair,
  OutcomePool,
  SettlementStrategyKind,
  StakePosition,
  OUTCOMES,
  Transfer,
  opposite,
} from "./types";

export interface MarketDependencies {
  clock: Clock;
  transfer: Transfer;
  /** Pulls the stake from the staker. Without it the value arrives with the call. */
  collect?: Collect;
  authorize?: Authorizer;
  onEvent?: (event: MarketEvent) => void;
}

export interface CreateMarketInput {
  id: string;
  name: string;
  authority: string;
  start_time: number;
  end_time: number;
  expiry_time: number;
  strategy?: SettlementStrategyKind;
}

export interface StakeReceipt {
  amount: bigint;
  shares: bigint;
}

export const authorityOnly: Authorizer = (caller, header) =>
  caller === header.authority;

/**
 * A single binary market and everything it owns: header, both outcome
 * pools and every stake position.
 *
 * Mutating operations are guarded: while one is in flight (including while
 * awaiting the payout transfer) any other mutating call is rejected.
 * A failed operation leaves the previous state in place.
 */
export class PredictionMarket {
  private state: MarketSnapshot;
  private executing = false;
  private readonly strategy: SettlementStrategy;

  private constructor(
    snapshot: MarketSnapshot,
    private readonly deps: MarketDependencies
  ) {
    this.state = snapshot;
    this.strategy = strategyFor(snapshot.header.strategy);
  }

  static create(
    input: CreateMarketInput,
    deps: MarketDependencies
  ): PredictionMarket {
    const name = input.name.trim();
    if (!name) {
      throw new MarketValidationError("Market name is required");
    }
    if (!input.authority) {
      throw new MarketValidationError("Market authority is required");
    }
    validateWindow(input, deps.clock.now());

    const strategy = strategyFor(input.strategy ?? "accrual");
    const header: MarketHeader = {
      id: input.id,
      name,
      authority: input.authority,
      start_time: input.start_time,
      end_time: input.end_time,
      expiry_time: input.expiry_time,
      strategy: strategy.kind,
      resolution: null,
      settled_pot: null,
    };

    return new PredictionMarket(
      {
        header,
        pools: {
          yes: strategy.initialPool(input.start_time),
          no: strategy.initialPool(input.start_time),
        },
        positions: new Map(),
      },
      deps
    );
  }

  static restore(
    snapshot: MarketSnapshot,
    deps: MarketDependencies
  ): PredictionMarket {
    return new PredictionMarket(snapshot, deps);
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  get header(): MarketHeader {
    return this.state.header;
  }

  get pools(): OutcomePair<OutcomePool> {
    return this.state.pools;
  }

  snapshot(): MarketSnapshot {
    return this.state;
  }

  lifecycle(): LifecycleState {
    return lifecycleState(this.state.header, this.deps.clock.now());
  }

  totalSupply(outcome: Outcome): bigint {
    return this.state.pools[outcome].total_staked;
  }

  balanceOf(account: string, outcome: Outcome): bigint {
    return positionsOf(this.state.positions, account)[outcome].balance;
  }

  position(account: string): AccountPositions {
    return positionsOf(this.state.positions, account);
  }

  /** Reward units the account would hold after a checkpoint right now */
  earned(account: string, outcome: Outcome): bigint {
    return earnedUnits(
      this.state.pools[outcome],
      this.position(account)[outcome],
      this.deps.clock.now(),
      this.state.header.end_time
    );
  }

  rewardRate(winning: Outcome): bigint {
    return rewardRate(this.state.header, this.state.pools[opposite(winning)]);
  }

  /** Shares a stake of `amountIn` would buy right now (bonding curve) */
  quote(outcome: Outcome, amountIn: bigint): bigint {
    return quoteShares(this.state.pools[outcome], amountIn);
  }

  // ===========================================================================
  // Mutating operations
  // ===========================================================================

  async stake(
    account: string,
    outcome: Outcome,
    amount: bigint
  ): Promise<StakeReceipt> {
    return this.guarded(async (events) => {
      if (!account) {
        throw new MarketValidationError("Account is required");
      }
      const now = this.deps.clock.now();
      const { header, pools, positions } = this.state;
      assertCanStake(header, now);
      if (amount <= 0n) {
        throw new EconomicError("Must send value to predict");
      }
      await this.deps.collect?.(account, amount);

      const current = positionsOf(positions, account);
      const checkpointed = this.checkpoint(outcome, current[outcome], now);
      const effect = this.strategy.applyStake(
        checkpointed.pool,
        checkpointed.position,
        amount
      );
      const recorded = recordStake(effect.pool, effect.position, amount);

      this.state = {
        header,
        pools: replaceOutcome(pools, outcome, recorded.pool),
        positions: withPositions(
          positions,
          account,
          replaceOutcome(current, outcome, recorded.position)
        ),
      };

      events.push({
        type: "stake",
        market_id: header.id,
        account,
        outcome,
        amount,
        ...(effect.shares !== undefined ? { shares: effect.shares } : {}),
      });
      return { amount, shares: effect.shares ?? 0n };
    });
  }

  async resolve(caller: string, outcome: Outcome): Promise<void> {
    return this.guarded(async (events) => {
      const { header } = this.state;
      const authorize = this.deps.authorize ?? authorityOnly;
      if (!authorize(caller, header)) {
        throw new UnauthorizedError();
      }
      assertCanResolve(header, this.deps.clock.now());

      this.state = {
        ...this.state,
        header: { ...header, resolution: outcome },
      };
      events.push({ type: "resolved", market_id: header.id, outcome });
    });
  }

  /** Pay principal plus reward on the winning side. Returns the amount paid. */
  async claim(account: string): Promise<bigint> {
    return this.guarded(async (events) => {
      const { header, pools, positions } = this.state;
      const winning = assertCanClaim(header);
      const now = this.deps.clock.now();

      const current = positionsOf(positions, account);
      const checkpointed = this.checkpoint(winning, current[winning], now);
      const settledPools = replaceOutcome(pools, winning, checkpointed.pool);
      const quote = this.strategy.quoteClaim(
        header,
        settledPools,
        winning,
        checkpointed.position
      );
      const released = releasePosition(
        checkpointed.pool,
        checkpointed.position
      );

      // Ledger is zeroed before any value leaves
      this.state = {
        header: { ...header, settled_pot: quote.settled_pot },
        pools: replaceOutcome(pools, winning, released.pool),
        positions: withPositions(
          positions,
          account,
          replaceOutcome(current, winning, released.position)
        ),
      };

      await this.pay(account, quote.payout);
      events.push({
        type: "claim",
        market_id: header.id,
        account,
        amount: quote.payout,
      });
      return quote.payout;
    });
  }

  /**
   * Return all principal after an unresolved market expired.
   * An account with nothing staked gets a successful zero.
   */
  async withdrawExpired(account: string): Promise<bigint> {
    return this.guarded(async (events) => {
      const { header, positions } = this.state;
      const now = this.deps.clock.now();
      assertCanWithdrawExpired(header, now);

      const current = positionsOf(positions, account);
      const amount = current.yes.balance + current.no.balance;
      if (amount === 0n) {
        return 0n;
      }

      let pools = this.state.pools;
      let entry = current;
      for (const outcome of OUTCOMES) {
        const checkpointed = this.checkpoint(outcome, entry[outcome], now);
        const released = releasePosition(
          checkpointed.pool,
          checkpointed.position
        );
        pools = replaceOutcome(pools, outcome, released.pool);
        entry = replaceOutcome(entry, outcome, released.position);
      }
      this.state = {
        header,
        pools,
        positions: withPositions(positions, account, entry),
      };

      await this.pay(account, amount);
      events.push({
        type: "expired-withdrawal",
        market_id: header.id,
        account,
        amount,
      });
      return amount;
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private checkpoint(
    outcome: Outcome,
    position: StakePosition,
    now: number
  ): { pool: OutcomePool; position: StakePosition } {
    const result = checkpoint(
      this.state.pools[outcome],
      position,
      now,
      this.state.header.end_time
    );
    return { pool: result.pool, position: result.position ?? position };
  }

  private async pay(account: string, amount: bigint): Promise<void> {
    try {
      await this.deps.transfer(account, amount);
    } catch (error) {
      throw new TransferFailedError(account, error);
    }
  }

  /**
   * Run one mutating operation under the re-entrancy flag. On any error the
   * state captured at entry is put back; events are only published once the
   * whole operation (transfer included) has succeeded.
   */
  private async guarded<T>(
    operation: (events: MarketEvent[]) => Promise<T>
  ): Promise<T> {
    if (this.executing) {
      throw new ReentrancyError();
    }
    this.executing = true;
    const previous = this.state;
    const events: MarketEvent[] = [];
    let result: T;
    try {
      result = await operation(events);
    } catch (error) {
      this.state = previous;
      throw error;
    } finally {
      this.executing = false;
    }

    for (const event of events) {
      this.deps.onEvent?.(event);
    }
    return result;
  }
}
