import { expect } from "chai";
import { beforeEach, describe, it } from "mocha";
import { INITIAL_RESERVE } from "../engine/constants";
import {
  EconomicError,
  InsufficientBalanceError,
  LifecycleError,
  MarketValidationError,
  ReentrancyError,
  TransferFailedError,
  UnauthorizedError,
} from "../engine/errors";
import { PredictionMarket } from "../engine/market";
import {
  Collect,
  LifecycleState,
  MarketEvent,
  SettlementStrategyKind,
  Transfer,
} from "../engine/types";
import {
  ether,
  ManualClock,
  ONE_DAY,
  ONE_WEEK,
  Payment,
  T0,
  THREE_DAYS,
} from "./helpers/testHelpers";

const START = T0 + 60;
const END = START + THREE_DAYS;
const EXPIRY = START + ONE_WEEK;

const expectRejection = async (
  promise: Promise<unknown>,
  type: new (...args: never[]) => Error,
  message?: string
): Promise<Error> => {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(type);
    if (message !== undefined && error instanceof Error) {
      expect(error.message).to.equal(message);
    }
    if (error instanceof Error) {
      return error;
    }
  }
  throw new Error(`Expected a ${type.name}`);
};

describe("PredictionMarket", function () {
  let clock: ManualClock;
  let payments: Payment[];
  let events: MarketEvent[];
  let transferImpl: Transfer;

  const open = (strategy?: SettlementStrategyKind, collect?: Collect) =>
    PredictionMarket.create(
      {
        id: "market-1",
        name: "Will it rain in Lisbon on Friday?",
        authority: "authority",
        start_time: START,
        end_time: END,
        expiry_time: EXPIRY,
        strategy,
      },
      {
        clock,
        transfer: (account, amount) => transferImpl(account, amount),
        collect,
        onEvent: (event) => events.push(event),
      }
    );

  beforeEach(() => {
    clock = new ManualClock(T0);
    payments = [];
    events = [];
    transferImpl = async (account, amount) => {
      payments.push({ account, amount });
    };
  });

  describe("Creation", () => {
    it("starts with two empty pools and no resolution", () => {
      const market = open();

      expect(market.header.resolution).to.equal(null);
      expect(market.header.strategy).to.equal("accrual");
      expect(market.totalSupply("yes")).to.equal(0n);
      expect(market.totalSupply("no")).to.equal(0n);
      expect(market.pools.yes.last_accrual_time).to.equal(START);
      expect(market.lifecycle()).to.equal(LifecycleState.PREDICTING);
    });

    it("rejects a blank name", () => {
      expect(() =>
        PredictionMarket.create(
          {
            id: "m",
            name: "  ",
            authority: "authority",
            start_time: START,
            end_time: END,
            expiry_time: EXPIRY,
          },
          { clock, transfer: transferImpl }
        )
      )
        .to.throw(MarketValidationError)
        .with.property("message", "Market name is required");
    });

    it("rejects a window that already started", () => {
      clock.set(START);

      expect(() => open())
        .to.throw(MarketValidationError)
        .with.property("message", "Start time must be in the future");
    });
  });

  describe("Staking", () => {
    it("records the stake and emits an event", async () => {
      const market = open();
      clock.set(START);

      const receipt = await market.stake("alice", "yes", ether("1.5"));

      expect(receipt).to.deep.equal({ amount: ether("1.5"), shares: 0n });
      expect(market.balanceOf("alice", "yes")).to.equal(ether("1.5"));
      expect(market.totalSupply("yes")).to.equal(ether("1.5"));
      expect(events).to.deep.equal([
        {
          type: "stake",
          market_id: "market-1",
          account: "alice",
          outcome: "yes",
          amount: ether("1.5"),
        },
      ]);
    });

    it("rejects stakes outside the prediction window", async () => {
      const market = open();

      clock.set(START - 1);
      await expectRejection(
        market.stake("alice", "yes", ether("1")),
        LifecycleError,
        "Prediction window is closed"
      );

      clock.set(END);
      await expectRejection(
        market.stake("alice", "yes", ether("1")),
        LifecycleError,
        "Prediction window is closed"
      );
      expect(events).to.have.length(0);
    });

    it("rejects a zero stake", async () => {
      const market = open();
      clock.set(START);

      await expectRejection(
        market.stake("alice", "no", 0n),
        EconomicError,
        "Must send value to predict"
      );
      expect(market.totalSupply("no")).to.equal(0n);
    });

    it("takes the stake from the staker before recording it", async () => {
      const collected: Payment[] = [];
      const market = open("accrual", async (account, amount) => {
        expect(market.totalSupply("no")).to.equal(0n);
        collected.push({ account, amount });
      });
      clock.set(START);

      await market.stake("bob", "no", ether("2"));

      expect(collected).to.deep.equal([{ account: "bob", amount: ether("2") }]);
      expect(market.balanceOf("bob", "no")).to.equal(ether("2"));
    });

    it("records nothing when the stake cannot be collected", async () => {
      const market = open("accrual", async (account) => {
        throw new InsufficientBalanceError(account);
      });
      clock.set(START);
      const before = market.snapshot();

      await expectRejection(
        market.stake("mallory", "yes", ether("1000000")),
        InsufficientBalanceError,
        "Insufficient balance"
      );

      expect(market.snapshot()).to.equal(before);
      expect(market.totalSupply("yes")).to.equal(0n);
      expect(events).to.have.length(0);
    });

    it("does not collect a stake it rejects", async () => {
      let calls = 0;
      const market = open("accrual", async () => {
        calls += 1;
      });
      clock.set(START);

      await expectRejection(market.stake("alice", "yes", 0n), EconomicError);

      expect(calls).to.equal(0);
    });

    it("reports the closed window before the missing value", async () => {
      const market = open();
      clock.set(END);

      await expectRejection(
        market.stake("alice", "no", 0n),
        LifecycleError,
        "Prediction window is closed"
      );
    });
  });

  describe("Accrual settlement", () => {
    it("pays the losing pool out by time-weighted share", async () => {
      const market = open();
      clock.set(START);
      await market.stake("alice", "yes", ether("5"));
      await market.stake("bob", "no", ether("1"));
      await market.stake("carol", "no", ether("2.3"));

      clock.set(END);
      await market.resolve("authority", "no");

      expect(market.earned("bob", "no")).to.equal(78545n);
      expect(market.earned("carol", "no")).to.equal(180653n);
      expect(market.rewardRate("no")).to.equal(19290123456790n);

      expect(await market.claim("bob")).to.equal(2515142746913570550n);
      expect(await market.claim("carol")).to.equal(5784818672839483870n);
      await expectRejection(
        market.claim("alice"),
        EconomicError,
        "Nothing to claim"
      );

      const paid = payments.reduce((sum, p) => sum + p.amount, 0n);
      expect(paid).to.equal(8299961419753054420n);
      expect(paid <= ether("8.3")).to.equal(true);
      expect(market.totalSupply("no")).to.equal(0n);
      expect(market.totalSupply("yes")).to.equal(ether("5"));
    });

    it("gives a sole winner the whole pot up to rounding", async () => {
      const market = open();
      clock.set(START);
      await market.stake("alice", "yes", ether("5"));
      await market.stake("bob", "no", ether("2.3"));
      await market.stake("carol", "no", ether("1"));

      clock.set(END);
      await market.resolve("authority", "yes");

      expect(await market.claim("alice")).to.equal(8299999999999875200n);
      expect(events[events.length - 1]).to.deep.equal({
        type: "claim",
        market_id: "market-1",
        account: "alice",
        amount: 8299999999999875200n,
      });
    });

    it("rewards earlier stakes more than later ones of the same size", async () => {
      const market = open();
      clock.set(START);
      await market.stake("alice", "no", ether("1"));
      await market.stake("carol", "yes", ether("2"));
      clock.advance(ONE_DAY);
      await market.stake("bob", "no", ether("1"));

      clock.set(END);
      await market.resolve("authority", "no");

      expect(market.earned("alice", "no")).to.equal(172800n);
      expect(market.earned("bob", "no")).to.equal(86400n);

      const alice = await market.claim("alice");
      const bob = await market.claim("bob");
      expect(alice).to.equal(2333333333333324800n);
      expect(bob).to.equal(1666666666666662400n);
      expect(alice + bob <= ether("4")).to.equal(true);
    });

    it("accrues nothing while a pool is empty", async () => {
      const market = open();
      clock.set(START);
      await market.stake("carol", "yes", ether("2"));
      clock.advance(ONE_DAY);
      await market.stake("alice", "no", ether("1"));

      clock.set(END);
      expect(market.earned("alice", "no")).to.equal(172800n);
    });

    it("keeps earned consistent with a checkpoint at any time", async () => {
      const market = open();
      clock.set(START);
      await market.stake("alice", "no", ether("1"));
      clock.advance(3_600);

      const before = market.earned("alice", "no");
      await market.stake("alice", "no", ether("1"));

      expect(market.position("alice").no.pending_reward_units).to.equal(
        before
      );
      expect(market.earned("alice", "no")).to.equal(before);
    });

    it("rejects a second claim without moving value", async () => {
      const market = open();
      clock.set(START);
      await market.stake("bob", "no", ether("1"));
      clock.set(END);
      await market.resolve("authority", "no");

      await market.claim("bob");
      await expectRejection(
        market.claim("bob"),
        EconomicError,
        "Nothing to claim"
      );
      expect(payments).to.have.length(1);
    });

    it("rejects claims before resolution", async () => {
      const market = open();
      clock.set(END);

      await expectRejection(
        market.claim("bob"),
        LifecycleError,
        "Outcome has not been set yet"
      );
    });
  });

  describe("Resolution", () => {
    it("only lets the authority resolve", async () => {
      const market = open();
      clock.set(END);

      await expectRejection(
        market.resolve("mallory", "yes"),
        UnauthorizedError
      );
      expect(market.header.resolution).to.equal(null);
    });

    it("can be resolved exactly once", async () => {
      const market = open();
      clock.set(END);
      await market.resolve("authority", "yes");

      await expectRejection(
        market.resolve("authority", "no"),
        EconomicError,
        "Answer already set"
      );
      await expectRejection(
        market.resolve("authority", "yes"),
        EconomicError,
        "Answer already set"
      );
      expect(market.header.resolution).to.equal("yes");
      expect(market.lifecycle()).to.equal(LifecycleState.RESOLVED);
    });

    it("cannot be resolved after expiry", async () => {
      const market = open();
      clock.set(EXPIRY);

      await expectRejection(
        market.resolve("authority", "yes"),
        LifecycleError,
        "Cannot set answer after expiry time"
      );
    });
  });

  describe("Expired withdrawal", () => {
    it("returns all principal once and then succeeds with zero", async () => {
      const market = open();
      clock.set(START);
      await market.stake("alice", "yes", ether("1"));
      await market.stake("alice", "no", ether("0.5"));
      await market.stake("alice", "yes", ether("2"));

      clock.set(EXPIRY + 1);
      expect(market.lifecycle()).to.equal(LifecycleState.EXPIRED);

      expect(await market.withdrawExpired("alice")).to.equal(ether("3.5"));
      expect(market.balanceOf("alice", "yes")).to.equal(0n);
      expect(market.balanceOf("alice", "no")).to.equal(0n);
      expect(market.totalSupply("yes")).to.equal(0n);
      expect(market.totalSupply("no")).to.equal(0n);

      const eventCount = events.length;
      expect(await market.withdrawExpired("alice")).to.equal(0n);
      expect(payments).to.deep.equal([{ account: "alice", amount: ether("3.5") }]);
      expect(events).to.have.length(eventCount);
    });

    it("is closed before expiry and after resolution", async () => {
      const market = open();
      clock.set(EXPIRY - 1);
      await expectRejection(
        market.withdrawExpired("alice"),
        LifecycleError,
        "Cannot withdraw before expiry time"
      );

      await market.resolve("authority", "yes");
      clock.set(EXPIRY + 1);
      await expectRejection(
        market.withdrawExpired("alice"),
        LifecycleError,
        "Outcome has been set"
      );
    });
  });

  describe("Guarding", () => {
    it("rejects a nested call made from inside the transfer", async () => {
      const market = open();
      clock.set(START);
      await market.stake("bob", "no", ether("1"));
      await market.stake("carol", "no", ether("1"));
      clock.set(END);
      await market.resolve("authority", "no");

      let nested: unknown = null;
      transferImpl = async (account, amount) => {
        payments.push({ account, amount });
        try {
          await market.claim("carol");
        } catch (error) {
          nested = error;
        }
      };

      await market.claim("bob");

      expect(nested).to.be.instanceOf(ReentrancyError);
      expect(payments).to.have.length(1);
      expect(market.balanceOf("carol", "no")).to.equal(ether("1"));
    });

    it("restores state when the transfer fails", async () => {
      const market = open();
      clock.set(START);
      await market.stake("bob", "no", ether("1"));
      clock.set(END);
      await market.resolve("authority", "no");
      const eventCount = events.length;
      const before = market.snapshot();

      transferImpl = async () => {
        throw new Error("payment rejected");
      };
      const error = await expectRejection(
        market.claim("bob"),
        TransferFailedError
      );

      expect(error.message).to.equal(
        "Transfer to bob failed: payment rejected"
      );
      expect(market.snapshot()).to.equal(before);
      expect(market.balanceOf("bob", "no")).to.equal(ether("1"));
      expect(events).to.have.length(eventCount);

      transferImpl = async (account, amount) => {
        payments.push({ account, amount });
      };
      expect(await market.claim("bob")).to.equal(ether("1"));
    });
  });

  describe("Bonding-curve settlement", () => {
    it("issues shares on the curve and splits the frozen pot", async () => {
      const market = open("bonding-curve");
      expect(market.pools.yes.reserve).to.equal(INITIAL_RESERVE);

      clock.set(START);
      const quoted = market.quote("yes", ether("1"));
      const first = await market.stake("alice", "yes", ether("1"));
      const second = await market.stake("bob", "yes", ether("1"));
      await market.stake("carol", "no", ether("3"));

      expect(first.shares).to.equal(quoted);
      expect(first.shares).to.equal(499248873309964947421131697n);
      expect(second.shares).to.equal(166582873977298948088465698n);
      expect(events[0]).to.deep.equal({
        type: "stake",
        market_id: "market-1",
        account: "alice",
        outcome: "yes",
        amount: ether("1"),
        shares: first.shares,
      });

      clock.set(END);
      await market.resolve("authority", "yes");

      expect(await market.claim("alice")).to.equal(3749061796347260445n);
      expect(market.header.settled_pot).to.equal(ether("5"));
      expect(await market.claim("bob")).to.equal(1250938203652739554n);
      await expectRejection(
        market.claim("carol"),
        EconomicError,
        "Nothing to claim"
      );
    });
  });
});
