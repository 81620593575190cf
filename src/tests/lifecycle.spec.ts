import { expect } from "chai";
import { describe, it } from "mocha";
import {
  EconomicError,
  LifecycleError,
  MarketValidationError,
} from "../engine/errors";
import {
  assertCanClaim,
  assertCanResolve,
  assertCanStake,
  assertCanWithdrawExpired,
  lifecycleState,
  validateWindow,
} from "../engine/lifecycle";
import { LifecycleState, MarketHeader } from "../engine/types";

const header = (overrides: Partial<MarketHeader> = {}): MarketHeader => ({
  id: "market-1",
  name: "Test market",
  authority: "authority",
  start_time: 100,
  end_time: 200,
  expiry_time: 300,
  strategy: "accrual",
  resolution: null,
  settled_pot: null,
  ...overrides,
});

const window = { start_time: 100, end_time: 200, expiry_time: 300 };

describe("Market lifecycle", () => {
  describe("validateWindow", () => {
    it("accepts a strictly ordered future window", () => {
      expect(() => validateWindow(window, 99)).to.not.throw();
    });

    it("rejects a start time that is not in the future", () => {
      expect(() => validateWindow(window, 100))
        .to.throw(MarketValidationError)
        .with.property("message", "Start time must be in the future");
    });

    it("rejects a start time that is not before the end time", () => {
      expect(() => validateWindow({ ...window, end_time: 100 }, 0))
        .to.throw(MarketValidationError)
        .with.property("message", "Start time must be before end time");
    });

    it("rejects an end time that is not before the expiry time", () => {
      expect(() => validateWindow({ ...window, expiry_time: 200 }, 0))
        .to.throw(MarketValidationError)
        .with.property("message", "End time must be before expiry time");
    });

    it("rejects timestamps that are not whole seconds", () => {
      expect(() => validateWindow({ ...window, end_time: 150.5 }, 0))
        .to.throw(MarketValidationError)
        .with.property("message", "end_time must be a unix timestamp");
    });
  });

  describe("lifecycleState", () => {
    it("derives the state from the clock and the resolution", () => {
      expect(lifecycleState(header(), 50)).to.equal(LifecycleState.PREDICTING);
      expect(lifecycleState(header(), 199)).to.equal(
        LifecycleState.PREDICTING
      );
      expect(lifecycleState(header(), 200)).to.equal(
        LifecycleState.AWAITING_RESOLUTION
      );
      expect(lifecycleState(header(), 300)).to.equal(LifecycleState.EXPIRED);
      expect(lifecycleState(header({ resolution: "no" }), 300)).to.equal(
        LifecycleState.RESOLVED
      );
    });
  });

  describe("gates", () => {
    it("opens staking on [start, end)", () => {
      expect(() => assertCanStake(header(), 100)).to.not.throw();
      expect(() => assertCanStake(header(), 199)).to.not.throw();
      expect(() => assertCanStake(header(), 99))
        .to.throw(LifecycleError)
        .with.property("message", "Prediction window is closed");
      expect(() => assertCanStake(header(), 200))
        .to.throw(LifecycleError)
        .with.property("message", "Prediction window is closed");
    });

    it("opens resolution on [end, expiry)", () => {
      expect(() => assertCanResolve(header(), 200)).to.not.throw();
      expect(() => assertCanResolve(header(), 299)).to.not.throw();
      expect(() => assertCanResolve(header(), 199))
        .to.throw(LifecycleError)
        .with.property("message", "Cannot set answer before end time");
      expect(() => assertCanResolve(header(), 300))
        .to.throw(LifecycleError)
        .with.property("message", "Cannot set answer after expiry time");
    });

    it("reports a second resolution before any timing problem", () => {
      expect(() => assertCanResolve(header({ resolution: "yes" }), 500))
        .to.throw(EconomicError)
        .with.property("message", "Answer already set");
    });

    it("only allows claims once resolved and returns the winner", () => {
      expect(() => assertCanClaim(header()))
        .to.throw(LifecycleError)
        .with.property("message", "Outcome has not been set yet");
      expect(assertCanClaim(header({ resolution: "no" }))).to.equal("no");
    });

    it("only allows expired withdrawals on unresolved markets past expiry", () => {
      expect(() => assertCanWithdrawExpired(header(), 300)).to.not.throw();
      expect(() => assertCanWithdrawExpired(header(), 299))
        .to.throw(LifecycleError)
        .with.property("message", "Cannot withdraw before expiry time");
      expect(() =>
        assertCanWithdrawExpired(header({ resolution: "yes" }), 400)
      )
        .to.throw(LifecycleError)
        .with.property("message", "Outcome has been set");
    });
  });
});
