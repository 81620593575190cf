import {
  EconomicError,
  LifecycleError,
  MarketValidationError,
} from "./errors";
import { LifecycleState, MarketHeader, Outcome } from "./types";

type Window = Pick<MarketHeader, "start_time" | "end_time" | "expiry_time">;

/**
 * Reject a window that is not strictly ordered or does not start in the future.
 * Runs before any market state exists.
 */
export function validateWindow(window: Window, now: number): void {
  const { start_time, end_time, expiry_time } = window;
  const fields: Array<[string, number]> = [
    ["start_time", start_time],
    ["end_time", end_time],
    ["expiry_time", expiry_time],
  ];
  for (const [field, value] of fields) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new MarketValidationError(`${field} must be a unix timestamp`);
    }
  }
  if (start_time <= now) {
    throw new MarketValidationError("Start time must be in the future");
  }
  if (start_time >= end_time) {
    throw new MarketValidationError("Start time must be before end time");
  }
  if (end_time >= expiry_time) {
    throw new MarketValidationError("End time must be before expiry time");
  }
}

export function lifecycleState(
  header: Pick<MarketHeader, "end_time" | "expiry_time" | "resolution">,
  now: number
): LifecycleState {
  if (header.resolution !== null) {
    return LifecycleState.RESOLVED;
  }
  if (now < header.end_time) {
    return LifecycleState.PREDICTING;
  }
  if (now < header.expiry_time) {
    return LifecycleState.AWAITING_RESOLUTION;
  }
  return LifecycleState.EXPIRED;
}

export function assertCanStake(header: MarketHeader, now: number): void {
  if (now < header.start_time || now >= header.end_time) {
    throw new LifecycleError("Prediction window is closed");
  }
}

export function assertCanResolve(header: MarketHeader, now: number): void {
  if (header.resolution !== null) {
    // Single resolution: reported before any timing problem
    throw new EconomicError("Answer already set");
  }
  if (now < header.end_time) {
    throw new LifecycleError("Cannot set answer before end time");
  }
  if (now >= header.expiry_time) {
    throw new LifecycleError("Cannot set answer after expiry time");
  }
}

/** Returns the winning outcome */
export function assertCanClaim(header: MarketHeader): Outcome {
  if (header.resolution === null) {
    throw new LifecycleError("Outcome has not been set yet");
  }
  return header.resolution;
}

export function assertCanWithdrawExpired(
  header: MarketHeader,
  now: number
): void {
  if (header.resolution !== null) {
    throw new LifecycleError("Outcome has been set");
  }
  if (now < header.expiry_time) {
    throw new LifecycleError("Cannot withdraw before expiry time");
  }
}
