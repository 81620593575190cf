import { Clock } from "../engine/types";

/// Unix seconds from the host clock
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
