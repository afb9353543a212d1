import type { Clock } from "./types.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(ms, 0)));
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};
