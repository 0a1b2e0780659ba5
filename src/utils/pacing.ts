import { setTimeout as delay } from 'timers/promises';

export interface Random {
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  /** Uniform float in [min, max). */
  float(min: number, max: number): number;
}

export const mathRandom: Random = {
  int: (min, max) => min + Math.floor(Math.random() * (max - min + 1)),
  float: (min, max) => min + Math.random() * (max - min),
};

export interface PacingPolicy {
  minMs: number;
  maxMs: number;
}

export interface Pacer {
  pause(): Promise<void>;
}

export const noPacing: Pacer = {
  pause: async () => {},
};

export function createPacer(
  policy: PacingPolicy,
  random: Random = mathRandom,
  sleep: (ms: number) => Promise<unknown> = delay,
): Pacer {
  if (policy.maxMs <= 0) return noPacing;
  return {
    pause: async () => {
      await sleep(random.float(policy.minMs, policy.maxMs));
    },
  };
}
