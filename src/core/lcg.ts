/**
 * 64-bit linear congruential generator driving the jump hash iteration
 *
 * state' = state * LCG_MULTIPLIER + LCG_INCREMENT (mod 2^64)
 */

// Knuth's MMIX multiplier, the constant used by the jump hash paper
export const LCG_MULTIPLIER = 2862933555777941757n;
export const LCG_INCREMENT = 1n;

export const U64_MASK = 0xffffffffffffffffn;

/**
 * Advance the generator by one step.
 * The returned value is both the new state and the next sample.
 */
export function nextState(state: bigint): bigint {
  return BigInt.asUintN(64, state * LCG_MULTIPLIER + LCG_INCREMENT);
}

/**
 * Infinite stream of samples seeded with `seed`; the first value yielded
 * is `nextState(seed)`.
 */
export function* lcgStream(seed: bigint): Generator<bigint, never, undefined> {
  let state = BigInt.asUintN(64, seed);
  for (;;) {
    state = nextState(state);
    yield state;
  }
}
