import { randomInt } from 'crypto';

/**
 * Deterministic pseudo‑random number generation (PRNG) for {@link OccupancySimulator}.
 *
 * Every simulator owns one generator instance, so runs never share hidden global state
 * and a fixed seed reproduces a run draw for draw.
 *
 * Implementation notes:
 *  - 32‑bit Weyl sequence step followed by two rounds of xorshift / multiply mixing.
 *  - Not cryptographically secure.
 *  - Produces floating point numbers in [0,1) with 2^32 discrete possible states.
 *
 * @module simulator.deterministic
 */

/** Shape of an RNG snapshot object. */
export interface RNGSnapshot {
  /** Number of values drawn since seeding. */
  draws: number;
  /** Raw 32‑bit state word. */
  state: number;
}

export class DeterministicRandom {
  private _state: number;
  private _draws = 0;

  /** @param seed - Any finite number; only its lower 32 bits are used. */
  constructor(seed: number) {
    this._state = seed >>> 0;
  }

  /**
   * Advance the generator and return the next value in [0,1).
   *
   * Arrow property so the method can be handed around as a plain `() => number`.
   */
  next = (): number => {
    // Weyl increment (odd constant) with uint32 wraparound.
    this._state = (this._state + 0x6d2b79f5) >>> 0;
    this._draws++;
    let r = Math.imul(this._state ^ (this._state >>> 15), 1 | this._state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 2^32
  };

  /** Capture the current state word & draw count. */
  snapshot(): RNGSnapshot {
    return { draws: this._draws, state: this._state };
  }

  /** Resume exactly at a state captured by {@link snapshot}. */
  restore(snapshot: RNGSnapshot): void {
    this._state = snapshot.state >>> 0;
    this._draws = snapshot.draws;
  }
}

/**
 * Fresh 32‑bit seed from the operating system's entropy pool. Never returns 0.
 */
export function entropySeed(): number {
  return randomInt(1, 0x100000000);
}

/**
 * Validate a user supplied seed. Accepts any non‑negative safe integer; the generator
 * keeps its lower 32 bits.
 */
export function isValidSeed(seed: unknown): seed is number {
  return typeof seed === 'number' && Number.isSafeInteger(seed) && seed >= 0;
}
