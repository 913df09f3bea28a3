import seedrandom from 'seedrandom';
import { config, type GridwalkConfig } from '../../src/config';

/**
 * Random source replaying `values` in order; throws once exhausted so a test
 * notices when the code under test draws more than expected.
 */
export function scriptedRng(values: readonly number[]): () => number {
  let i = 0;
  return () => {
    if (i >= values.length) {
      throw new Error(`scripted rng exhausted after ${values.length} draws`);
    }
    return values[i++];
  };
}

/** Independent seeded generator (seedrandom's ARC4) for statistical tests. */
export function seededRng(seed: string): () => number {
  const prng = seedrandom(seed);
  return () => prng();
}

/**
 * Apply config overrides for the duration of `fn`, restoring the previous values after.
 */
export function withConfig<T>(overrides: Partial<GridwalkConfig>, fn: () => T): T {
  const previous: GridwalkConfig = { ...config };
  Object.assign(config, overrides);
  try {
    return fn();
  } finally {
    Object.assign(config, previous);
    // the only optional key; drop it again if the override introduced it
    if (!('maxResampleAttempts' in previous)) delete config.maxResampleAttempts;
  }
}
