import seedrandom from 'seedrandom';

/**
 * Minimal uniform sampling surface every genetic operator draws from.
 *
 * Operators depend on this interface rather than on {@link Random} so tests
 * can hand in scripted sources and users can plug their own generator.
 */
export interface RandomSource {
  /** Uniform real in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max] (both inclusive). */
  int(min: number, max: number): number;
  /** Uniform real between `min` and `max`. */
  real(min: number, max: number): number;
}

/** Opaque generator state produced by {@link Random.snapshot}. */
export type RandomState = seedrandom.State.Arc4;

/**
 * Seedable pseudo-random generator backed by `seedrandom` (ARC4).
 *
 * A process-wide instance is available through {@link Random.shared}; it is
 * created lazily on first access and auto-seeded from the environment. Every
 * engine uses it unless given its own instance or seed, so several engines
 * running side by side interleave their draws on the same stream. JavaScript
 * runs them on one thread, which keeps each draw whole; the interleaving order
 * is not defined.
 *
 * @example
 * const rng = new Random('experiment-1');
 * const digit = rng.int(0, 9);
 * const snap = rng.snapshot();
 * rng.real(0, 1);
 * rng.restore(snap); // replay from here
 */
export class Random implements RandomSource {
  private static _shared?: Random;

  private _prng: seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

  /**
   * @param seed Optional seed. Omit to auto-seed from the environment.
   */
  constructor(seed?: string | number) {
    this._prng = seedrandom(seed === undefined ? undefined : String(seed), {
      state: true,
    });
  }

  /** Lazily created process-wide generator. */
  static get shared(): Random {
    if (!Random._shared) Random._shared = new Random();
    return Random._shared;
  }

  next(): number {
    return this._prng();
  }

  int(min: number, max: number): number {
    const lo = Math.ceil(Math.min(min, max));
    const hi = Math.floor(Math.max(min, max));
    return lo + Math.floor(this._prng() * (hi - lo + 1));
  }

  real(min: number, max: number): number {
    return min + this._prng() * (max - min);
  }

  /** Capture the generator state for later replay. */
  snapshot(): RandomState {
    return this._prng.state();
  }

  /**
   * Restore a state produced by {@link snapshot}. Subsequent draws repeat the
   * sequence observed after the snapshot was taken.
   */
  restore(state: RandomState): void {
    this._prng = seedrandom('', { state });
  }
}

/**
 * Resolve the `random` engine option into a usable source.
 *
 * @param random A ready source, a seed, or nothing for {@link Random.shared}.
 */
export function resolveRandom(random?: RandomSource | string | number): RandomSource {
  if (random === undefined) return Random.shared;
  if (typeof random === 'string' || typeof random === 'number')
    return new Random(random);
  return random;
}
