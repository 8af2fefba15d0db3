/**
 * Random helpers usable with any `() => number` generator in [0, 1).
 */

/**
 * Injected random source.
 *
 * Every algorithm that needs randomness takes one of these explicitly;
 * nothing in the maze code reads `Math.random` or a module-level RNG.
 */
export interface RandomSource {
  /** Next value in [0, 1). */
  next(): number;
  /** Integer in [min, max], both inclusive. */
  range(min: number, max: number): number;
  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  shuffle<T>(array: readonly T[]): T[];
  probability(chance: number): boolean;
}

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Pick one element uniformly. Returns undefined for an empty array.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array; the input is left untouched.
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const temp = result[i] as T;
    result[i] = result[j] as T;
    result[j] = temp;
  }
  return result;
}

export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}

/**
 * DJB2 hash of a string to an unsigned 32-bit seed.
 *
 * @example
 * ```typescript
 * const rng = new SeededRandom(seedFromString("crypt-of-ash"));
 * ```
 */
export function seedFromString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}
