import seedrandom from "seedrandom";

/**
 * Shared utility for random number generation.
 * Every random decision goes through one seedable PRNG so runs can be replayed.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom();

  /**
   * Reseeds the generator. Without a seed it falls back to an entropy seed.
   */
  public static seed(seed?: string | number): void {
    RandomUtils.rng = seed === undefined ? seedrandom() : seedrandom(String(seed));
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return RandomUtils.rng();
  }

  /**
   * Returns a random floating-point number between min (inclusive) and max (exclusive).
   */
  public static floatRange(min: number, max: number): number {
    return min + RandomUtils.float() * (max - min);
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public static intRange(min: number, max: number): number {
    return Math.floor(RandomUtils.float() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public static chance(probability: number): boolean {
    return RandomUtils.float() < probability;
  }

  public static element<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(RandomUtils.float() * array.length)];
  }

  /**
   * Shuffles an array in place.
   */
  public static shuffle<T>(array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
      const j = Math.floor(RandomUtils.float() * (i + 1));
      [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
  }
}
