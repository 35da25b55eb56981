/**
 * Interface for the random source behind tile spawning.
 * This allows us to have different RNG implementations for production and testing.
 */
export type TileRandomGenerator = {
  /**
   * Get the next float in [0, 1)
   * Returns the value and a new generator state (immutable pattern)
   */
  nextFloat(): {
    value: number;
    newRng: TileRandomGenerator;
  };
};
