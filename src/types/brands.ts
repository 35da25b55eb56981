// Branded primitive types for type safety and domain modeling

// Grid coordinates - for board positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };

// Tile values - powers of two, 2 and up (0 is "no tile" and never branded)
declare const TileValueBrand: unique symbol;
export type TileValue = number & { readonly [TileValueBrand]: true };

// RNG seed - for the random tile generator
declare const SeedBrand: unique symbol;
export type Seed = string & { readonly [SeedBrand]: true };

// GridCoord constructors and guards
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

export function isGridCoord(n: unknown): n is GridCoord {
  return typeof n === "number" && Number.isInteger(n);
}

export function assertGridCoord(n: unknown): asserts n is GridCoord {
  if (!isGridCoord(n)) throw new Error("Not a valid GridCoord");
}

// TileValue constructors and guards
export function isPowerOfTwo(n: number): boolean {
  if (!Number.isSafeInteger(n) || n < 1) return false;
  let m = n;
  while (m % 2 === 0) m /= 2;
  return m === 1;
}

// Board cells are 32-bit unsigned
export const MAX_TILE_VALUE = 2 ** 31;

export function createTileValue(value: number): TileValue {
  if (!isPowerOfTwo(value) || value < 2) {
    throw new Error(
      `TileValue must be a power of two >= 2, got ${String(value)}`,
    );
  }
  if (value > MAX_TILE_VALUE) {
    throw new Error(
      `TileValue must not exceed ${String(MAX_TILE_VALUE)}, got ${String(value)}`,
    );
  }
  return value as TileValue;
}

export function isTileValue(n: unknown): n is TileValue {
  return (
    typeof n === "number" && isPowerOfTwo(n) && n >= 2 && n <= MAX_TILE_VALUE
  );
}

export function assertTileValue(n: unknown): asserts n is TileValue {
  if (!isTileValue(n)) throw new Error("Not a valid TileValue");
}

// Seed constructors and guards
export function createSeed(value: string): Seed {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error("Seed must be a non-empty string");
  }
  return value as Seed;
}

export function isSeed(s: unknown): s is Seed {
  return typeof s === "string" && s.length > 0;
}

export function assertSeed(s: unknown): asserts s is Seed {
  if (!isSeed(s)) throw new Error("Not a valid Seed");
}

// Conversion helpers for interop at boundaries
export const gridCoordAsNumber = (g: GridCoord): number => g as number;
export const tileValueAsNumber = (v: TileValue): number => v as number;
export const seedAsString = (s: Seed): string => s as string;
