// Game settings: defaults, validation, and tolerant parsing of untrusted input
// (parsed JSON or environment variables)

import { DEFAULT_FOUR_PROBABILITY } from "../engine/core/spawning";
import {
  DEFAULT_BOARD_SIZE,
  DEFAULT_MAX_TILE_VALUE,
} from "../engine/core/types";
import { isPowerOfTwo } from "../types/brands";

import type { EngineConfig } from "../engine/types";

export type GameSettings = EngineConfig;

export const MIN_BOARD_SIZE = 2 as const;
export const MAX_BOARD_SIZE = 16 as const;

export const DEFAULT_SETTINGS: GameSettings = {
  fourProbability: DEFAULT_FOUR_PROBABILITY,
  maxTileValue: DEFAULT_MAX_TILE_VALUE,
  seed: "default",
  size: DEFAULT_BOARD_SIZE,
};

const ENV_KEYS = {
  fourProbability: "TILTBOARD_FOUR_PROBABILITY",
  maxTileValue: "TILTBOARD_MAX_TILE",
  seed: "TILTBOARD_SEED",
  size: "TILTBOARD_SIZE",
} as const;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isValidSize(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_BOARD_SIZE && n <= MAX_BOARD_SIZE;
}

function isValidMaxTile(n: number): boolean {
  return isPowerOfTwo(n) && n >= 4;
}

function isValidProbability(n: number): boolean {
  return n >= 0 && n <= 1;
}

function isValidSeed(s: string): boolean {
  return s.length > 0;
}

// Fields set to undefined fall back to their defaults
function withDefaults(partial: Partial<GameSettings>): GameSettings {
  return {
    fourProbability: partial.fourProbability ?? DEFAULT_SETTINGS.fourProbability,
    maxTileValue: partial.maxTileValue ?? DEFAULT_SETTINGS.maxTileValue,
    seed: partial.seed ?? DEFAULT_SETTINGS.seed,
    size: partial.size ?? DEFAULT_SETTINGS.size,
  };
}

/**
 * Fill defaults and validate. Explicitly passed values that are out of
 * range are a caller error.
 */
export function resolveSettings(
  partial: Partial<GameSettings> = {},
): GameSettings {
  const s = withDefaults(partial);
  if (!isValidSize(s.size)) {
    throw new Error(
      `size must be an integer in [${String(MIN_BOARD_SIZE)}, ${String(MAX_BOARD_SIZE)}], got ${String(s.size)}`,
    );
  }
  if (!isValidMaxTile(s.maxTileValue)) {
    throw new Error(
      `maxTileValue must be a power of two >= 4, got ${String(s.maxTileValue)}`,
    );
  }
  if (!isValidProbability(s.fourProbability)) {
    throw new Error(
      `fourProbability must be in [0, 1], got ${String(s.fourProbability)}`,
    );
  }
  if (!isValidSeed(s.seed)) {
    throw new Error("seed must be a non-empty string");
  }
  return s;
}

/**
 * Pull the valid fields out of an unknown value (typically parsed JSON).
 * Invalid or unknown fields are dropped; never throws.
 */
export function parseSettings(raw: unknown): Partial<GameSettings> {
  if (!isRecord(raw)) return {};
  const out: {
    -readonly [K in keyof GameSettings]?: GameSettings[K];
  } = {};

  const size = raw["size"];
  if (isNumber(size) && isValidSize(size)) out.size = size;

  const maxTileValue = raw["maxTileValue"];
  if (isNumber(maxTileValue) && isValidMaxTile(maxTileValue)) {
    out.maxTileValue = maxTileValue;
  }

  const fourProbability = raw["fourProbability"];
  if (isNumber(fourProbability) && isValidProbability(fourProbability)) {
    out.fourProbability = fourProbability;
  }

  const seed = raw["seed"];
  if (isString(seed) && isValidSeed(seed)) out.seed = seed;

  return out;
}

function readEnvNumber(
  env: Readonly<Record<string, string | undefined>>,
  key: string,
): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Read settings from TILTBOARD_* environment variables.
 * Same tolerance as parseSettings: bad values are ignored.
 */
export function settingsFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<GameSettings> {
  return parseSettings({
    fourProbability: readEnvNumber(env, ENV_KEYS.fourProbability),
    maxTileValue: readEnvNumber(env, ENV_KEYS.maxTileValue),
    seed: env[ENV_KEYS.seed],
    size: readEnvNumber(env, ENV_KEYS.size),
  });
}
