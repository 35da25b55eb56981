import { addTile, createTile, emptyCells } from "./board";

import type { TileRandomGenerator } from "./rng/interface";
import type { Board, Tile } from "./types";

export const DEFAULT_FOUR_PROBABILITY = 0.1 as const;

/**
 * Pick the value of a freshly spawned tile from one float in [0, 1).
 */
export function spawnValue(
  roll: number,
  fourProbability: number = DEFAULT_FOUR_PROBABILITY,
): 2 | 4 {
  return roll < fourProbability ? 4 : 2;
}

/**
 * Place a random tile on a random empty cell. Consumes two floats from the
 * generator: the first picks the cell, the second the value.
 * Returns null (and leaves the generator untouched) when the board is full.
 */
export function spawnRandomTile(
  board: Board,
  rng: TileRandomGenerator,
  fourProbability: number = DEFAULT_FOUR_PROBABILITY,
): { board: Board; tile: Tile; rng: TileRandomGenerator } | null {
  const empties = emptyCells(board);
  if (empties.length === 0) return null;

  const cellRoll = rng.nextFloat();
  const pick = Math.min(
    empties.length - 1,
    Math.floor(cellRoll.value * empties.length),
  );
  const cell = empties[pick];
  if (cell === undefined) {
    throw new Error("Spawn cell selection out of range");
  }

  const valueRoll = cellRoll.newRng.nextFloat();
  const tile = createTile(
    spawnValue(valueRoll.value, fourProbability),
    cell.col,
    cell.row,
  );

  return { board: addTile(board, tile), rng: valueRoll.newRng, tile };
}
