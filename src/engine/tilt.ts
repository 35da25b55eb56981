import {
  type MoveTrace,
  createMoveTrace,
  markMerged,
  wasMerged,
} from "./core/move-trace";
import { PerspectiveGrid, toBoardCoords } from "./core/perspective";
import {
  type Board,
  type Direction,
  type TileValue,
  copyBoardCells,
  tileValueAsNumber,
} from "./core/types";

import type { DomainEvent } from "./events";

export type TiltResult = Readonly<{
  board: Board;
  changed: boolean;
  scoreDelta: number;
  events: ReadonlyArray<DomainEvent>;
}>;

/**
 * Row a tile at (col, row) ends up in when sliding toward increasing row.
 * Only the first occupied cell above matters: an equal, not-yet-merged
 * value is the destination, anything else stops the tile just below it.
 */
export function findDestinationRow(
  grid: PerspectiveGrid,
  trace: MoveTrace,
  col: number,
  row: number,
  value: TileValue,
): number {
  let dest = row;
  for (let r = row + 1; r < grid.size; r++) {
    dest = r;
    const above = grid.tile(col, r);
    if (above === null) continue;
    if (above.value !== value || wasMerged(trace, col, r)) {
      dest = r - 1;
    }
    break;
  }
  return dest;
}

/**
 * Tilt the whole board toward `direction`.
 *
 * The slide/merge itself is written for "up" only. Every other direction
 * runs the same loop through a PerspectiveGrid that remaps coordinates, so
 * no orientation state outlives the call. Columns are scanned top-down:
 * the leading tiles settle first and trailing tiles see the settled stack,
 * which is what makes three equal tiles merge only the leading pair.
 *
 * Pure: the input board is left untouched.
 */
export function tilt(board: Board, direction: Direction): TiltResult {
  const cells = copyBoardCells(board.cells);
  const grid = new PerspectiveGrid(cells, board.size, direction);
  const trace = createMoveTrace(board.size);

  const events: Array<DomainEvent> = [];
  let changed = false;
  let scoreDelta = 0;

  for (let col = 0; col < grid.size; col++) {
    for (let row = grid.size - 1; row >= 0; row--) {
      const tile = grid.tile(col, row);
      if (tile === null) continue;

      const dest = findDestinationRow(grid, trace, col, row, tile.value);
      if (dest === row) continue;

      changed = true;
      const merged = grid.move(col, dest, tile);
      const [toCol, toRow] = toBoardCoords(col, dest, direction, grid.size);
      const from = { col: tile.col, row: tile.row };
      const to = { col: toCol, row: toRow };

      if (merged) {
        markMerged(trace, col, dest);
        const value = tileValueAsNumber(tile.value) * 2;
        scoreDelta += value;
        events.push({ from, kind: "TilesMerged", to, value });
      } else {
        events.push({
          from,
          kind: "TileMoved",
          to,
          value: tileValueAsNumber(tile.value),
        });
      }
    }
  }

  return {
    board: changed ? { cells, size: board.size } : board,
    changed,
    events,
    scoreDelta,
  };
}
