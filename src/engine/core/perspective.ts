import { MAX_TILE_VALUE } from "../../types/brands";

import {
  type BoardCells,
  type Direction,
  type Tile,
  createGridCoord,
  createTileValue,
  gridCoordAsNumber,
  tileValueAsNumber,
} from "./types";

export type Coord = readonly [col: number, row: number];

/**
 * Map a canonical coordinate (where `direction` points toward increasing
 * row) to board coordinates.
 */
export function toBoardCoords(
  col: number,
  row: number,
  direction: Direction,
  size: number,
): Coord {
  switch (direction) {
    case "up":
      return [col, row];
    case "down":
      return [size - 1 - col, size - 1 - row];
    case "right":
      return [row, size - 1 - col];
    case "left":
      return [size - 1 - row, col];
  }
}

// Inverse of toBoardCoords
export function fromBoardCoords(
  col: number,
  row: number,
  direction: Direction,
  size: number,
): Coord {
  switch (direction) {
    case "up":
      return [col, row];
    case "down":
      return [size - 1 - col, size - 1 - row];
    case "right":
      return [size - 1 - row, col];
    case "left":
      return [row, size - 1 - col];
  }
}

/**
 * Board access under a fixed perspective. Reads and writes go straight to
 * the backing cells; only coordinates are remapped. Tiles handed out carry
 * their real board position.
 */
export class PerspectiveGrid {
  constructor(
    private readonly cells: BoardCells,
    readonly size: number,
    readonly direction: Direction,
  ) {
    if (cells.length !== size * size) {
      throw new Error("Cell storage does not match grid size");
    }
  }

  private index(col: number, row: number): number {
    if (col < 0 || col >= this.size || row < 0 || row >= this.size) {
      throw new Error(
        `Cell (${String(col)}, ${String(row)}) is outside the grid`,
      );
    }
    const [c, r] = toBoardCoords(col, row, this.direction, this.size);
    return r * this.size + c;
  }

  tile(col: number, row: number): Tile | null {
    const value = this.cells[this.index(col, row)] ?? 0;
    if (value === 0) return null;
    const [c, r] = toBoardCoords(col, row, this.direction, this.size);
    return {
      col: createGridCoord(c),
      row: createGridCoord(r),
      value: createTileValue(value),
    };
  }

  /**
   * Move `tile` to (col, destRow) in this perspective. An empty destination
   * takes the tile as is; an equal-valued one absorbs it at double value.
   * Returns true iff a merge happened.
   */
  move(col: number, destRow: number, tile: Tile): boolean {
    const [fromCol, fromRow] = fromBoardCoords(
      gridCoordAsNumber(tile.col),
      gridCoordAsNumber(tile.row),
      this.direction,
      this.size,
    );
    const from = this.index(fromCol, fromRow);
    const to = this.index(col, destRow);
    const value = tileValueAsNumber(tile.value);

    if (this.cells[from] !== value) {
      throw new Error("Tile is not on the grid at its recorded position");
    }
    if (from === to) return false;

    const target = this.cells[to] ?? 0;
    if (target !== 0 && target !== value) {
      throw new Error(
        `Cannot move a ${String(value)} onto a ${String(target)}`,
      );
    }

    const next = target === 0 ? value : value * 2;
    if (next > MAX_TILE_VALUE) {
      throw new Error(`Cannot merge two ${String(value)} tiles`);
    }
    this.cells[from] = 0;
    this.cells[to] = next;
    return target !== 0;
  }
}
