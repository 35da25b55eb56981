import {
  type GridCoord,
  type TileValue,
  createGridCoord,
  gridCoordAsNumber,
} from "../../types/brands";

export {
  type GridCoord,
  type TileValue,
  createGridCoord,
  createTileValue,
  gridCoordAsNumber,
  tileValueAsNumber,
} from "../../types/brands";

export const DEFAULT_BOARD_SIZE = 4 as const;
export const DEFAULT_MAX_TILE_VALUE = 2048 as const;

export const DIRECTIONS = ["up", "down", "left", "right"] as const;
export type Direction = (typeof DIRECTIONS)[number];

export function isDirection(u: unknown): u is Direction {
  return typeof u === "string" && (DIRECTIONS as ReadonlyArray<string>).includes(u);
}

// Row-major cell storage; 0 = empty, otherwise the tile's value
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint32Array & { readonly [BoardCellsBrand]: true };

export function createBoardCells(size: number): BoardCells {
  return new Uint32Array(size * size) as BoardCells;
}

export function copyBoardCells(cells: BoardCells): BoardCells {
  return new Uint32Array(cells) as BoardCells;
}

// (0, 0) is the lower-left cell; col grows rightward, row grows upward
export type Board = {
  readonly size: number;
  readonly cells: BoardCells; // exactly size*size cells
};

export type Tile = {
  readonly value: TileValue;
  readonly col: GridCoord;
  readonly row: GridCoord;
};

export function idx(board: Board, col: GridCoord, row: GridCoord): number {
  return gridCoordAsNumber(row) * board.size + gridCoordAsNumber(col);
}

export function isInBounds(board: Board, col: number, row: number): boolean {
  return col >= 0 && col < board.size && row >= 0 && row < board.size;
}

// Safe indexer with bounds checking
export function idxSafe(board: Board, col: number, row: number): number {
  if (!isInBounds(board, col, row)) {
    throw new Error(
      `Cell (${String(col)}, ${String(row)}) is outside a ${String(board.size)}x${String(board.size)} board`,
    );
  }
  return idx(board, createGridCoord(col), createGridCoord(row));
}

export function assertBoardSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(
      `Board size must be a positive integer, got ${String(size)}`,
    );
  }
}
