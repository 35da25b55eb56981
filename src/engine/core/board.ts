import {
  type Board,
  type Tile,
  assertBoardSize,
  copyBoardCells,
  createBoardCells,
  createGridCoord,
  createTileValue,
  gridCoordAsNumber,
  idxSafe,
  tileValueAsNumber,
} from "./types";

export function createEmptyBoard(size: number): Board {
  assertBoardSize(size);
  return { cells: createBoardCells(size), size };
}

// Tiles are plain records; position is validated against a board only on placement
export function createTile(value: number, col: number, row: number): Tile {
  return {
    col: createGridCoord(col),
    row: createGridCoord(row),
    value: createTileValue(value),
  };
}

/**
 * Build a board from raw values listed top row first, the way a board reads
 * on screen. 0 marks an empty cell.
 */
export function boardFromRows(rows: ReadonlyArray<ReadonlyArray<number>>): Board {
  const size = rows.length;
  assertBoardSize(size);
  const cells = createBoardCells(size);

  rows.forEach((values, i) => {
    if (values.length !== size) {
      throw new Error(
        `Board must be square: row ${String(i)} has ${String(values.length)} values, expected ${String(size)}`,
      );
    }
    const row = size - 1 - i;
    values.forEach((value, col) => {
      if (value !== 0) {
        cells[row * size + col] = tileValueAsNumber(createTileValue(value));
      }
    });
  });

  return { cells, size };
}

// Inverse of boardFromRows
export function boardToRows(board: Board): Array<Array<number>> {
  const rows: Array<Array<number>> = [];
  for (let row = board.size - 1; row >= 0; row--) {
    const values: Array<number> = [];
    for (let col = 0; col < board.size; col++) {
      values.push(board.cells[row * board.size + col] ?? 0);
    }
    rows.push(values);
  }
  return rows;
}

// Return the tile at (col, row) or null; out-of-range coordinates throw
export function tileAt(board: Board, col: number, row: number): Tile | null {
  const value = board.cells[idxSafe(board, col, row)] ?? 0;
  if (value === 0) return null;
  return createTile(value, col, row);
}

export function isCellEmpty(board: Board, col: number, row: number): boolean {
  return board.cells[idxSafe(board, col, row)] === 0;
}

// Place a tile on an empty cell; occupied or out-of-range cells are rejected
export function addTile(board: Board, tile: Tile): Board {
  const col = gridCoordAsNumber(tile.col);
  const row = gridCoordAsNumber(tile.row);
  const i = idxSafe(board, col, row);
  if (board.cells[i] !== 0) {
    throw new Error(
      `Cell (${String(col)}, ${String(row)}) is already occupied`,
    );
  }
  const cells = copyBoardCells(board.cells);
  cells[i] = tileValueAsNumber(tile.value);
  return { ...board, cells };
}

export function clearBoard(board: Board): Board {
  return createEmptyBoard(board.size);
}

// All tiles in row-major order, bottom row first
export function listTiles(board: Board): Array<Tile> {
  const tiles: Array<Tile> = [];
  board.cells.forEach((value, i) => {
    if (value !== 0) {
      tiles.push(createTile(value, i % board.size, Math.floor(i / board.size)));
    }
  });
  return tiles;
}

export function emptyCells(board: Board): Array<{ col: number; row: number }> {
  const out: Array<{ col: number; row: number }> = [];
  board.cells.forEach((value, i) => {
    if (value === 0) {
      out.push({ col: i % board.size, row: Math.floor(i / board.size) });
    }
  });
  return out;
}

export function boardsEqual(a: Board, b: Board): boolean {
  if (a.size !== b.size) return false;
  for (let i = 0; i < a.cells.length; i++) {
    if (a.cells[i] !== b.cells[i]) return false;
  }
  return true;
}

export function sumTileValues(board: Board): number {
  return board.cells.reduce((acc, value) => acc + value, 0);
}
