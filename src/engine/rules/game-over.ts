import { type Board, DEFAULT_MAX_TILE_VALUE } from "../core/types";

function valueAt(board: Board, col: number, row: number): number {
  return board.cells[row * board.size + col] ?? 0;
}

// True if at least one cell holds no tile
export function emptySpaceExists(board: Board): boolean {
  return board.cells.some((value) => value === 0);
}

// True if any tile has reached the winning value
export function maxTileExists(
  board: Board,
  maxValue: number = DEFAULT_MAX_TILE_VALUE,
): boolean {
  return board.cells.some((value) => value === maxValue);
}

/**
 * True if some tilt could still change the board: there is an empty cell,
 * or two orthogonally adjacent tiles share a value.
 */
export function atLeastOneMoveExists(board: Board): boolean {
  if (emptySpaceExists(board)) return true;

  const n = board.size;
  for (let col = 0; col < n; col++) {
    for (let row = 0; row < n; row++) {
      const value = valueAt(board, col, row);
      // Right and up neighbours cover every adjacent pair once
      if (col + 1 < n && valueAt(board, col + 1, row) === value) return true;
      if (row + 1 < n && valueAt(board, col, row + 1) === value) return true;
    }
  }
  return false;
}

export function isGameOver(
  board: Board,
  maxValue: number = DEFAULT_MAX_TILE_VALUE,
): boolean {
  return maxTileExists(board, maxValue) || !atLeastOneMoveExists(board);
}
