import { sumTileValues } from "./core/board";
import {
  atLeastOneMoveExists,
  isGameOver,
  maxTileExists,
} from "./rules/game-over";

import type { EngineState } from "./types";

export const selectScore = (s: EngineState): number => s.score;
export const selectSize = (s: EngineState): number => s.board.size;
export const selectTileSum = (s: EngineState): number =>
  sumTileValues(s.board);

// Terminal-state helpers; the winning value comes from the engine config
export const selectHasWinningTile = (s: EngineState): boolean =>
  maxTileExists(s.board, s.cfg.maxTileValue);
export const selectCanMove = (s: EngineState): boolean =>
  atLeastOneMoveExists(s.board);
export const selectIsGameOver = (s: EngineState): boolean =>
  isGameOver(s.board, s.cfg.maxTileValue);
