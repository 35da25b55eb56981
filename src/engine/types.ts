import { type TileRandomGenerator } from "./core/rng/interface";
import { createSeededRng } from "./core/rng/seeded";
import { createEmptyBoard } from "./core/board";
import { type Board } from "./core/types";

export * from "./core/types";

export { type TileRandomGenerator } from "./core/rng/interface";
export { createSeededRng } from "./core/rng/seeded";

export type EngineConfig = Readonly<{
  size: number;
  maxTileValue: number;
  fourProbability: number;
  seed: string;
}>;

export type EngineState = {
  readonly cfg: EngineConfig;
  readonly board: Board;
  readonly score: number;
  readonly rng: TileRandomGenerator;
};

export function mkInitialState(
  cfg: EngineConfig,
  board: Board = createEmptyBoard(cfg.size),
  score = 0,
): EngineState {
  if (board.size !== cfg.size) {
    throw new Error(
      `Board size ${String(board.size)} does not match configured size ${String(cfg.size)}`,
    );
  }
  if (!Number.isSafeInteger(score) || score < 0) {
    throw new Error(`Score must be a non-negative integer, got ${String(score)}`);
  }
  return {
    board,
    cfg,
    rng: createSeededRng(cfg.seed),
    score,
  };
}
