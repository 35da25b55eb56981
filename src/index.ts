// Public entry point
export {
  DEFAULT_SETTINGS,
  parseSettings,
  resolveSettings,
  settingsFromEnv,
  type GameSettings,
} from "./app/settings";
export { init, step, stepN, type StepResult } from "./engine";
export { type Command } from "./engine/commands";
export {
  addTile,
  boardFromRows,
  boardToRows,
  boardsEqual,
  clearBoard,
  createEmptyBoard,
  createTile,
  listTiles,
  tileAt,
} from "./engine/core/board";
export {
  PerspectiveGrid,
  fromBoardCoords,
  toBoardCoords,
} from "./engine/core/perspective";
export { SequenceRng } from "./engine/core/rng/sequence";
export { spawnRandomTile } from "./engine/core/spawning";
export {
  DIRECTIONS,
  type Board,
  type Direction,
  type Tile,
} from "./engine/core/types";
export { type DomainEvent } from "./engine/events";
export {
  atLeastOneMoveExists,
  emptySpaceExists,
  isGameOver,
  maxTileExists,
} from "./engine/rules/game-over";
export { formatSnapshot } from "./engine/selectors/board-text";
export { tilt, type TiltResult } from "./engine/tilt";
export { createSeededRng, type EngineConfig, type EngineState } from "./engine/types";
export { GameSession, type SessionOptions } from "./state/session";
export {
  type GameListener,
  type GameSnapshot,
  type GameStatus,
  type Unsubscribe,
} from "./state/types";
