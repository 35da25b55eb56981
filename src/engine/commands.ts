import type { Direction, Tile } from "./core/types";

export type Command =
  | { kind: "Tilt"; direction: Direction }
  | { kind: "AddTile"; tile: Tile }
  | { kind: "SpawnTile" }
  | { kind: "Clear" };
