import type { Direction, Tile } from "./core/types";

// Coordinates are board coordinates, never perspective ones
export type DomainEvent =
  | {
      kind: "TileMoved";
      value: number;
      from: { col: number; row: number };
      to: { col: number; row: number };
    }
  | {
      kind: "TilesMerged";
      value: number; // value of the resulting tile
      from: { col: number; row: number };
      to: { col: number; row: number };
    }
  | { kind: "Tilted"; direction: Direction; changed: boolean; scoreDelta: number }
  | { kind: "TileAdded"; tile: Tile; source: "caller" | "spawn" }
  | { kind: "BoardCleared" };
