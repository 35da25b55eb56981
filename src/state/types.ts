// Session-level state shared with observers
import type { Board } from "../engine/core/types";
import type { DomainEvent } from "../engine/events";
import type { GameStatus } from "./lifecycle.machine";

export type { GameStatus } from "./lifecycle.machine";

export type GameSnapshot = Readonly<{
  board: Board;
  score: number;
  maxScore: number;
  status: GameStatus;
}>;

export const isOver = (s: GameSnapshot): boolean => s.status === "over";

/**
 * Observer callback, invoked synchronously after each committed mutation
 * (a tilt that changed something, clear, addTile, a successful spawn).
 * Return values are ignored; a thrown error is logged and the remaining
 * listeners still run.
 */
export type GameListener = (
  snapshot: GameSnapshot,
  events: ReadonlyArray<DomainEvent>,
) => void;

export type Unsubscribe = () => void;
