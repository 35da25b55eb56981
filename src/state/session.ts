/**
 * GameSession: the stateful shell around the pure engine.
 *
 * Every mutation runs one engine step, swaps in the resulting state,
 * re-evaluates game-over immediately, and then notifies listeners. Nothing
 * is swapped in until the step has fully succeeded, so a rejected command
 * leaves the session untouched and listeners never see a half-applied tilt.
 */
import { resolveSettings } from "../app/settings";
import { step, init } from "../engine";
import {
  boardFromRows,
  boardToRows,
  boardsEqual,
  tileAt,
} from "../engine/core/board";
import { isDirection } from "../engine/core/types";
import { isGameOver } from "../engine/rules/game-over";
import { formatSnapshot } from "../engine/selectors/board-text";
import { debugLog } from "../utils/debug";

import { LifecycleService } from "./lifecycle.machine";

import type { GameSettings } from "../app/settings";
import type { Command } from "../engine/commands";
import type { Board, Direction, Tile } from "../engine/core/types";
import type { DomainEvent } from "../engine/events";
import type { EngineState } from "../engine/types";
import type { GameListener, GameSnapshot, Unsubscribe } from "./types";

export type SessionOptions = Partial<GameSettings> & {
  score?: number;
  maxScore?: number;
};

export class GameSession {
  private engine: EngineState;
  private readonly lifecycle: LifecycleService;
  private readonly listeners = new Set<GameListener>();

  constructor(options: SessionOptions = {}, board?: Board) {
    const { maxScore = 0, score = 0, ...settings } = options;
    if (!Number.isSafeInteger(maxScore) || maxScore < 0) {
      throw new Error(
        `maxScore must be a non-negative integer, got ${String(maxScore)}`,
      );
    }
    const cfg = resolveSettings(
      board === undefined ? settings : { ...settings, size: board.size },
    );
    this.engine = init(cfg, board, score).state;
    this.lifecycle = new LifecycleService(maxScore);
    this.evaluate();
  }

  /**
   * Session over a board given as raw values, top row first (0 = empty).
   */
  static fromRows(
    rows: ReadonlyArray<ReadonlyArray<number>>,
    options: SessionOptions = {},
  ): GameSession {
    return new GameSession(options, boardFromRows(rows));
  }

  size(): number {
    return this.engine.board.size;
  }

  tile(col: number, row: number): Tile | null {
    return tileAt(this.engine.board, col, row);
  }

  score(): number {
    return this.engine.score;
  }

  maxScore(): number {
    return this.lifecycle.maxScore();
  }

  /**
   * True iff the winning tile is on the board or no tilt can change it.
   * Always current: game-over is re-evaluated after every mutation.
   */
  gameOver(): boolean {
    return this.lifecycle.status() === "over";
  }

  /** Tilt toward `direction`. Returns true iff the board changed. */
  tilt(direction: Direction): boolean {
    if (!isDirection(direction)) {
      throw new Error(`Unknown direction: ${String(direction)}`);
    }
    const changed = this.commit({ direction, kind: "Tilt" });
    debugLog("tilt", `${direction} -> ${changed ? "changed" : "no-op"}`, {
      score: this.engine.score,
    });
    return changed;
  }

  /** Place `tile`; its cell must be on the board and empty. */
  addTile(tile: Tile): void {
    this.commit({ kind: "AddTile", tile });
  }

  /**
   * Place a random 2 or 4 on a random empty cell.
   * Returns the placed tile, or null when the board is full.
   */
  spawnTile(): Tile | null {
    const r = step(this.engine, { kind: "SpawnTile" });
    if (!r.changed) {
      debugLog("spawn", "board full, nothing spawned");
      return null;
    }
    const added = r.events.find(
      (e): e is Extract<DomainEvent, { kind: "TileAdded" }> =>
        e.kind === "TileAdded",
    );
    if (added === undefined) {
      throw new Error("Spawn produced no TileAdded event");
    }
    this.apply(r.state, r.events);
    debugLog("spawn", "spawned", added.tile);
    return added.tile;
  }

  /** Empty the board and reset the score; maxScore is kept. */
  clear(): void {
    const r = step(this.engine, { kind: "Clear" });
    this.lifecycle.send({ type: "RESET" });
    this.apply(r.state, r.events);
  }

  subscribe(listener: GameListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): GameSnapshot {
    return {
      board: this.engine.board,
      maxScore: this.lifecycle.maxScore(),
      score: this.engine.score,
      status: this.lifecycle.status(),
    };
  }

  /** Board values, top row first. */
  toRows(): Array<Array<number>> {
    return boardToRows(this.engine.board);
  }

  // Structural comparison of board, score, maxScore and status
  equals(other: GameSession): boolean {
    return (
      boardsEqual(this.engine.board, other.engine.board) &&
      this.score() === other.score() &&
      this.maxScore() === other.maxScore() &&
      this.gameOver() === other.gameOver()
    );
  }

  toString(): string {
    return formatSnapshot(this.snapshot());
  }

  private commit(cmd: Command): boolean {
    const r = step(this.engine, cmd);
    if (!r.changed) return false;
    this.apply(r.state, r.events);
    return true;
  }

  private apply(next: EngineState, events: ReadonlyArray<DomainEvent>): void {
    this.engine = next;
    this.evaluate();
    const snapshot = this.snapshot();
    // A throwing listener is logged and skipped; the mutation stays committed
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot, events);
      } catch (error) {
        debugLog("listener", "listener threw", error);
      }
    }
  }

  private evaluate(): void {
    this.lifecycle.send({
      over: isGameOver(this.engine.board, this.engine.cfg.maxTileValue),
      score: this.engine.score,
      type: "EVALUATE",
    });
  }
}
