import { addTile, clearBoard } from "./core/board";
import { spawnRandomTile } from "./core/spawning";
import { tilt } from "./tilt";
import { mkInitialState } from "./types";

import type { Command } from "./commands";
import type { Board } from "./core/types";
import type { DomainEvent } from "./events";
import type { EngineConfig, EngineState } from "./types";

export type StepResult = {
  state: EngineState;
  events: ReadonlyArray<DomainEvent>;
  changed: boolean;
};

/**
 * Initialize engine state, optionally from an existing board and score.
 */
export function init(
  cfg: EngineConfig,
  board?: Board,
  score = 0,
): { state: EngineState; events: ReadonlyArray<DomainEvent> } {
  return { events: [], state: mkInitialState(cfg, board, score) };
}

/**
 * Apply one command. Pure: returns a new state and never mutates the input.
 * Contract violations throw before anything is produced.
 */
export function step(state: EngineState, cmd: Command): StepResult {
  switch (cmd.kind) {
    case "Tilt": {
      const r = tilt(state.board, cmd.direction);
      const events: Array<DomainEvent> = [
        ...r.events,
        {
          changed: r.changed,
          direction: cmd.direction,
          kind: "Tilted",
          scoreDelta: r.scoreDelta,
        },
      ];
      if (!r.changed) return { changed: false, events, state };
      return {
        changed: true,
        events,
        state: { ...state, board: r.board, score: state.score + r.scoreDelta },
      };
    }
    case "AddTile": {
      const board = addTile(state.board, cmd.tile);
      return {
        changed: true,
        events: [{ kind: "TileAdded", source: "caller", tile: cmd.tile }],
        state: { ...state, board },
      };
    }
    case "SpawnTile": {
      const spawned = spawnRandomTile(
        state.board,
        state.rng,
        state.cfg.fourProbability,
      );
      if (spawned === null) return { changed: false, events: [], state };
      return {
        changed: true,
        events: [{ kind: "TileAdded", source: "spawn", tile: spawned.tile }],
        state: { ...state, board: spawned.board, rng: spawned.rng },
      };
    }
    case "Clear":
      return {
        changed: true,
        events: [{ kind: "BoardCleared" }],
        state: { ...state, board: clearBoard(state.board), score: 0 },
      };
  }
}

/**
 * Apply a sequence of commands in order.
 */
export function stepN(
  state: EngineState,
  cmds: ReadonlyArray<Command>,
): StepResult {
  let s = state;
  let changed = false;
  const all: Array<DomainEvent> = [];
  for (const cmd of cmds) {
    const r = step(s, cmd);
    s = r.state;
    changed = changed || r.changed;
    all.push(...r.events);
  }
  return { changed, events: all, state: s };
}
