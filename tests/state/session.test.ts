import { createTile } from "@/engine/core/board";
import { formatSnapshot } from "@/engine/selectors/board-text";
import { GameSession } from "@/state/session";

import type { Direction } from "@/engine/core/types";
import type { GameListener } from "@/state/types";

import { assertDefined, findEvents } from "../test-helpers";

describe("GameSession", () => {
  describe("construction", () => {
    test("defaults to an empty 4x4 board", () => {
      const session = new GameSession();
      expect(session.size()).toBe(4);
      expect(session.score()).toBe(0);
      expect(session.maxScore()).toBe(0);
      expect(session.gameOver()).toBe(false);
      expect(session.toRows()).toEqual([
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
    });

    test("fromRows takes its size from the rows", () => {
      const session = GameSession.fromRows(
        [
          [0, 0, 4],
          [0, 0, 0],
          [2, 0, 0],
        ],
        { size: 8 },
      );
      expect(session.size()).toBe(3);
      expect(session.tile(0, 0)).toEqual({ col: 0, row: 0, value: 2 });
      expect(session.tile(2, 2)).toEqual({ col: 2, row: 2, value: 4 });
      expect(session.tile(1, 1)).toBeNull();
    });

    test("undefined options fall back to the defaults", () => {
      const session = new GameSession({ seed: undefined, size: undefined });
      expect(session.size()).toBe(4);
      expect(session.equals(new GameSession({ seed: "default" }))).toBe(true);
    });

    test("rejects invalid sizes and scores", () => {
      expect(() => GameSession.fromRows([[2]])).toThrow(
        "size must be an integer in [2, 16], got 1",
      );
      expect(() => new GameSession({ maxScore: -1 })).toThrow(
        "maxScore must be a non-negative integer, got -1",
      );
      expect(() => new GameSession({ score: 1.5 })).toThrow(
        "Score must be a non-negative integer, got 1.5",
      );
    });

    test("a board holding the winning tile is over immediately", () => {
      const session = GameSession.fromRows(
        [
          [0, 0, 0, 0],
          [0, 2048, 0, 0],
          [0, 0, 0, 0],
          [0, 0, 0, 0],
        ],
        { score: 100 },
      );
      expect(session.gameOver()).toBe(true);
      expect(session.maxScore()).toBe(100);
    });

    test("a board with no moves left is over immediately", () => {
      const session = GameSession.fromRows(
        [
          [2, 4],
          [4, 2],
        ],
        { maxScore: 50, score: 30 },
      );
      expect(session.gameOver()).toBe(true);
      expect(session.maxScore()).toBe(50);
    });
  });

  describe("tilt()", () => {
    test("merges, scores and reports a change", () => {
      const session = GameSession.fromRows([
        [0, 0],
        [2, 2],
      ]);
      expect(session.tilt("left")).toBe(true);
      expect(session.score()).toBe(4);
      expect(session.toRows()).toEqual([
        [0, 0],
        [4, 0],
      ]);
    });

    test("returns false and keeps the score when nothing moves", () => {
      const session = GameSession.fromRows(
        [
          [0, 0],
          [2, 4],
        ],
        { score: 6 },
      );
      expect(session.tilt("down")).toBe(false);
      expect(session.score()).toBe(6);
    });

    test("reaching the winning tile ends the game and records the score", () => {
      const session = GameSession.fromRows([
        [1024, 1024],
        [0, 0],
      ]);
      expect(session.gameOver()).toBe(false);

      session.tilt("left");
      expect(session.tile(0, 1)?.value).toBe(2048);
      expect(session.score()).toBe(2048);
      expect(session.gameOver()).toBe(true);
      expect(session.maxScore()).toBe(2048);
    });

    test("the winning value follows the maxTileValue setting", () => {
      const session = GameSession.fromRows(
        [
          [16, 16],
          [0, 0],
        ],
        { maxTileValue: 32 },
      );
      session.tilt("right");
      expect(session.gameOver()).toBe(true);
    });

    test("tilting is still allowed once over and maxScore keeps up", () => {
      const session = GameSession.fromRows(
        [
          [2048, 0],
          [2, 2],
        ],
        { score: 10 },
      );
      expect(session.gameOver()).toBe(true);
      expect(session.maxScore()).toBe(10);

      expect(session.tilt("left")).toBe(true);
      expect(session.score()).toBe(14);
      expect(session.gameOver()).toBe(true);
      expect(session.maxScore()).toBe(14);
    });

    test("rejects an unknown direction", () => {
      const session = new GameSession();
      expect(() => session.tilt("north" as Direction)).toThrow(
        "Unknown direction: north",
      );
    });
  });

  describe("addTile()", () => {
    test("places a tile and can end the game", () => {
      const session = GameSession.fromRows([
        [2, 4],
        [4, 0],
      ]);
      expect(session.gameOver()).toBe(false);
      session.addTile(createTile(8, 1, 0));
      expect(session.tile(1, 0)?.value).toBe(8);
      expect(session.gameOver()).toBe(true);
    });

    test("an occupied cell throws and leaves the session untouched", () => {
      const session = GameSession.fromRows([
        [0, 0],
        [2, 0],
      ]);
      const listener = jest.fn<void, Parameters<GameListener>>();
      session.subscribe(listener);

      expect(() => session.addTile(createTile(4, 0, 0))).toThrow(
        "Cell (0, 0) is already occupied",
      );
      expect(session.tile(0, 0)?.value).toBe(2);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("spawnTile()", () => {
    test("places a 2 or 4 on an empty cell", () => {
      const session = new GameSession({ seed: "test-seed", size: 2 });
      const tile = session.spawnTile();
      assertDefined(tile);

      expect([2, 4]).toContain(tile.value);
      expect(session.tile(tile.col, tile.row)).toEqual(tile);
    });

    test("the same seed spawns the same tiles", () => {
      const a = new GameSession({ seed: "test-seed" });
      const b = new GameSession({ seed: "test-seed" });
      for (let i = 0; i < 5; i++) {
        expect(a.spawnTile()).toEqual(b.spawnTile());
      }
      expect(a.equals(b)).toBe(true);
    });

    test("returns null on a full board without notifying", () => {
      const session = GameSession.fromRows([
        [2, 4],
        [4, 2],
      ]);
      const listener = jest.fn<void, Parameters<GameListener>>();
      session.subscribe(listener);

      expect(session.spawnTile()).toBeNull();
      expect(listener).not.toHaveBeenCalled();
    });

    test("filling the board one spawn at a time", () => {
      const session = new GameSession({ seed: "fill", size: 3 });
      for (let i = 0; i < 9; i++) {
        expect(session.spawnTile()).not.toBeNull();
      }
      expect(session.spawnTile()).toBeNull();
    });
  });

  describe("clear()", () => {
    test("empties the board, zeroes the score and keeps maxScore", () => {
      const session = GameSession.fromRows(
        [
          [2, 4],
          [4, 2],
        ],
        { score: 30 },
      );
      expect(session.maxScore()).toBe(30);

      session.clear();
      expect(session.toRows()).toEqual([
        [0, 0],
        [0, 0],
      ]);
      expect(session.score()).toBe(0);
      expect(session.gameOver()).toBe(false);
      expect(session.maxScore()).toBe(30);
    });
  });

  describe("subscribe()", () => {
    test("notifies after a changing tilt with snapshot and events", () => {
      const session = GameSession.fromRows([
        [0, 0],
        [2, 2],
      ]);
      const listener = jest.fn<void, Parameters<GameListener>>();
      session.subscribe(listener);

      session.tilt("down");
      expect(listener).not.toHaveBeenCalled();

      session.tilt("left");
      expect(listener).toHaveBeenCalledTimes(1);
      const call = listener.mock.calls[0];
      assertDefined(call);
      const [snapshot, events] = call;
      expect(snapshot.score).toBe(4);
      expect(snapshot.status).toBe("playing");
      expect(findEvents(events, "TilesMerged")).toEqual([
        {
          from: { col: 1, row: 0 },
          kind: "TilesMerged",
          to: { col: 0, row: 0 },
          value: 4,
        },
      ]);
    });

    test("listeners see the re-evaluated status", () => {
      const session = GameSession.fromRows([
        [2, 4],
        [4, 0],
      ]);
      const statuses: Array<string> = [];
      session.subscribe((snapshot) => statuses.push(snapshot.status));

      session.addTile(createTile(8, 1, 0));
      session.clear();
      expect(statuses).toEqual(["over", "playing"]);
    });

    test("a throwing listener does not block later listeners or the caller", () => {
      const session = GameSession.fromRows([
        [0, 0],
        [2, 2],
      ]);
      const failing = jest.fn<void, Parameters<GameListener>>(() => {
        throw new Error("listener failed");
      });
      const counting = jest.fn<void, Parameters<GameListener>>();
      session.subscribe(failing);
      session.subscribe(counting);

      expect(session.tilt("left")).toBe(true);
      expect(failing).toHaveBeenCalledTimes(1);
      expect(counting).toHaveBeenCalledTimes(1);
      expect(session.score()).toBe(4);

      session.clear();
      expect(counting).toHaveBeenCalledTimes(2);
    });

    test("a listener error is reported on the listener debug topic", () => {
      const saved = process.env["TILTBOARD_DEBUG"];
      process.env["TILTBOARD_DEBUG"] = "listener";
      const warn = jest.spyOn(console, "warn").mockImplementation(() => {
        // silence
      });
      const error = new Error("listener failed");
      try {
        const session = new GameSession({ size: 2 });
        session.subscribe(() => {
          throw error;
        });
        session.addTile(createTile(2, 0, 0));

        expect(session.tile(0, 0)?.value).toBe(2);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith("[DBG:listener] listener threw", error);
      } finally {
        warn.mockRestore();
        if (saved === undefined) delete process.env["TILTBOARD_DEBUG"];
        else process.env["TILTBOARD_DEBUG"] = saved;
      }
    });

    test("unsubscribe stops notifications", () => {
      const session = new GameSession({ size: 2 });
      const listener = jest.fn<void, Parameters<GameListener>>();
      const unsubscribe = session.subscribe(listener);

      session.addTile(createTile(2, 0, 0));
      unsubscribe();
      session.addTile(createTile(2, 1, 1));
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe("equals() and toString()", () => {
    test("compares board, score, maxScore and status", () => {
      const rows = [
        [0, 2],
        [0, 2],
      ];
      const a = GameSession.fromRows(rows);
      const b = GameSession.fromRows(rows);
      expect(a.equals(b)).toBe(true);

      a.tilt("down");
      expect(a.equals(b)).toBe(false);
      b.tilt("down");
      expect(a.equals(b)).toBe(true);

      expect(a.equals(GameSession.fromRows(rows, { score: 4 }))).toBe(false);
    });

    test("toString renders the current snapshot", () => {
      const session = GameSession.fromRows(
        [
          [0, 8],
          [2, 0],
        ],
        { score: 12 },
      );
      expect(session.toString()).toBe(formatSnapshot(session.snapshot()));
      expect(session.toString()).toBe(
        "\n[\n|    |   8|\n|   2|    |\n] 12 (max: 0) (game is not over) \n",
      );
    });
  });
});
