/*
 * Game lifecycle state machine (robot3)
 *
 * Two states: "playing" and "over". After every committed mutation the
 * session sends EVALUATE with the freshly computed game-over flag and the
 * current score, so the status is never stale.
 *
 *   playing --EVALUATE(over)--> over       records maxScore
 *   over    --EVALUATE(over)--> over       records maxScore again (score may grow)
 *   over    --EVALUATE(!over)-> playing
 *   any     --RESET-----------> playing    maxScore survives
 *
 * robot3 context is immutable: reducers return a new context object.
 */

import {
  createMachine,
  state,
  transition,
  guard,
  reduce,
  action,
  interpret,
} from "robot3";

import { debugLog } from "../utils/debug";

import type {
  MachineState,
  MachineStates,
  Machine,
  Service,
  Transition,
} from "robot3";

export type GameStatus = "playing" | "over";

export type LifecycleContext = {
  maxScore: number;
};

export type LifecycleEvent =
  | { type: "EVALUATE"; over: boolean; score: number }
  | { type: "RESET" };

// Guards
const isOver = (_ctx: LifecycleContext, event: LifecycleEvent): boolean =>
  event.type === "EVALUATE" && event.over;

const isNotOver = (_ctx: LifecycleContext, event: LifecycleEvent): boolean =>
  event.type === "EVALUATE" && !event.over;

// Reducers
export const recordMaxScore = (
  ctx: LifecycleContext,
  event: LifecycleEvent,
): LifecycleContext => {
  if (event.type === "EVALUATE") {
    return { ...ctx, maxScore: Math.max(ctx.maxScore, event.score) };
  }
  return ctx;
};

// Actions
const logGameOver = (ctx: LifecycleContext, event: LifecycleEvent): void => {
  if (event.type === "EVALUATE") {
    debugLog("lifecycle", "game over", {
      maxScore: ctx.maxScore,
      score: event.score,
    });
  }
};

const logResumed = (_ctx: LifecycleContext, event: LifecycleEvent): void => {
  debugLog("lifecycle", `playing again after ${event.type}`);
};

type LifecycleEventType = LifecycleEvent["type"];
// state() infers its transition type from the first argument; pin it to the
// whole event union so EVALUATE and RESET transitions can share a state
type LifecycleTransition = Transition<LifecycleEventType>;

const createPlayingState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(
    transition(
      "EVALUATE",
      "over",
      guard(isOver),
      reduce(recordMaxScore),
      action(logGameOver),
    ),
    transition("RESET", "playing"),
  );

const createOverState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(
    transition("EVALUATE", "over", guard(isOver), reduce(recordMaxScore)),
    transition("EVALUATE", "playing", guard(isNotOver), action(logResumed)),
    transition("RESET", "playing", action(logResumed)),
  );

type LifecycleStatesObject = Record<
  GameStatus,
  MachineState<LifecycleEventType>
>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  GameStatus,
  LifecycleEventType
>;

export const createLifecycleMachine = (
  initialContext: LifecycleContext,
): LifecycleMachine => {
  const states = {
    over: createOverState(),
    playing: createPlayingState(),
  } as const;

  // robot3 widens the event type to `string`; the cast restores our
  // state and event unions at this module's boundary.
  return createMachine(
    "playing" as const,
    states as unknown as MachineStates<LifecycleStatesObject, LifecycleEventType>,
    (_ctx: LifecycleContext): LifecycleContext => initialContext,
  ) as unknown as LifecycleMachine;
};

type LifecycleMachineService = Service<LifecycleMachine>;

/**
 * Thin wrapper around the robot3 service: sends events and exposes a typed
 * snapshot of status and maxScore.
 */
export class LifecycleService {
  private service: LifecycleMachineService;
  private currentStatus: GameStatus = "playing";

  constructor(maxScore = 0) {
    this.service = interpret(
      createLifecycleMachine({ maxScore }),
      (service) => {
        this.currentStatus = service.machine.state.name;
      },
    );
  }

  send(event: LifecycleEvent): GameStatus {
    this.service.send(event);
    return this.currentStatus;
  }

  status(): GameStatus {
    return this.currentStatus;
  }

  maxScore(): number {
    return this.service.context.maxScore;
  }
}
