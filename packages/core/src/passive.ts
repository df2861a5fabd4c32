import { Cause, Effect, Exit } from "effect";
import { enterInitial, fireStep } from "./machine.js";
import {
  AlreadyStarted,
  NotStarted,
  type ActionFailed,
  type MachineModel,
  type TransitionTable,
} from "./types.js";

// ============================================================================
// Passive Machine
// ============================================================================

/**
 * Machine that handles each event to completion inside the call that fires it.
 * It owns its model exclusively; only registered `*Mut` actions change it.
 */
export interface PassiveMachine<S, M extends MachineModel, E> {
  /** Run the initial state's enter actions. Fails with `AlreadyStarted` the second time. */
  readonly start: () => Effect.Effect<void, AlreadyStarted | ActionFailed>;
  /**
   * Event actions, then leave/enter when a transition matches.
   * Unmatched events are ignored. Completes once the whole step has run.
   */
  readonly fire: (event: E) => Effect.Effect<void, NotStarted | ActionFailed>;
  /** `start` for callers outside Effect; throws the tagged error. */
  readonly startSync: () => void;
  /** `fire` for callers outside Effect; throws the tagged error. */
  readonly fireSync: (event: E) => void;
  readonly currentState: () => S;
  readonly model: () => Readonly<M>;
  readonly isRunning: () => boolean;
}

/**
 * Run an Effect synchronously, rethrowing its failure as-is instead of
 * wrapped in a FiberFailure.
 */
const runSyncOrThrow = <E>(effect: Effect.Effect<void, E>): void =>
  Exit.match(Effect.runSyncExit(effect), {
    onFailure: (cause) => {
      throw Cause.squash(cause);
    },
    onSuccess: () => undefined,
  });

export function createPassiveMachine<S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  model: M,
): PassiveMachine<S, M, E> {
  let state = table.initial;
  let running = false;

  const start = (): Effect.Effect<void, AlreadyStarted | ActionFailed> =>
    Effect.suspend((): Effect.Effect<void, AlreadyStarted | ActionFailed> => {
      if (running) return Effect.fail(new AlreadyStarted());
      running = true;
      return enterInitial(table, model).pipe(
        Effect.tapError(() => Effect.sync(() => {
          running = false;
        })),
        Effect.asVoid,
      );
    });

  const fire = (event: E): Effect.Effect<void, NotStarted | ActionFailed> =>
    Effect.suspend((): Effect.Effect<void, NotStarted | ActionFailed> => {
      if (!running) return Effect.fail(new NotStarted());
      return fireStep(table, state, model, event).pipe(
        Effect.tap((next) => Effect.sync(() => {
          state = next;
        })),
        Effect.asVoid,
      );
    });

  return {
    start,
    fire,
    startSync: () => runSyncOrThrow(start()),
    fireSync: (event) => runSyncOrThrow(fire(event)),
    currentState: () => state,
    model: () => model,
    isRunning: () => running,
  };
}
