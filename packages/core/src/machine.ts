/**
 * Step engine shared by the passive and active machines.
 *
 * Steps return the state the machine should be in afterwards and never
 * write it themselves: the caller commits the result only when the whole
 * step succeeded. A failed step therefore leaves the machine in the state
 * it had before the step. Model mutations made by actions that already
 * ran are kept.
 */

import { Effect, Option } from "effect";
import { runActions } from "./actions.js";
import { enterActions, eventActions, leaveActions, lookupTransition } from "./transitions.js";
import type { ActionFailed, MachineModel, TransitionTable } from "./types.js";

/**
 * Run the initial state's enter actions
 */
export const enterInitial = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  model: M,
): Effect.Effect<S, ActionFailed> =>
  runActions(enterActions(table, table.initial), model, { hook: "enter", state: table.initial }).pipe(
    Effect.as(table.initial),
  );

/**
 * Leave `from`, then enter `to`. Self-transitions run both sides once.
 */
export const gotoStep = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  from: S,
  model: M,
  to: S,
  event?: E,
): Effect.Effect<S, ActionFailed> => {
  const site = event === undefined ? {} : { event };
  return runActions(leaveActions(table, from), model, { hook: "leave", state: from, ...site }).pipe(
    Effect.zipRight(runActions(enterActions(table, to), model, { hook: "enter", state: to, ...site })),
    Effect.as(to),
  );
};

/**
 * Handle `event` in `state`: event actions first, then the transition if
 * one is registered. Events with no transition only run their actions;
 * events with neither are ignored.
 */
export const fireStep = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  model: M,
  event: E,
): Effect.Effect<S, ActionFailed> =>
  runActions(eventActions(table, state, event), model, { hook: "event", state, event }).pipe(
    Effect.zipRight(
      Option.match(lookupTransition(table, state, event), {
        onNone: () => Effect.succeed(state),
        onSome: (target) => gotoStep(table, state, model, target, event),
      }),
    ),
  );
