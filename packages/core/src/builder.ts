/**
 * State Machine Builder
 *
 * Fluent API for describing a machine one state at a time:
 * ```ts
 * const machine = StateMachineBuilder.create(Locked, { coins: 0 })
 *   .onEnter(() => console.log("locked"))
 *   .onMut(Coin, (model) => { model.coins += 1 })
 *   .goto(Unlocked)
 *   .inState(Unlocked)
 *   .on(Push, () => console.log("click"))
 *   .goto(Locked)
 *   .build()
 * ```
 *
 * `on`/`onMut` return an {@link EventScope}: the only place `goto` exists,
 * so every transition is bound to the event registered just before it.
 * Each call returns a new builder; building seals the whole chain.
 */

import type { Effect, Scope } from "effect";
import { ignoreModel } from "./actions.js";
import { createActiveMachine, type ActiveMachine, type ActiveMachineOptions } from "./active.js";
import { createPassiveMachine, type PassiveMachine } from "./passive.js";
import {
  addEnterAction,
  addEventAction,
  addLeaveAction,
  addTransition,
  defineState,
  empty,
} from "./transitions.js";
import {
  BuilderConsumed,
  type Action,
  type MachineModel,
  type ModelAction,
  type TransitionTable,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface StateMachineBuilder<S, M extends MachineModel, E> {
  /** Scope the following calls to `state`, defining it if needed */
  readonly inState: (state: S) => StateMachineBuilder<S, M, E>;
  readonly onEnter: (action: Action) => StateMachineBuilder<S, M, E>;
  readonly onEnterMut: (action: ModelAction<M>) => StateMachineBuilder<S, M, E>;
  readonly onLeave: (action: Action) => StateMachineBuilder<S, M, E>;
  readonly onLeaveMut: (action: ModelAction<M>) => StateMachineBuilder<S, M, E>;
  /** Run `action` when `event` fires in the scoped state */
  readonly on: (event: E, action: Action) => EventScope<S, M, E>;
  readonly onMut: (event: E, action: ModelAction<M>) => EventScope<S, M, E>;
  readonly build: () => PassiveMachine<S, M, E>;
  readonly buildPassive: () => PassiveMachine<S, M, E>;
  /**
   * Seals the builder immediately; the returned Effect creates the machine
   * in the current Scope. Run it once: every run shares the same model.
   */
  readonly buildActive: (
    options?: ActiveMachineOptions<S, M>,
  ) => Effect.Effect<ActiveMachine<S, M, E>, never, Scope.Scope>;
}

/**
 * Builder with an event in scope
 */
export interface EventScope<S, M extends MachineModel, E> extends StateMachineBuilder<S, M, E> {
  readonly event: E;
  /**
   * Transition from the scoped state to `target` on the scoped event.
   *
   * @throws DuplicateTransition if this (state, event) already has a target
   */
  readonly goto: (target: S) => StateMachineBuilder<S, M, E>;
}

// ============================================================================
// Implementation
// ============================================================================

interface Seal {
  sealed: boolean;
}

interface Draft<S, M extends MachineModel, E> {
  readonly table: TransitionTable<S, M, E>;
  readonly model: M;
  readonly state: S;
  readonly seal: Seal;
}

const unsealed = <A>(seal: Seal, f: () => A): A => {
  if (seal.sealed) throw new BuilderConsumed();
  return f();
};

function makeBuilder<S, M extends MachineModel, E>(draft: Draft<S, M, E>): StateMachineBuilder<S, M, E> {
  const withTable = (f: (table: TransitionTable<S, M, E>) => TransitionTable<S, M, E>) =>
    unsealed(draft.seal, () => makeBuilder({ ...draft, table: f(draft.table) }));

  const withEvent = (event: E, action: ModelAction<M>) =>
    unsealed(draft.seal, () =>
      makeEventScope({ ...draft, table: addEventAction(draft.table, draft.state, event, action) }, event),
    );

  const seal = (): TransitionTable<S, M, E> =>
    unsealed(draft.seal, () => {
      draft.seal.sealed = true;
      return draft.table;
    });

  const build = () => createPassiveMachine(seal(), draft.model);

  return {
    inState: (state) =>
      unsealed(draft.seal, () => makeBuilder({ ...draft, state, table: defineState(draft.table, state) })),
    onEnter: (action) => withTable((table) => addEnterAction(table, draft.state, ignoreModel<M>(action))),
    onEnterMut: (action) => withTable((table) => addEnterAction(table, draft.state, action)),
    onLeave: (action) => withTable((table) => addLeaveAction(table, draft.state, ignoreModel<M>(action))),
    onLeaveMut: (action) => withTable((table) => addLeaveAction(table, draft.state, action)),
    on: (event, action) => withEvent(event, ignoreModel<M>(action)),
    onMut: (event, action) => withEvent(event, action),
    build,
    buildPassive: build,
    buildActive: (options) => createActiveMachine(seal(), draft.model, options),
  };
}

function makeEventScope<S, M extends MachineModel, E>(draft: Draft<S, M, E>, event: E): EventScope<S, M, E> {
  return {
    ...makeBuilder(draft),
    event,
    goto: (target) =>
      unsealed(draft.seal, () =>
        makeBuilder({
          ...draft,
          table: defineState(addTransition(draft.table, draft.state, event, target), target),
        }),
      ),
  };
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Start describing a machine that begins in `initialState` with `initialModel`.
 * States and events are compared with Effect's `Equal`: primitives by value,
 * `Data` structs and tagged classes structurally, other objects by reference.
 *
 * @example
 * ```ts
 * const builder = StateMachineBuilder.create<DoorState, DoorModel, DoorEvent>("closed", { open: false })
 * ```
 */
const create = <S, M extends MachineModel, E = unknown>(
  initialState: S,
  initialModel: M,
): StateMachineBuilder<S, M, E> =>
  makeBuilder({
    table: empty<S, M, E>(initialState),
    model: initialModel,
    state: initialState,
    seal: { sealed: false },
  });

export const StateMachineBuilder = { create };
