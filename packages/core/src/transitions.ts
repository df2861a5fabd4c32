/**
 * Transition Table
 *
 * Persistent (state, event) -> target mapping plus the per-state action
 * lists. Every update returns a new table, so a table handed to a machine
 * can't change underneath it.
 */

import { HashMap, Option } from "effect";
import {
  DuplicateTransition,
  type MachineModel,
  type ModelAction,
  type StateNode,
  type TransitionTable,
} from "./types.js";

// ============================================================================
// Construction
// ============================================================================

const emptyNode = <S, M extends MachineModel, E>(): StateNode<S, M, E> => ({
  enter: [],
  leave: [],
  events: HashMap.empty<E, ReadonlyArray<ModelAction<M>>>(),
  transitions: HashMap.empty<E, S>(),
});

/**
 * Table with only the initial state defined
 */
export const empty = <S, M extends MachineModel, E>(initial: S): TransitionTable<S, M, E> => ({
  initial,
  states: HashMap.set(HashMap.empty<S, StateNode<S, M, E>>(), initial, emptyNode<S, M, E>()),
});

/**
 * Define `state` if the table doesn't know it yet
 */
export const defineState = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
): TransitionTable<S, M, E> =>
  HashMap.has(table.states, state)
    ? table
    : { ...table, states: HashMap.set(table.states, state, emptyNode<S, M, E>()) };

const updateNode = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  f: (node: StateNode<S, M, E>) => StateNode<S, M, E>,
): TransitionTable<S, M, E> => {
  const node = Option.getOrElse(HashMap.get(table.states, state), emptyNode<S, M, E>);
  return { ...table, states: HashMap.set(table.states, state, f(node)) };
};

export const addEnterAction = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  action: ModelAction<M>,
): TransitionTable<S, M, E> =>
  updateNode(table, state, (node) => ({ ...node, enter: [...node.enter, action] }));

export const addLeaveAction = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  action: ModelAction<M>,
): TransitionTable<S, M, E> =>
  updateNode(table, state, (node) => ({ ...node, leave: [...node.leave, action] }));

export const addEventAction = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  event: E,
  action: ModelAction<M>,
): TransitionTable<S, M, E> =>
  updateNode(table, state, (node) => {
    const existing = Option.getOrElse(HashMap.get(node.events, event), (): ReadonlyArray<ModelAction<M>> => []);
    return { ...node, events: HashMap.set(node.events, event, [...existing, action]) };
  });

/**
 * Record `from --event--> to`.
 *
 * @throws DuplicateTransition when the pair already has a target. The
 * first transition is never overwritten, even by an identical one.
 */
export const addTransition = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  from: S,
  event: E,
  to: S,
): TransitionTable<S, M, E> =>
  updateNode(table, from, (node) => {
    if (HashMap.has(node.transitions, event)) {
      throw new DuplicateTransition({
        message: `Transition for event ${String(event)} in state ${String(from)} is already defined`,
        state: from,
        event,
      });
    }
    return { ...node, transitions: HashMap.set(node.transitions, event, to) };
  });

// ============================================================================
// Lookups
// ============================================================================

export const lookupTransition = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  event: E,
): Option.Option<S> =>
  Option.flatMap(HashMap.get(table.states, state), (node) => HashMap.get(node.transitions, event));

export const enterActions = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
): ReadonlyArray<ModelAction<M>> =>
  Option.match(HashMap.get(table.states, state), {
    onNone: () => [],
    onSome: (node) => node.enter,
  });

export const leaveActions = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
): ReadonlyArray<ModelAction<M>> =>
  Option.match(HashMap.get(table.states, state), {
    onNone: () => [],
    onSome: (node) => node.leave,
  });

export const eventActions = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  state: S,
  event: E,
): ReadonlyArray<ModelAction<M>> =>
  Option.match(
    Option.flatMap(HashMap.get(table.states, state), (node) => HashMap.get(node.events, event)),
    {
      onNone: () => [],
      onSome: (actions) => actions,
    },
  );
