import { Data, type Effect, type HashMap, type Option } from "effect";

// ============================================================================
// Core Types
// ============================================================================

/**
 * Machine model - the caller's working data. Mutated in place by `*Mut` actions.
 */
export type MachineModel = object;

/**
 * What an action may return. A returned Effect runs as part of the step,
 * so asynchronous work finishes before the machine moves on.
 */
export type ActionResult = void | Effect.Effect<unknown, unknown>;

/**
 * Action without model access.
 */
export type Action = () => ActionResult;

/**
 * Action with mutable access to the model.
 */
export type ModelAction<M extends MachineModel> = (model: M) => ActionResult;

/**
 * Hook an action was registered on. `tick` marks the active machine's idle driver.
 */
export type ActionHook = "enter" | "leave" | "event" | "tick";

/**
 * Idle driver for active machines: return `Option.some(target)` to move.
 */
export type TickFunction<S, M extends MachineModel> = (state: S, model: Readonly<M>) => Option.Option<S>;

// ============================================================================
// Transition Table
// ============================================================================

/**
 * Actions and outgoing transitions of one state.
 * States and events are compared with Effect's `Equal`, so primitives
 * and `Data` values both work as keys.
 */
export interface StateNode<S, M extends MachineModel, E> {
  readonly enter: ReadonlyArray<ModelAction<M>>;
  readonly leave: ReadonlyArray<ModelAction<M>>;
  readonly events: HashMap.HashMap<E, ReadonlyArray<ModelAction<M>>>;
  readonly transitions: HashMap.HashMap<E, S>;
}

export interface TransitionTable<S, M extends MachineModel, E> {
  readonly initial: S;
  readonly states: HashMap.HashMap<S, StateNode<S, M, E>>;
}

// ============================================================================
// Machine Error Types (Effect TaggedErrors)
// ============================================================================

/**
 * Thrown by the builder when a (state, event) pair already has a target
 */
export class DuplicateTransition extends Data.TaggedError("DuplicateTransition")<{
  readonly message: string;
  readonly state: unknown;
  readonly event: unknown;
}> {}

/**
 * Thrown when a builder is used after it produced a machine
 */
export class BuilderConsumed extends Data.TaggedError("BuilderConsumed")<{}> {}

export class AlreadyStarted extends Data.TaggedError("AlreadyStarted")<{}> {}

export class NotStarted extends Data.TaggedError("NotStarted")<{}> {}

/**
 * Active machine was stopped and no longer accepts work
 */
export class MachineStopped extends Data.TaggedError("MachineStopped")<{}> {}

/**
 * A registered action threw, or the Effect it returned failed.
 * `cause` holds the original error.
 */
export class ActionFailed extends Data.TaggedError("ActionFailed")<{
  readonly message: string;
  readonly hook: ActionHook;
  readonly state: unknown;
  readonly event?: unknown;
  readonly cause: unknown;
}> {}

/**
 * Union of runtime machine errors
 */
export type StateMachineError =
  | AlreadyStarted
  | NotStarted
  | MachineStopped
  | ActionFailed;
