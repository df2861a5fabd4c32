import { Cause, Effect } from "effect";
import {
  ActionFailed,
  type Action,
  type ActionHook,
  type MachineModel,
  type ModelAction,
} from "./types.js";

// ============================================================================
// Action Adapters
// ============================================================================

/**
 * Adapt an action that doesn't need the model so it can share a hook's
 * action list with model actions. Registration order is preserved.
 *
 * @example
 * ```ts
 * const actions = [ignoreModel(() => console.log("entered")), (m: Door) => { m.open = true }]
 * ```
 */
export const ignoreModel = <M extends MachineModel>(action: Action): ModelAction<M> =>
  () => action();

// ============================================================================
// Action Execution
// ============================================================================

/**
 * Where an action runs. Carried into `ActionFailed` so failures name their hook.
 */
export interface ActionSite<S, E> {
  readonly hook: ActionHook;
  readonly state: S;
  readonly event?: E;
}

const describeSite = <S, E>(site: ActionSite<S, E>): string =>
  site.event === undefined
    ? `${site.hook} action of state ${String(site.state)}`
    : `${site.hook} action for event ${String(site.event)} in state ${String(site.state)}`;

/**
 * Build the `ActionFailed` reported for `site`
 */
export const actionFailed = <S, E>(site: ActionSite<S, E>, cause: unknown): ActionFailed =>
  new ActionFailed({
    message: `${describeSite(site)} failed`,
    hook: site.hook,
    state: site.state,
    ...(site.event === undefined ? {} : { event: site.event }),
    cause,
  });

/**
 * Run a single action. A throw, a failed Effect and a defect all surface
 * as `ActionFailed`; interruption is passed through untouched.
 */
export const runAction = <S, M extends MachineModel, E>(
  action: ModelAction<M>,
  model: M,
  site: ActionSite<S, E>,
): Effect.Effect<void, ActionFailed> =>
  Effect.suspend(() => {
    const result = action(model);
    return Effect.isEffect(result) ? result : Effect.void;
  }).pipe(
    Effect.asVoid,
    Effect.catchAllCause((cause) =>
      Cause.isInterruptedOnly(cause)
        ? Effect.interrupt
        : Effect.fail(actionFailed(site, Cause.squash(cause))),
    ),
  );

/**
 * Run actions in registration order. The first failure stops the rest.
 */
export const runActions = <S, M extends MachineModel, E>(
  actions: ReadonlyArray<ModelAction<M>>,
  model: M,
  site: ActionSite<S, E>,
): Effect.Effect<void, ActionFailed> =>
  actions.length === 0
    ? Effect.void
    : Effect.forEach(actions, (action) => runAction(action, model, site), { discard: true });
