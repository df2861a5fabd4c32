/**
 * Active Machine
 *
 * Fired events go into an unbounded queue drained by one worker fiber, so
 * `fire` returns as soon as the event is queued. The worker handles one
 * event at a time, in the order they were queued, holding the model lock
 * for the whole step. Readers take the same lock.
 */

import { Cause, Duration, Effect, Equal, Fiber, Option, Queue, type Scope } from "effect";
import { actionFailed } from "./actions.js";
import { enterInitial, fireStep, gotoStep } from "./machine.js";
import {
  AlreadyStarted,
  MachineStopped,
  NotStarted,
  type ActionFailed,
  type MachineModel,
  type TickFunction,
  type TransitionTable,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface ActiveMachineOptions<S, M extends MachineModel> {
  /**
   * Runs whenever the queue is empty. Returning `Option.some(target)`
   * leaves the current state and enters `target`, like a transition
   * without an event.
   */
  readonly tick?: TickFunction<S, M>;
  /** Pause after a tick that didn't move the machine. Defaults to 10 millis. */
  readonly tickInterval?: Duration.DurationInput;
}

export interface ActiveMachine<S, M extends MachineModel, E> {
  /**
   * Run the initial enter actions, then start the worker. Enter actions
   * always finish before the first fired event is handled.
   */
  readonly start: () => Effect.Effect<void, AlreadyStarted | MachineStopped | ActionFailed>;
  /** Queue an event. Says nothing about how handling it went; see `onError`. */
  readonly fire: (event: E) => Effect.Effect<void, NotStarted | MachineStopped>;
  /**
   * Stop accepting events, handle the ones already queued, then wait for
   * the worker to exit. Safe to call more than once. Called from an
   * action, it returns without waiting: the worker exits after the
   * current step.
   */
  readonly stop: () => Effect.Effect<void>;
  /**
   * Copy of the model taken once no step is in flight, so later steps
   * don't show through it. The model must be structured-cloneable; use
   * `readModel` otherwise. Don't call this (or the other lock-taking
   * reads) from inside an action: the step holds the lock.
   */
  readonly model: () => Effect.Effect<Readonly<M>>;
  /** Evaluate `f` while holding the model lock */
  readonly readModel: <A>(f: (model: Readonly<M>) => A) => Effect.Effect<A>;
  readonly writeModel: (f: (model: M) => void) => Effect.Effect<void>;
  /** State after the last fully handled event */
  readonly currentState: () => Effect.Effect<S>;
  readonly isRunning: () => boolean;
  /**
   * Receive action failures from the worker. Without a handler they are
   * logged at error level. Returns an unsubscribe function.
   */
  readonly onError: (handler: (error: ActionFailed) => void) => () => void;
}

type WorkerCommand<E> =
  | { readonly _tag: "Fire"; readonly event: E }
  | { readonly _tag: "Stop" };

type Status = "idle" | "running" | "stopped";

// ============================================================================
// Creation
// ============================================================================

/**
 * Create an active machine in the current Scope. Closing the scope stops
 * the machine and joins its worker.
 */
export const createActiveMachine = <S, M extends MachineModel, E>(
  table: TransitionTable<S, M, E>,
  model: M,
  options?: ActiveMachineOptions<S, M>,
): Effect.Effect<ActiveMachine<S, M, E>, never, Scope.Scope> =>
  Effect.gen(function* () {
    const queue = yield* Queue.unbounded<WorkerCommand<E>>();
    const lock = yield* Effect.makeSemaphore(1);
    const tickInterval = Duration.decode(options?.tickInterval ?? "10 millis");

    let state = table.initial;
    let status: Status = "idle";
    let worker: Fiber.RuntimeFiber<void> | null = null;
    const errorHandlers = new Set<(error: ActionFailed) => void>();

    const locked = lock.withPermits(1);

    const commit = (next: S) => Effect.sync(() => {
      state = next;
    });

    // Error hook, with logging as the fallback channel
    const report = (error: ActionFailed): Effect.Effect<void> =>
      errorHandlers.size === 0
        ? Effect.logError(error.message, Cause.fail(error))
        : Effect.forEach(
            Array.from(errorHandlers),
            (handler) =>
              Effect.try(() => handler(error)).pipe(
                Effect.catchAll((cause) => Effect.logWarning("Error handler threw", Cause.fail(cause))),
              ),
            { discard: true },
          );

    const handleEvent = (event: E): Effect.Effect<void> =>
      locked(
        Effect.suspend(() => fireStep(table, state, model, event)).pipe(Effect.flatMap(commit)),
      ).pipe(Effect.catchAll(report));

    // Succeeds with true when the tick moved the machine
    const runTick = (tick: TickFunction<S, M>): Effect.Effect<boolean> =>
      locked(
        Effect.suspend(() => {
          const from = state;
          return Effect.try({
            try: () => tick(from, model),
            catch: (cause) => actionFailed({ hook: "tick", state: from }, cause),
          }).pipe(
            Effect.flatMap((target) =>
              Option.match(target, {
                onNone: () => Effect.succeed(false),
                onSome: (to) => gotoStep(table, from, model, to).pipe(Effect.flatMap(commit), Effect.as(true)),
              }),
            ),
          );
        }),
      ).pipe(Effect.catchAll((error) => report(error).pipe(Effect.as(false))));

    // None means "nothing to do yet, loop again"
    const tick = options?.tick;
    const nextCommand: Effect.Effect<Option.Option<WorkerCommand<E>>> =
      tick === undefined
        ? Effect.map(Queue.take(queue), Option.some)
        : Queue.poll(queue).pipe(
            Effect.flatMap((polled) =>
              Option.match(polled, {
                onSome: (command) => Effect.succeed(Option.some(command)),
                onNone: () =>
                  runTick(tick).pipe(
                    Effect.flatMap((moved) =>
                      moved
                        ? Effect.succeedNone
                        : Effect.race(
                            Effect.map(Queue.take(queue), Option.some),
                            Effect.as(Effect.sleep(tickInterval), Option.none()),
                          ),
                    ),
                  ),
              }),
            ),
          );

    const workerLoop: Effect.Effect<void> = Effect.gen(function* () {
      yield* Effect.logDebug("Worker started");
      while (true) {
        const command = yield* nextCommand;
        if (Option.isNone(command)) continue;
        if (command.value._tag === "Stop") break;
        yield* handleEvent(command.value.event);
      }
      yield* Queue.shutdown(queue);
      yield* Effect.logDebug("Worker stopped");
    }).pipe(Effect.annotateLogs("machine", "active"));

    // The worker can't wait for itself when an action calls stop
    const joinWorker = Effect.fiberIdWith((self) =>
      worker === null || Equal.equals(self, worker.id()) ? Effect.void : Fiber.join(worker),
    );

    // ==========================================================================
    // Lifecycle
    // ==========================================================================

    const start = (): Effect.Effect<void, AlreadyStarted | MachineStopped | ActionFailed> =>
      Effect.suspend((): Effect.Effect<void, AlreadyStarted | MachineStopped | ActionFailed> => {
        if (status === "stopped") return Effect.fail(new MachineStopped());
        if (status === "running") return Effect.fail(new AlreadyStarted());
        status = "running";
        return locked(enterInitial(table, model)).pipe(
          Effect.tapError(() => Effect.sync(() => {
            if (status === "running") status = "idle";
          })),
          Effect.zipRight(
            Effect.suspend(() =>
              status === "stopped"
                ? Effect.void
                : Effect.forkDaemon(workerLoop).pipe(
                    Effect.flatMap((fiber) => Effect.sync(() => {
                      worker = fiber;
                    })),
                  ),
            ),
          ),
        );
      });

    const fire = (event: E): Effect.Effect<void, NotStarted | MachineStopped> =>
      Effect.suspend((): Effect.Effect<void, NotStarted | MachineStopped> => {
        if (status === "idle") return Effect.fail(new NotStarted());
        if (status === "stopped") return Effect.fail(new MachineStopped());
        return Effect.asVoid(Queue.offer(queue, { _tag: "Fire", event }));
      });

    // Stop goes through the queue behind everything already fired,
    // which is what drains it. The worker shuts the queue down on exit.
    const stop = (): Effect.Effect<void> =>
      Effect.suspend(() => {
        if (status === "stopped") return joinWorker;
        status = "stopped";
        const noWorker = worker === null;
        return Queue.isShutdown(queue).pipe(
          Effect.flatMap((down) =>
            down ? Effect.void : Effect.asVoid(Queue.offer(queue, { _tag: "Stop" })),
          ),
          Effect.zipRight(noWorker ? Queue.shutdown(queue) : joinWorker),
        );
      });

    yield* Effect.addFinalizer(() => stop());

    const actor: ActiveMachine<S, M, E> = {
      start,
      fire,
      stop,
      model: () => locked(Effect.sync((): Readonly<M> => structuredClone(model))),
      readModel: (f) => locked(Effect.sync(() => f(model))),
      writeModel: (f) => locked(Effect.sync(() => f(model))),
      currentState: () => locked(Effect.sync(() => state)),
      isRunning: () => status === "running",
      onError: (handler) => {
        errorHandlers.add(handler);
        return () => {
          errorHandlers.delete(handler);
        };
      },
    };

    return actor;
  });
