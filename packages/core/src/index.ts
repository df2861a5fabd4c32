/**
 * fluent-fsm
 *
 * Fluent builder for finite state machines with two engines:
 * - passive: each event is handled inside the call that fires it
 * - active: events are queued and handled one by one by a worker fiber
 */

export * from "./types.js";
export * from "./builder.js";
export * from "./passive.js";
export * from "./active.js";
export { ignoreModel } from "./actions.js";
