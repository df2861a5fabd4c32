import { describe, it, expect } from "vitest";
import { StateMachineBuilder } from "../src/builder.js";
import { BuilderConsumed, DuplicateTransition } from "../src/types.js";
import { record, recorder, turnstileBuilder, type Recorder } from "./test-utils.js";

// ============================================================================
// Scoping
// ============================================================================

describe("StateMachineBuilder", () => {
  it("starts in the initial state with the given model", () => {
    const model = { count: 0 };
    const machine = StateMachineBuilder.create("idle", model).build();

    expect(machine.currentState()).toBe("idle");
    expect(machine.model()).toBe(model);
    expect(machine.isRunning()).toBe(false);
  });

  it("scopes actions to the state named by inState", () => {
    const machine = StateMachineBuilder.create<string, Recorder, string>("a", recorder())
      .onEnterMut(record("enter a"))
      .on("next", () => {})
      .goto("b")
      .inState("b")
      .onEnterMut(record("enter b"))
      .build();

    machine.startSync();
    machine.fireSync("next");

    expect(machine.model().calls).toEqual(["enter a", "enter b"]);
  });

  it("binds goto to the event registered just before it", () => {
    const machine = StateMachineBuilder.create<string, Recorder, string>("a", recorder())
      .on("first", () => {})
      .on("second", () => {})
      .goto("b")
      .build();

    machine.startSync();
    machine.fireSync("first");
    expect(machine.currentState()).toBe("a");

    machine.fireSync("second");
    expect(machine.currentState()).toBe("b");
  });

  it("exposes the scoped event on the event scope", () => {
    const scope = StateMachineBuilder.create("a", {}).on("go", () => {});
    expect(scope.event).toBe("go");
  });

  it("allows several actions for one event before goto", () => {
    const machine = StateMachineBuilder.create<string, Recorder, string>("a", recorder())
      .onMut("go", record("first"))
      .onMut("go", record("second"))
      .goto("b")
      .build();

    machine.startSync();
    machine.fireSync("go");

    expect(machine.model().calls).toEqual(["first", "second"]);
    expect(machine.currentState()).toBe("b");
  });

  it("reopens a state and appends to its actions", () => {
    const machine = StateMachineBuilder.create<string, Recorder, string>("a", recorder())
      .onEnterMut(record("one"))
      .inState("b")
      .inState("a")
      .onEnterMut(record("two"))
      .build();

    machine.startSync();
    expect(machine.model().calls).toEqual(["one", "two"]);
  });
});

// ============================================================================
// Duplicate transitions
// ============================================================================

describe("goto()", () => {
  it("throws DuplicateTransition for a second goto on the same (state, event)", () => {
    const builder = StateMachineBuilder.create("a", {}).on("go", () => {}).goto("b");

    expect(() => builder.on("go", () => {}).goto("c")).toThrow(DuplicateTransition);
  });

  it("throws DuplicateTransition when the state is reopened later", () => {
    const builder = StateMachineBuilder.create("a", {})
      .on("go", () => {})
      .goto("b")
      .inState("b")
      .inState("a");

    expect(() => builder.on("go", () => {}).goto("a")).toThrow(DuplicateTransition);
  });

  it("keeps the first transition after a rejected duplicate", () => {
    const builder = StateMachineBuilder.create("a", {}).on("go", () => {}).goto("b");
    const scope = builder.on("go", () => {});

    expect(() => scope.goto("c")).toThrow(DuplicateTransition);

    const machine = builder.build();
    machine.startSync();
    machine.fireSync("go");
    expect(machine.currentState()).toBe("b");
  });

  it("accepts targets that have no actions of their own", () => {
    const machine = StateMachineBuilder.create("a", {}).on("go", () => {}).goto("elsewhere").build();

    machine.startSync();
    machine.fireSync("go");
    expect(machine.currentState()).toBe("elsewhere");
  });
});

// ============================================================================
// Consumption
// ============================================================================

describe("build()", () => {
  it("consumes the builder", () => {
    const builder = turnstileBuilder();
    builder.build();

    expect(() => builder.build()).toThrow(BuilderConsumed);
    expect(() => builder.inState("Unlocked")).toThrow(BuilderConsumed);
    expect(() => builder.onEnter(() => {})).toThrow(BuilderConsumed);
  });

  it("consumes every builder of the chain", () => {
    const root = StateMachineBuilder.create("a", {});
    const later = root.on("go", () => {}).goto("b");
    later.buildPassive();

    expect(() => root.on("go", () => {})).toThrow(BuilderConsumed);
  });

  it("consumes the builder in buildActive before the Effect runs", () => {
    const builder = StateMachineBuilder.create("a", {});
    builder.buildActive();

    expect(() => builder.build()).toThrow(BuilderConsumed);
  });
});
