import { Bench, type Task } from "tinybench";
import { Effect } from "effect";
import { StateMachineBuilder } from "../src/index.js";

// ============================================================================
// Machine Definition
// ============================================================================

type CounterState = "idle" | "counting";
type CounterEvent = "Increment" | "Decrement" | "Reset";

interface Counter {
  count: number;
}

const counterBuilder = () =>
  StateMachineBuilder.create<CounterState, Counter, CounterEvent>("idle", { count: 0 })
    .onEnterMut((counter) => {
      counter.count = 0;
    })
    .onMut("Increment", (counter) => {
      counter.count += 1;
    })
    .goto("counting")
    .inState("counting")
    .onMut("Increment", (counter) => {
      counter.count += 1;
    })
    .onMut("Decrement", (counter) => {
      counter.count -= 1;
    })
    .on("Reset", () => {})
    .goto("idle");

// ============================================================================
// Helpers
// ============================================================================

function getOpsPerSec(task: Task | undefined): number | null {
  return task?.result?.hz ?? null;
}

function getMeanMicroseconds(task: Task | undefined): number | null {
  const mean = task?.result?.mean;
  return mean === undefined ? null : mean * 1000;
}

function formatOps(ops: number | null): string {
  if (ops === null) return "N/A";
  return ops.toLocaleString(undefined, { maximumFractionDigits: 0 });
}

function formatMean(mean: number | null): string {
  if (mean === null) return "N/A";
  return mean.toFixed(3);
}

function printTable(bench: Bench): void {
  console.table(
    bench.tasks.map((task) => ({
      Task: task.name,
      "ops/sec": formatOps(getOpsPerSec(task)),
      "Mean (μs)": formatMean(getMeanMicroseconds(task)),
    })),
  );
}

// ============================================================================
// Verification
// ============================================================================

function verify(): void {
  const machine = counterBuilder().build();
  machine.startSync();
  machine.fireSync("Increment");
  machine.fireSync("Increment");
  machine.fireSync("Decrement");
  console.log(`  count=${machine.model().count} state=${machine.currentState()}\n`);
}

// ============================================================================
// Run Benchmarks
// ============================================================================

async function main() {
  console.log("\n" + "═".repeat(70));
  console.log("  STATE MACHINE BENCHMARK: passive vs active");
  console.log("═".repeat(70) + "\n");

  verify();

  console.log("BUILD (define + build)\n");

  const buildBench = new Bench({ time: 200, warmupTime: 50 });
  buildBench.add("build passive", () => {
    counterBuilder().build();
  });
  await buildBench.run();
  printTable(buildBench);

  console.log("\nEVENTS (100 events per iteration)\n");

  const passive = counterBuilder().build();
  passive.startSync();

  const eventBench = new Bench({ time: 200, warmupTime: 50 });
  eventBench.add("passive: fireSync", () => {
    for (let i = 0; i < 50; i++) {
      passive.fireSync("Increment");
      passive.fireSync("Decrement");
    }
  });
  eventBench.add("passive: fire (Effect)", () => {
    Effect.runSync(
      Effect.forEach(
        Array.from({ length: 100 }, (_, i): CounterEvent => (i % 2 === 0 ? "Increment" : "Decrement")),
        (event) => passive.fire(event),
        { discard: true },
      ),
    );
  });
  eventBench.add("active: fire + stop", async () => {
    await Effect.runPromise(
      Effect.scoped(
        Effect.gen(function* () {
          const active = yield* counterBuilder().buildActive();
          yield* active.start();
          for (let i = 0; i < 50; i++) {
            yield* active.fire("Increment");
            yield* active.fire("Decrement");
          }
          yield* active.stop();
        }),
      ),
    );
  });
  await eventBench.run();
  printTable(eventBench);
}

main().catch(console.error);
