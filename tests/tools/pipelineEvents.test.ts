import assert from "node:assert";
import { describe, mock, test } from "node:test";

import { assemble } from "../../src/core/assembler/Assembler";
import { PipelineSimulator } from "../../src/core/pipeline/PipelineSimulator";
import type { PipelineSnapshot } from "../../src/core/tools/pipelineEvents";

describe("pipeline events", () => {
  test("replays the latest snapshot and publishes every cycle", () => {
    const simulator = new PipelineSimulator({ program: assemble(["add x1, x0, x0", "nop"].join("\n")) });
    const received: PipelineSnapshot[] = [];

    const unsubscribe = simulator.subscribe((snapshot) => received.push(snapshot));
    simulator.run(2);
    unsubscribe();
    simulator.step();

    assert.deepStrictEqual(
      received.map(({ cycle, pc }) => [cycle, pc]),
      [
        [0, 0],
        [1, 1],
        [2, 2],
      ],
    );
    assert.deepStrictEqual(received[2].stages, {
      IF: "NOP",
      ID: "add x1, x0, x0",
      EX: "NOP",
      MEM: "NOP",
      WB: "NOP",
    });
    assert.deepStrictEqual(received[2].occupancy, { IF: null, ID: 0, EX: null, MEM: null, WB: null });
    assert.strictEqual(simulator.getLatestSnapshot().cycle, 3);
  });

  test("publishes an idle snapshot on reset", () => {
    const simulator = new PipelineSimulator({ program: assemble("nop") });
    simulator.run(3);
    simulator.reset();

    const snapshot = simulator.getLatestSnapshot();
    assert.strictEqual(snapshot.cycle, 0);
    assert.strictEqual(snapshot.events.cycle, 0);
    assert.strictEqual(snapshot.statistics.cycleCount, 0);
    assert.deepStrictEqual(snapshot.stages, { IF: "NOP", ID: "NOP", EX: "NOP", MEM: "NOP", WB: "NOP" });
  });

  test("keeps notifying other listeners when one throws", () => {
    const simulator = new PipelineSimulator({ program: assemble("nop") });
    const consoleError = mock.method(console, "error", () => undefined);
    const cycles: number[] = [];

    try {
      simulator.subscribe(() => {
        throw new Error("listener failed");
      });
      simulator.subscribe((snapshot) => cycles.push(snapshot.cycle));
      simulator.step();
    } finally {
      consoleError.mock.restore();
    }

    assert.deepStrictEqual(cycles, [0, 1]);
    assert.strictEqual(consoleError.mock.callCount(), 2);
  });

  test("drops every listener on dispose", () => {
    const simulator = new PipelineSimulator({ program: assemble("nop") });
    let calls = 0;
    simulator.subscribe(() => {
      calls += 1;
    });
    simulator.dispose();
    simulator.step();

    assert.strictEqual(calls, 1);
  });
});
