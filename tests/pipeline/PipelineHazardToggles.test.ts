import assert from "node:assert";
import { describe, test } from "node:test";

import { assemble } from "../../src/core/assembler/Assembler";
import { PipelineSimulator } from "../../src/core/pipeline/PipelineSimulator";

const RAW_CHAIN = ["add x1, x0, x0", "add x2, x1, x1", "add x3, x2, x2"].join("\n");

describe("Pipeline hazard toggles", () => {
  test("stalls on every pending writer when forwarding is disabled", () => {
    const simulator = new PipelineSimulator({ program: assemble(RAW_CHAIN), forwardingEnabled: false });

    assert.strictEqual(simulator.runUntilDrained(), 13);
    const stats = simulator.getStatistics();
    assert.strictEqual(stats.stallEvents, 2);
    assert.strictEqual(stats.stalls, 6);
    assert.strictEqual(stats.retired, 3);
    assert.deepStrictEqual(simulator.getStallBreakdown(), [
      { reason: "RAW vs EX", count: 2 },
      { reason: "RAW vs MEM", count: 2 },
      { reason: "RAW vs WB", count: 2 },
    ]);
  });

  test("runs the same dependency chain without stalls when forwarding", () => {
    const simulator = new PipelineSimulator({ program: assemble(RAW_CHAIN) });

    assert.strictEqual(simulator.runUntilDrained(), 7);
    assert.strictEqual(simulator.getStatistics().stalls, 0);
    assert.deepStrictEqual(simulator.getStallBreakdown(), []);
  });

  test("computes correct values without forwarding", () => {
    const simulator = new PipelineSimulator({
      program: assemble(["lw x1, 0(x0)", "add x2, x1, x1", "add x3, x2, x1"].join("\n")),
      forwardingEnabled: false,
    });
    simulator.writeMemory(0, 5);

    assert.strictEqual(simulator.runUntilDrained(), 13);
    assert.deepStrictEqual(simulator.getRegisters().slice(1, 4), [5, 10, 15]);
    assert.deepStrictEqual(
      simulator.getTrace().map(({ cycle, ID }) => `${cycle}:${ID}`).slice(2, 6),
      ["3:add x2, x1, x1", "4:add x2, x1, x1", "5:add x2, x1, x1", "6:add x2, x1, x1"],
    );
  });

  test("holds fetch for a cycle when a memory access owns the port", () => {
    const simulator = new PipelineSimulator({
      program: assemble(["lw x1, 0(x0)", "add x2, x0, x0", "add x3, x0, x0", "add x4, x0, x0"].join("\n")),
      structuralHazardsEnabled: true,
    });

    simulator.run(4);
    const events = simulator.getLastEvents();
    assert.strictEqual(events.structuralStall, true);
    assert.strictEqual(events.stall, false);
    assert.strictEqual(simulator.getProgramCounter(), 3);
    assert.strictEqual(simulator.getLatches().ifId, null);

    assert.strictEqual(simulator.runUntilDrained(), 5);
    const stats = simulator.getStatistics();
    assert.strictEqual(stats.structuralStalls, 1);
    assert.strictEqual(stats.stalls, 1);
    assert.strictEqual(stats.stallEvents, 0);
    assert.strictEqual(stats.retired, 4);
    assert.deepStrictEqual(simulator.getStallBreakdown(), [{ reason: "structural", count: 1 }]);
  });

  test("ignores the memory port when structural hazards are disabled", () => {
    const simulator = new PipelineSimulator({
      program: assemble(["lw x1, 0(x0)", "add x2, x0, x0", "add x3, x0, x0", "add x4, x0, x0"].join("\n")),
    });

    assert.strictEqual(simulator.runUntilDrained(), 8);
    assert.strictEqual(simulator.getStatistics().structuralStalls, 0);
  });

  test("applies settings between cycles", () => {
    const simulator = new PipelineSimulator({ program: assemble(RAW_CHAIN) });
    simulator.applySettings({ forwardingEnabled: false, structuralHazardsEnabled: true, predictorMode: "onebit" });

    assert.deepStrictEqual(simulator.getSettings(), {
      forwardingEnabled: false,
      structuralHazardsEnabled: true,
      predictorMode: "onebit",
    });
    assert.strictEqual(simulator.getStructuralHazardsEnabled(), true);
    assert.strictEqual(simulator.getPredictorMode(), "onebit");

    simulator.runUntilDrained();
    assert.strictEqual(simulator.getStatistics().stalls, 6);
    assert.strictEqual(simulator.getLatestSnapshot().forwardingEnabled, false);
  });
});
