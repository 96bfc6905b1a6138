import assert from "node:assert";
import { describe, test } from "node:test";

import { assemble } from "../../src/core/assembler/Assembler";
import { PipelineRegister } from "../../src/core/pipeline/PipelineRegister";
import type { IfIdPayload } from "../../src/core/pipeline/PipelineTypes";

const [ADD] = assemble("add x1, x2, x3");

describe("PipelineRegister", () => {
  test("exposes a staged payload only after advancing", () => {
    const latch = new PipelineRegister<IfIdPayload>("IF/ID");
    const payload: IfIdPayload = { instruction: ADD, pc: 0, predictedTaken: false };

    latch.setNext(payload);
    assert.strictEqual(latch.getCurrent(), null);
    assert.strictEqual(latch.isEmpty(), true);

    latch.advance();
    assert.strictEqual(latch.getCurrent(), payload);
    assert.strictEqual(latch.name, "IF/ID");
  });

  test("turns into a bubble when nothing is staged for the next cycle", () => {
    const latch = new PipelineRegister<IfIdPayload>("IF/ID");
    latch.setNext({ instruction: ADD, pc: 3, predictedTaken: true });
    latch.advance();
    latch.advance();

    assert.strictEqual(latch.isEmpty(), true);
  });

  test("drops both slots on clear", () => {
    const latch = new PipelineRegister<IfIdPayload>("IF/ID");
    latch.setNext({ instruction: ADD, pc: 1, predictedTaken: false });
    latch.advance();
    latch.setNext({ instruction: ADD, pc: 2, predictedTaken: false });
    latch.clear();
    latch.advance();

    assert.strictEqual(latch.getCurrent(), null);
  });
});
