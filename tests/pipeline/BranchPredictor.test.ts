import assert from "node:assert";
import { describe, test } from "node:test";

import { assemble } from "../../src/core/assembler/Assembler";
import { SimulatorConfigurationError } from "../../src/core/exceptions/ExecutionExceptions";
import { BranchPredictor, isPredictorMode } from "../../src/core/pipeline/BranchPredictor";

const [BEQ, ADD] = assemble(["beq x1, x2, 0", "add x1, x2, x3"].join("\n"));

describe("BranchPredictor", () => {
  test("predicts not taken in the static modes", () => {
    for (const mode of ["none", "static_nt"] as const) {
      const predictor = new BranchPredictor(mode);
      predictor.update(0, true);
      assert.strictEqual(predictor.predict(BEQ, 0), false);
      assert.deepStrictEqual(predictor.entries(), []);
    }
  });

  test("remembers the last outcome per branch in onebit mode", () => {
    const predictor = new BranchPredictor("onebit");
    assert.strictEqual(predictor.predict(BEQ, 0), false);

    predictor.update(0, true);
    predictor.update(7, false);
    assert.strictEqual(predictor.predict(BEQ, 0), true);
    assert.strictEqual(predictor.predict(BEQ, 7), false);
    assert.deepStrictEqual(predictor.entries(), [
      { pc: 0, taken: true },
      { pc: 7, taken: false },
    ]);

    predictor.update(0, false);
    assert.strictEqual(predictor.predict(BEQ, 0), false);
  });

  test("never predicts non-branches taken", () => {
    const predictor = new BranchPredictor("onebit");
    predictor.update(1, true);
    assert.strictEqual(predictor.predict(ADD, 1), false);
    assert.strictEqual(predictor.predict(null, 1), false);
  });

  test("clears history on reset and rejects unknown modes", () => {
    const predictor = new BranchPredictor("onebit");
    predictor.update(0, true);
    predictor.reset();
    assert.deepStrictEqual(predictor.entries(), []);

    assert.strictEqual(isPredictorMode("twobit"), false);
    assert.throws(
      () => predictor.setMode(JSON.parse('"twobit"')),
      (error: unknown) => error instanceof SimulatorConfigurationError && error.setting === "predictorMode",
    );
    assert.strictEqual(predictor.getMode(), "onebit");
  });
});
