import assert from "node:assert";
import { describe, test } from "node:test";

import { Assembler, assemble } from "../../src/core/assembler/Assembler";
import { ProgramSyntaxError } from "../../src/core/exceptions/ProgramExceptions";

describe("Assembler", () => {
  test("builds instructions with resolved operands and sequence ids", () => {
    const program = new Assembler().assemble(
      [
        "# header comment",
        "add x1, x2, x3",
        "",
        "SUB X4, x5, x6   ; trailing comment",
        "lw  x7, -8(x8)",
        "sw  x9, 0x10(x10)",
        "nop",
      ].join("\n"),
    );

    assert.strictEqual(program.length, 5);
    assert.deepStrictEqual(program[0], { id: 0, line: 2, text: "add x1, x2, x3", opcode: "add", rd: 1, rs1: 2, rs2: 3 });
    assert.deepStrictEqual(program[1], { id: 1, line: 4, text: "SUB X4, x5, x6", opcode: "sub", rd: 4, rs1: 5, rs2: 6 });
    assert.deepStrictEqual(program[2], { id: 2, line: 5, text: "lw  x7, -8(x8)", opcode: "lw", rd: 7, rs1: 8, imm: -8 });
    assert.deepStrictEqual(program[3], { id: 3, line: 6, text: "sw  x9, 0x10(x10)", opcode: "sw", rs1: 10, rs2: 9, imm: 16 });
    assert.deepStrictEqual(program[4], { id: 4, line: 7, text: "nop", opcode: "nop" });
  });

  test("resolves labels to the index of the following instruction", () => {
    const program = assemble(
      [
        "TOP:",
        "beq x1, x2, END",
        "add x3, x0, x0",
        "beq x0, x0, TOP",
        "END:",
      ].join("\n"),
    );

    assert.strictEqual(program.length, 3);
    assert.strictEqual(program[0].opcode === "beq" && program[0].target, 3);
    assert.strictEqual(program[2].opcode === "beq" && program[2].target, 0);
  });

  test("accepts numeric branch targets", () => {
    const program = assemble(["beq x0, x0, 2", "nop"].join("\n"));
    assert.strictEqual(program[0].opcode === "beq" && program[0].target, 2);
  });

  test("defaults an empty memory offset to zero", () => {
    const [load] = assemble("lw x1, (x2)");
    assert.strictEqual(load.opcode === "lw" && load.imm, 0);
  });

  test("freezes the program and its instructions", () => {
    const program = assemble("add x1, x2, x3");
    assert.ok(Object.isFrozen(program));
    assert.ok(Object.isFrozen(program[0]));
  });

  test("reports the offending line for malformed input", () => {
    const cases: Array<[string, RegExp, number]> = [
      ["add x1, x2, x32", /Unknown register 'x32'/, 1],
      ["nop\nadd x1, x2", /'add' expects 3 operands, got 2/, 2],
      ["lw x1, 4", /Malformed address '4'/, 1],
      ["lw x1, 1z(x2)", /Malformed immediate '1z'/, 1],
      ["beq x1, x2, nowhere", /Unknown label 'nowhere'/, 1],
      ["mul x1, x2, x3", /Unsupported opcode 'mul'/, 1],
      ["nop x1", /'nop' expects 0 operands, got 1/, 1],
      ["beq x0, x0, 5", /Branch target 5 is outside the program/, 1],
      ["L:\nnop\nL:", /Duplicate label 'L'/, 3],
      [":", /Empty label name/, 1],
    ];

    for (const [source, message, line] of cases) {
      assert.throws(
        () => assemble(source),
        (error: unknown) => error instanceof ProgramSyntaxError && message.test(error.message) && error.line === line,
        source,
      );
    }
  });

  test("carries the source text on syntax errors", () => {
    try {
      assemble("add x1, x2, q3 # bad");
      assert.fail("expected a syntax error");
    } catch (error) {
      assert.ok(error instanceof ProgramSyntaxError);
      assert.strictEqual(error.source, "add x1, x2, q3");
      assert.strictEqual(error.name, "ProgramSyntaxError");
    }
  });
});
