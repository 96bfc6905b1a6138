import type { ForwardedOperand, ForwardingUnit } from "./ForwardingUnit";
import type { ExMemLatch, IdExLatch, MemWbLatch } from "./PipelineTypes";

export interface EXStageParams {
  executing: IdExLatch;
  memoryStage: ExMemLatch;
  writeback: MemWbLatch;
  forwarding: ForwardingUnit;
  forwardingEnabled: boolean;
}

export type ExecuteEvent =
  | { kind: "alu"; pc: number; opcode: "add" | "sub" | "lw" | "sw"; a: number; b: number; result: number }
  | { kind: "branch-compare"; pc: number; a: number; b: number; taken: boolean };

export interface EXStageResult {
  executed: ExMemLatch;
  operandA: ForwardedOperand;
  operandB: ForwardedOperand;
  event: ExecuteEvent | null;
}

const NOT_FORWARDED: ForwardedOperand = { value: 0, source: "none" };

export class EXStage {
  run(params: EXStageParams): EXStageResult {
    const { executing, memoryStage, writeback, forwarding, forwardingEnabled } = params;
    if (!executing) {
      return { executed: null, operandA: NOT_FORWARDED, operandB: NOT_FORWARDED, event: null };
    }

    const operandA = forwarding.resolve(executing.rs1, executing.value1, memoryStage, writeback, { forwardingEnabled });
    const operandB = forwarding.resolve(executing.rs2, executing.value2, memoryStage, writeback, { forwardingEnabled });
    const a = operandA.value;
    const b = operandB.value;

    const { instruction, pc, rd, predictedTaken } = executing;
    const base = {
      instruction,
      pc,
      rd,
      aluResult: 0,
      storeValue: 0,
      branchTaken: false,
      branchTarget: 0,
      predictedTaken,
    };

    switch (instruction.opcode) {
      case "nop":
        return { executed: Object.freeze(base), operandA, operandB, event: null };
      case "beq": {
        const taken = a === b;
        return {
          executed: Object.freeze({ ...base, branchTaken: taken, branchTarget: instruction.target }),
          operandA,
          operandB,
          event: { kind: "branch-compare", pc, a, b, taken },
        };
      }
      case "add":
      case "sub": {
        const result = instruction.opcode === "add" ? (a + b) | 0 : (a - b) | 0;
        return {
          executed: Object.freeze({ ...base, aluResult: result }),
          operandA,
          operandB,
          event: { kind: "alu", pc, opcode: instruction.opcode, a, b, result },
        };
      }
      case "lw":
      case "sw": {
        const address = (a + instruction.imm) | 0;
        return {
          executed: Object.freeze({
            ...base,
            aluResult: address,
            storeValue: instruction.opcode === "sw" ? b : 0,
          }),
          operandA,
          operandB,
          event: { kind: "alu", pc, opcode: instruction.opcode, a, b, result: address },
        };
      }
    }
  }
}
