import type { Memory } from "../memory/Memory";
import type { ExMemLatch, MemWbLatch } from "./PipelineTypes";

export type MemoryAccess =
  | { kind: "load"; pc: number; address: number; value: number }
  | { kind: "store"; pc: number; address: number; value: number };

export interface MEMStageResult {
  written: MemWbLatch;
  access: MemoryAccess | null;
}

export class MEMStage {
  run(memoryStage: ExMemLatch, memory: Memory): MEMStageResult {
    if (!memoryStage) {
      return { written: null, access: null };
    }

    const { instruction, pc, rd, aluResult } = memoryStage;
    const base = { instruction, pc, rd, aluResult, memoryValue: 0, writebackValue: 0 };

    switch (instruction.opcode) {
      case "lw": {
        const value = memory.readWord(aluResult);
        return {
          written: Object.freeze({ ...base, memoryValue: value, writebackValue: value }),
          access: { kind: "load", pc, address: aluResult, value },
        };
      }
      case "sw":
        memory.writeWord(aluResult, memoryStage.storeValue);
        return {
          written: Object.freeze(base),
          access: { kind: "store", pc, address: aluResult, value: memoryStage.storeValue | 0 },
        };
      case "add":
      case "sub":
        return { written: Object.freeze({ ...base, writebackValue: aluResult }), access: null };
      case "beq":
      case "nop":
        return { written: Object.freeze(base), access: null };
    }
  }
}
