import { writesRegister } from "../program/Instruction";
import type { ExMemLatch, MemWbLatch } from "./PipelineTypes";

export type ForwardingSource = "none" | "EX/MEM" | "MEM/WB";

export interface ForwardedOperand {
  value: number;
  source: ForwardingSource;
}

export class ForwardingUnit {
  /**
   * Picks the freshest value for a source register read in EX. EX/MEM wins
   * over MEM/WB; a load in EX/MEM only holds its address, so it never
   * forwards. Register 0 always reads the register-file value.
   */
  resolve(
    register: number,
    registerFileValue: number,
    memoryStage: ExMemLatch,
    writeback: MemWbLatch,
    options?: { forwardingEnabled?: boolean },
  ): ForwardedOperand {
    if (!(options?.forwardingEnabled ?? true) || register === 0) {
      return { value: registerFileValue, source: "none" };
    }

    if (
      memoryStage &&
      memoryStage.instruction.opcode !== "lw" &&
      writesRegister(memoryStage.instruction) &&
      memoryStage.rd === register
    ) {
      return { value: memoryStage.aluResult, source: "EX/MEM" };
    }

    if (writeback && writesRegister(writeback.instruction) && writeback.rd === register) {
      return { value: writeback.writebackValue, source: "MEM/WB" };
    }

    return { value: registerFileValue, source: "none" };
  }
}
