import { destinationRegister } from "../program/Instruction";
import type { MachineState } from "../state/MachineState";
import type { MemWbLatch, MemWbPayload } from "./PipelineTypes";

export interface WBStageResult {
  retired: MemWbPayload | null;
  /** Register actually written, or null when nothing reached the register file. */
  writtenRegister: number | null;
}

export class WBStage {
  run(writeback: MemWbLatch, state: MachineState): WBStageResult {
    // Program nops drain like bubbles and never count as retired.
    if (!writeback || writeback.instruction.opcode === "nop") {
      return { retired: null, writtenRegister: null };
    }

    const destination = destinationRegister(writeback.instruction);
    if (destination === null || destination === 0) {
      return { retired: writeback, writtenRegister: null };
    }

    state.setRegister(destination, writeback.writebackValue);
    return { retired: writeback, writtenRegister: destination };
  }
}
