import type { MachineState } from "../state/MachineState";
import type { IdExLatch, IfIdLatch } from "./PipelineTypes";

export interface IDStageParams {
  decoding: IfIdLatch;
  decodeStall: boolean;
  state: MachineState;
}

export class IDStage {
  run(params: IDStageParams): IdExLatch {
    // A stalled decode injects a bubble into EX.
    if (params.decodeStall || !params.decoding) {
      return null;
    }

    const { instruction, pc, predictedTaken } = params.decoding;
    const rs1 = "rs1" in instruction ? instruction.rs1 : 0;
    const rs2 = "rs2" in instruction ? instruction.rs2 : 0;

    return Object.freeze({
      instruction,
      pc,
      rs1,
      rs2,
      rd: "rd" in instruction ? instruction.rd : 0,
      imm: "imm" in instruction ? instruction.imm : 0,
      value1: params.state.getRegister(rs1),
      value2: params.state.getRegister(rs2),
      predictedTaken: instruction.opcode === "beq" ? predictedTaken : false,
    });
  }
}
