import type { Program } from "../program/Instruction";
import type { BranchPredictor } from "./BranchPredictor";
import type { IfIdLatch } from "./PipelineTypes";

export interface IFStageParams {
  fetchPc: number;
  program: Program;
  predictor: BranchPredictor;
  decodeStall: boolean;
  structuralStall: boolean;
  previousDecoding: IfIdLatch;
}

export interface IFStageResult {
  fetched: IfIdLatch;
  /** Tentative next program counter; branch resolution may still override it. */
  nextPc: number;
}

export class IFStage {
  run(params: IFStageParams): IFStageResult {
    // The pending instruction waits in IF/ID until decode accepts it.
    if (params.decodeStall) {
      return { fetched: params.previousDecoding, nextPc: params.fetchPc };
    }

    // Decode consumed IF/ID but the memory port is busy, so nothing new arrives.
    if (params.structuralStall) {
      return { fetched: null, nextPc: params.fetchPc };
    }

    const instruction = params.program[params.fetchPc];
    if (!instruction) {
      // Past the end of the program fetch yields an implicit no-op.
      return { fetched: null, nextPc: params.fetchPc + 1 };
    }

    const predictedTaken = params.predictor.predict(instruction, params.fetchPc);
    const nextPc = predictedTaken && instruction.opcode === "beq" ? instruction.target : params.fetchPc + 1;
    return {
      fetched: Object.freeze({ instruction, pc: params.fetchPc, predictedTaken }),
      nextPc,
    };
  }
}
