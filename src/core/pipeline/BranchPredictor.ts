import { SimulatorConfigurationError } from "../exceptions/ExecutionExceptions";
import type { Instruction } from "../program/Instruction";

export type PredictorMode = "none" | "static_nt" | "onebit";

export const PREDICTOR_MODES: readonly PredictorMode[] = ["none", "static_nt", "onebit"];

export interface PredictorEntry {
  pc: number;
  taken: boolean;
}

export function isPredictorMode(value: unknown): value is PredictorMode {
  return PREDICTOR_MODES.some((mode) => mode === value);
}

export class BranchPredictor {
  private mode: PredictorMode;
  // pc -> last observed outcome; only consulted in onebit mode.
  private readonly history = new Map<number, boolean>();

  constructor(mode: PredictorMode = "none") {
    this.mode = this.validateMode(mode);
  }

  getMode(): PredictorMode {
    return this.mode;
  }

  setMode(mode: PredictorMode): void {
    this.mode = this.validateMode(mode);
  }

  predict(instruction: Instruction | null, pc: number): boolean {
    if (!instruction || instruction.opcode !== "beq") return false;

    switch (this.mode) {
      case "none":
      case "static_nt":
        return false;
      case "onebit":
        return this.history.get(pc) ?? false;
    }
  }

  update(pc: number, taken: boolean): void {
    if (this.mode !== "onebit") return;
    this.history.set(pc, taken);
  }

  entries(): PredictorEntry[] {
    return Array.from(this.history, ([pc, taken]) => ({ pc, taken })).sort((a, b) => a.pc - b.pc);
  }

  reset(): void {
    this.history.clear();
  }

  private validateMode(mode: unknown): PredictorMode {
    if (!isPredictorMode(mode)) {
      throw new SimulatorConfigurationError("predictorMode", `Unknown predictor mode '${String(mode)}'`);
    }
    return mode;
  }
}
