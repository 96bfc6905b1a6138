import { Assembler } from "./assembler/Assembler";
import { initialSimulatorSettings, type SimulatorSettings } from "./config/SimulatorSettings";
import { PipelineSimulator } from "./pipeline/PipelineSimulator";
import type { Program } from "./program/Instruction";

export * from "./program/Instruction";
export * from "./assembler/Assembler";
export * from "./assembler/Lexer";
export * from "./assembler/Parser";
export * from "./config/SimulatorSettings";
export * from "./exceptions/ProgramExceptions";
export * from "./exceptions/ExecutionExceptions";
export * from "./memory/Memory";
export * from "./state/MachineState";
export * from "./pipeline/PipelineTypes";
export * from "./pipeline/PipelineRegister";
export * from "./pipeline/HazardUnit";
export * from "./pipeline/ForwardingUnit";
export * from "./pipeline/BranchPredictor";
export * from "./pipeline/ControlUnit";
export * from "./pipeline/IFStage";
export * from "./pipeline/IDStage";
export * from "./pipeline/EXStage";
export * from "./pipeline/MEMStage";
export * from "./pipeline/WBStage";
export * from "./pipeline/PipelineStatistics";
export * from "./pipeline/PipelineTelemetry";
export * from "./pipeline/PipelineSimulator";
export * from "./tools/pipelineEvents";
export * from "./tools/traceExport";

export { PipelineSimulator as Pipeline } from "./pipeline/PipelineSimulator";

export interface SimulatorOptions extends Partial<SimulatorSettings> {
  /** Assembly text or an already assembled program. */
  program?: string | Program;
  /** Data memory contents written after the program is loaded. */
  memory?: Record<number, number>;
}

export function createSimulator(options: SimulatorOptions = {}): PipelineSimulator {
  const simulator = new PipelineSimulator({
    forwardingEnabled: options.forwardingEnabled ?? initialSimulatorSettings.forwardingEnabled,
    structuralHazardsEnabled: options.structuralHazardsEnabled ?? initialSimulatorSettings.structuralHazardsEnabled,
    predictorMode: options.predictorMode ?? initialSimulatorSettings.predictorMode,
  });

  if (options.program !== undefined) {
    const program = typeof options.program === "string" ? new Assembler().assemble(options.program) : options.program;
    simulator.loadProgram(program);
  }

  for (const [address, value] of Object.entries(options.memory ?? {})) {
    simulator.writeMemory(Number(address), value);
  }

  return simulator;
}
