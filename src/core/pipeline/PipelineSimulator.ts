import type { SimulatorSettings } from "../config/SimulatorSettings";
import { assertCycleCount } from "../exceptions/ExecutionExceptions";
import { Memory, type MemoryEntry } from "../memory/Memory";
import { BUBBLE_TEXT, instructionText, type Instruction, type Program } from "../program/Instruction";
import { MachineState } from "../state/MachineState";
import {
  PipelineEventChannel,
  createIdleEvents,
  type CycleEvents,
  type PipelineListener,
  type PipelineSnapshot,
} from "../tools/pipelineEvents";
import { BranchPredictor, type PredictorMode } from "./BranchPredictor";
import { decodeControlSignals, type ControlSignals } from "./ControlUnit";
import { EXStage } from "./EXStage";
import { ForwardingUnit } from "./ForwardingUnit";
import { HazardUnit } from "./HazardUnit";
import { IDStage } from "./IDStage";
import { IFStage } from "./IFStage";
import { MEMStage } from "./MEMStage";
import { PipelineRegister } from "./PipelineRegister";
import {
  PipelineStatistics,
  type CpiBreakdown,
  type PipelineStatisticsSnapshot,
  type StallBreakdownEntry,
} from "./PipelineStatistics";
import {
  PipelineTelemetry,
  type AddressLogEntry,
  type InstructionStatus,
  type StageUtilization,
  type TimelineWindow,
  type TraceRow,
} from "./PipelineTelemetry";
import type {
  ExMemPayload,
  IdExPayload,
  IfIdPayload,
  LatchName,
  LatchSet,
  MemWbPayload,
  StageOccupancy,
  StageTextSnapshot,
} from "./PipelineTypes";
import { WBStage } from "./WBStage";

export interface PipelineOptions {
  program?: Program;
  forwardingEnabled?: boolean;
  structuralHazardsEnabled?: boolean;
  predictorMode?: PredictorMode;
}

export interface InFlightInstruction {
  latch: LatchName;
  pc: number;
  text: string;
}

export interface PredictorTableRow {
  pc: number;
  text: string;
  prediction: "T" | "NT";
}

export const DEFAULT_DRAIN_LIMIT = 10_000;

// Bubbles and program nops leave a stage unoccupied.
function occupantPc(instruction: Instruction | null, pc: number): number | null {
  return instruction && instruction.opcode !== "nop" ? pc : null;
}

export class PipelineSimulator {
  private readonly state = new MachineState();
  private readonly memory = new Memory();
  private readonly predictor: BranchPredictor;
  private readonly statistics = new PipelineStatistics();
  private readonly telemetry = new PipelineTelemetry();
  private readonly events: PipelineEventChannel;
  private readonly ifId = new PipelineRegister<IfIdPayload>("IF/ID");
  private readonly idEx = new PipelineRegister<IdExPayload>("ID/EX");
  private readonly exMem = new PipelineRegister<ExMemPayload>("EX/MEM");
  private readonly memWb = new PipelineRegister<MemWbPayload>("MEM/WB");
  private readonly hazardUnit = new HazardUnit();
  private readonly forwardingUnit = new ForwardingUnit();
  private readonly ifStage = new IFStage();
  private readonly idStage = new IDStage();
  private readonly exStage = new EXStage();
  private readonly memStage = new MEMStage();
  private readonly wbStage = new WBStage();
  private program: Program = [];
  private forwardingEnabled: boolean;
  private structuralHazardsEnabled: boolean;
  private lastEvents: CycleEvents = createIdleEvents();

  constructor(options: PipelineOptions = {}) {
    this.forwardingEnabled = options.forwardingEnabled ?? true;
    this.structuralHazardsEnabled = options.structuralHazardsEnabled ?? false;
    this.predictor = new BranchPredictor(options.predictorMode ?? "none");
    this.events = new PipelineEventChannel(this.createSnapshot(this.idleStages()));
    this.loadProgram(options.program ?? []);
  }

  loadProgram(program: Program): void {
    this.program = program;
    this.reset();
  }

  /** Rebuilds all per-run state for the loaded program; configuration is kept. */
  reset(): void {
    this.state.reset();
    this.memory.reset();
    this.ifId.clear();
    this.idEx.clear();
    this.exMem.clear();
    this.memWb.clear();
    this.predictor.reset();
    this.statistics.reset();
    this.telemetry.reset(this.program);
    this.lastEvents = createIdleEvents();
    this.events.publish(this.createSnapshot(this.idleStages()));
  }

  dispose(): void {
    this.events.clear();
  }

  step(): StageTextSnapshot {
    const state = this.state;
    const cycle = state.getCycle() + 1;
    const fetchPc = state.getProgramCounter();

    const decoding = this.ifId.getCurrent();
    const executing = this.idEx.getCurrent();
    const memoryStage = this.exMem.getCurrent();
    const writeback = this.memWb.getCurrent();
    const events = createIdleEvents(cycle);

    const occupancy: StageOccupancy = {
      IF: occupantPc(this.program[fetchPc] ?? null, fetchPc),
      ID: occupantPc(decoding?.instruction ?? null, decoding?.pc ?? 0),
      EX: occupantPc(executing?.instruction ?? null, executing?.pc ?? 0),
      MEM: occupantPc(memoryStage?.instruction ?? null, memoryStage?.pc ?? 0),
      WB: occupantPc(writeback?.instruction ?? null, writeback?.pc ?? 0),
    };

    const { retired } = this.wbStage.run(writeback, state);
    this.statistics.beginCycle(retired !== null);
    if (retired) {
      this.telemetry.recordRetirement(retired.pc, cycle);
    }

    const hazard = this.hazardUnit.detect(decoding, executing, memoryStage, writeback, {
      forwardingEnabled: this.forwardingEnabled,
    });
    this.statistics.recordDecodeStall(hazard.reason);
    events.stall = hazard.stall;
    events.stallReason = hazard.reason;
    events.hazard = hazard.detail;

    const { executed, operandA, operandB, event } = this.exStage.run({
      executing,
      memoryStage,
      writeback,
      forwarding: this.forwardingUnit,
      forwardingEnabled: this.forwardingEnabled,
    });
    events.forwarding = { operandA: operandA.source, operandB: operandB.source };
    this.telemetry.recordAddressEvent(cycle, event);
    this.exMem.setNext(executed);

    const { written, access } = this.memStage.run(memoryStage, this.memory);
    this.telemetry.recordAddressEvent(cycle, access);
    this.memWb.setNext(written);

    this.idEx.setNext(this.idStage.run({ decoding, decodeStall: hazard.stall, state }));

    const structuralStall = this.hazardUnit.detectStructural(memoryStage, {
      structuralHazardsEnabled: this.structuralHazardsEnabled,
    });
    if (structuralStall) {
      this.statistics.recordStructuralStall();
      events.structuralStall = true;
    }

    const fetch = this.ifStage.run({
      fetchPc,
      program: this.program,
      predictor: this.predictor,
      decodeStall: hazard.stall,
      structuralStall,
      previousDecoding: decoding,
    });
    let nextPc = fetch.nextPc;
    this.ifId.setNext(fetch.fetched);

    // Branch resolution overrides whatever fetch decided this cycle.
    if (executed && executed.instruction.opcode === "beq") {
      const taken = executed.branchTaken;
      this.predictor.update(executed.pc, taken);

      const redirectPc =
        taken === executed.predictedTaken ? null : taken ? executed.branchTarget : executed.pc + 1;
      events.branchTaken = taken;
      events.branch = {
        pc: executed.pc,
        taken,
        predictedTaken: executed.predictedTaken,
        target: executed.branchTarget,
        redirectPc,
      };

      if (redirectPc !== null) {
        this.statistics.recordMispredict();
        events.mispredict = true;
        events.flushed = true;
        nextPc = redirectPc;
        // Both wrong-path instructions go: the one just decoded and the one just fetched.
        this.idEx.setNext(null);
        this.ifId.setNext(null);
      }
    }

    this.memWb.advance();
    this.exMem.advance();
    this.idEx.advance();
    this.ifId.advance();
    state.setProgramCounter(nextPc);
    state.advanceCycle();
    state.clearZeroRegister();

    this.statistics.observePipeline(this.getLatches());
    const row = this.telemetry.recordCycle(cycle, occupancy);
    this.lastEvents = events;

    const stages = this.toStageText(row);
    this.events.publish(this.createSnapshot(stages, occupancy));
    return stages;
  }

  run(cycles: number): void {
    const count = assertCycleCount("cycles", cycles);
    for (let i = 0; i < count; i++) {
      this.step();
    }
  }

  /** Steps until every latch is empty and fetch has left the program. Returns the cycles executed. */
  runUntilDrained(limit = DEFAULT_DRAIN_LIMIT): number {
    const maxCycles = assertCycleCount("limit", limit);
    let cycles = 0;
    while (!this.isDrained() && cycles < maxCycles) {
      this.step();
      cycles += 1;
    }
    return cycles;
  }

  isDrained(): boolean {
    return (
      this.state.getProgramCounter() >= this.program.length &&
      this.ifId.isEmpty() &&
      this.idEx.isEmpty() &&
      this.exMem.isEmpty() &&
      this.memWb.isEmpty()
    );
  }

  /** Direct data-memory write for test and demo setup; only meaningful between cycles. */
  writeMemory(address: number, value: number): void {
    this.memory.writeWord(address, value);
  }

  setForwardingEnabled(enabled: boolean): void {
    this.forwardingEnabled = enabled;
  }

  getForwardingEnabled(): boolean {
    return this.forwardingEnabled;
  }

  setStructuralHazardsEnabled(enabled: boolean): void {
    this.structuralHazardsEnabled = enabled;
  }

  getStructuralHazardsEnabled(): boolean {
    return this.structuralHazardsEnabled;
  }

  setPredictorMode(mode: PredictorMode): void {
    this.predictor.setMode(mode);
  }

  getPredictorMode(): PredictorMode {
    return this.predictor.getMode();
  }

  applySettings(settings: SimulatorSettings): void {
    this.setForwardingEnabled(settings.forwardingEnabled);
    this.setStructuralHazardsEnabled(settings.structuralHazardsEnabled);
    this.setPredictorMode(settings.predictorMode);
  }

  getSettings(): SimulatorSettings {
    return {
      forwardingEnabled: this.forwardingEnabled,
      structuralHazardsEnabled: this.structuralHazardsEnabled,
      predictorMode: this.predictor.getMode(),
    };
  }

  getProgram(): Program {
    return this.program;
  }

  getProgramCounter(): number {
    return this.state.getProgramCounter();
  }

  getCycle(): number {
    return this.state.getCycle();
  }

  getRegister(index: number): number {
    return this.state.getRegister(index);
  }

  getRegisters(): number[] {
    return this.state.getRegisters();
  }

  readMemory(address: number): number {
    return this.memory.readWord(address);
  }

  getMemoryEntries(): MemoryEntry[] {
    return this.memory.entries();
  }

  getLatches(): LatchSet {
    return {
      ifId: this.ifId.getCurrent(),
      idEx: this.idEx.getCurrent(),
      exMem: this.exMem.getCurrent(),
      memWb: this.memWb.getCurrent(),
    };
  }

  /** Control signals for the instruction waiting in ID. */
  getControlSignals(): ControlSignals {
    return decodeControlSignals(this.ifId.getCurrent()?.instruction ?? null);
  }

  getLastEvents(): CycleEvents {
    return this.lastEvents;
  }

  getStatistics(): PipelineStatisticsSnapshot {
    return this.statistics.getSnapshot();
  }

  getCpiBreakdown(): CpiBreakdown {
    return this.statistics.getCpiBreakdown();
  }

  getStallBreakdown(): StallBreakdownEntry[] {
    return this.statistics.getStallBreakdown();
  }

  getProgramStatus(): InstructionStatus[] {
    return this.telemetry.getProgramStatus();
  }

  getInFlight(): InFlightInstruction[] {
    return [this.ifId, this.idEx, this.exMem, this.memWb].flatMap((register) => {
      const payload = register.getCurrent();
      return payload ? [{ latch: register.name, pc: payload.pc, text: this.telemetry.textAt(payload.pc) }] : [];
    });
  }

  getPredictorTable(): PredictorTableRow[] {
    return this.predictor.entries().map(({ pc, taken }) => ({
      pc,
      text: instructionText(this.program[pc]),
      prediction: taken ? "T" : "NT",
    }));
  }

  getAddressLog(lastN?: number): AddressLogEntry[] {
    return this.telemetry.getAddressLog(lastN);
  }

  getTimeline(maxCycles?: number): TimelineWindow {
    return this.telemetry.getTimeline(maxCycles);
  }

  getStageUtilization(): StageUtilization {
    return this.telemetry.getStageUtilization();
  }

  getTrace(): readonly TraceRow[] {
    return this.telemetry.getTrace();
  }

  subscribe(listener: PipelineListener): () => void {
    return this.events.subscribe(listener);
  }

  getLatestSnapshot(): PipelineSnapshot {
    return this.events.getLatest();
  }

  private idleStages(): StageTextSnapshot {
    return { IF: BUBBLE_TEXT, ID: BUBBLE_TEXT, EX: BUBBLE_TEXT, MEM: BUBBLE_TEXT, WB: BUBBLE_TEXT };
  }

  private toStageText(row: TraceRow): StageTextSnapshot {
    return { IF: row.IF, ID: row.ID, EX: row.EX, MEM: row.MEM, WB: row.WB };
  }

  private createSnapshot(
    stages: StageTextSnapshot,
    occupancy: StageOccupancy = { IF: null, ID: null, EX: null, MEM: null, WB: null },
  ): PipelineSnapshot {
    return {
      cycle: this.state.getCycle(),
      pc: this.state.getProgramCounter(),
      stages,
      occupancy,
      events: this.lastEvents,
      statistics: this.statistics.getSnapshot(),
      forwardingEnabled: this.forwardingEnabled,
      structuralHazardsEnabled: this.structuralHazardsEnabled,
      predictorMode: this.predictor.getMode(),
    };
  }
}
