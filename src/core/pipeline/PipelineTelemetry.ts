import { instructionText, type Program } from "../program/Instruction";
import type { ExecuteEvent } from "./EXStage";
import type { MemoryAccess } from "./MEMStage";
import { STAGES, type StageName, type StageOccupancy, type StageTextSnapshot } from "./PipelineTypes";

export type AddressLogEntry = (ExecuteEvent | MemoryAccess) & { cycle: number };

export interface TraceRow extends StageTextSnapshot {
  cycle: number;
}

export interface InstructionStatus {
  pc: number;
  text: string;
  lastStage: StageName | "-";
  retired: boolean;
  retireCycle: number | null;
}

export interface TimelineWindow {
  cycles: number[];
  rows: string[];
  /** cells[pc][column] is a stage letter (I, D, E, M, W) or "." */
  cells: string[][];
}

export type StageUtilization = Record<StageName, number>;

const STAGE_LETTERS: Record<StageName, string> = { IF: "I", ID: "D", EX: "E", MEM: "M", WB: "W" };

export const DEFAULT_TIMELINE_CYCLES = 60;
export const DEFAULT_ADDRESS_LOG_ENTRIES = 80;

/**
 * Read-side bookkeeping for the engine. Nothing here feeds back into control
 * decisions; it only records what each cycle did.
 */
export class PipelineTelemetry {
  private program: Program = [];
  private readonly occupancy: Array<{ cycle: number; stages: StageOccupancy }> = [];
  private readonly trace: TraceRow[] = [];
  private readonly addressLog: AddressLogEntry[] = [];
  private status: InstructionStatus[] = [];

  reset(program: Program): void {
    this.program = program;
    this.occupancy.length = 0;
    this.trace.length = 0;
    this.addressLog.length = 0;
    this.status = program.map((instruction, pc) => ({
      pc,
      text: instructionText(instruction),
      lastStage: "-",
      retired: false,
      retireCycle: null,
    }));
  }

  textAt(pc: number | null): string {
    return instructionText(pc === null ? null : this.program[pc]);
  }

  recordRetirement(pc: number, cycle: number): void {
    const entry = this.status[pc];
    if (!entry) return;
    entry.retired = true;
    entry.retireCycle = cycle;
    entry.lastStage = "WB";
  }

  recordAddressEvent(cycle: number, event: ExecuteEvent | MemoryAccess | null): void {
    if (event) {
      this.addressLog.push({ ...event, cycle });
    }
  }

  recordCycle(cycle: number, stages: StageOccupancy): TraceRow {
    this.occupancy.push({ cycle, stages });

    for (const stage of STAGES) {
      const pc = stages[stage];
      const entry = pc === null ? undefined : this.status[pc];
      if (entry) entry.lastStage = stage;
    }

    const row: TraceRow = {
      cycle,
      IF: this.textAt(stages.IF),
      ID: this.textAt(stages.ID),
      EX: this.textAt(stages.EX),
      MEM: this.textAt(stages.MEM),
      WB: this.textAt(stages.WB),
    };
    this.trace.push(row);
    return row;
  }

  getTrace(): readonly TraceRow[] {
    return this.trace;
  }

  getAddressLog(lastN = DEFAULT_ADDRESS_LOG_ENTRIES): AddressLogEntry[] {
    return lastN <= 0 ? [] : this.addressLog.slice(-lastN);
  }

  getProgramStatus(): InstructionStatus[] {
    return this.status.map((entry) => ({ ...entry }));
  }

  getTimeline(maxCycles = DEFAULT_TIMELINE_CYCLES): TimelineWindow {
    const window = maxCycles <= 0 ? [] : this.occupancy.slice(-maxCycles);
    const cells = this.program.map(() => window.map(() => "."));

    window.forEach(({ stages }, column) => {
      for (const stage of STAGES) {
        const pc = stages[stage];
        if (pc !== null && cells[pc]) {
          cells[pc][column] = STAGE_LETTERS[stage];
        }
      }
    });

    return {
      cycles: window.map(({ cycle }) => cycle),
      rows: this.status.map((entry) => entry.text),
      cells,
    };
  }

  getStageUtilization(): StageUtilization {
    const total = Math.max(1, this.occupancy.length);
    const busy = (stage: StageName) => this.occupancy.filter(({ stages }) => stages[stage] !== null).length / total;
    return { IF: busy("IF"), ID: busy("ID"), EX: busy("EX"), MEM: busy("MEM"), WB: busy("WB") };
  }
}
