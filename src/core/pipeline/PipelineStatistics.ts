import type { StallReason } from "./HazardUnit";
import type { LatchSet } from "./PipelineTypes";

export interface PipelineStatisticsSnapshot {
  cycleCount: number;
  retired: number;
  /** Stalled cycles: decode and structural stalls each count once per cycle. */
  stalls: number;
  /** Distinct hazards that stalled decode, however many cycles each lasted. */
  stallEvents: number;
  structuralStalls: number;
  flushes: number;
  mispredicts: number;
  bubbleCount: number;
  cpi: number;
  ipc: number;
  bubbleRate: number;
}

export interface CpiBreakdown {
  cycles: number;
  usefulPct: number;
  stallPct: number;
  flushPct: number;
  mispredicts: number;
}

export interface StallBreakdownEntry {
  reason: StallReason;
  count: number;
}

export class PipelineStatistics {
  private cycleCount = 0;
  private retired = 0;
  private stalls = 0;
  private stallEvents = 0;
  private structuralStalls = 0;
  private flushes = 0;
  private mispredicts = 0;
  private bubbleCount = 0;
  private previousDecodeStall = false;
  private readonly stallReasons = new Map<StallReason, number>();

  beginCycle(retiredInstruction: boolean): void {
    this.cycleCount += 1;
    if (retiredInstruction) {
      this.retired += 1;
    }
  }

  recordDecodeStall(reason: StallReason | null): void {
    if (!reason) {
      this.previousDecodeStall = false;
      return;
    }

    this.stalls += 1;
    if (!this.previousDecodeStall) {
      this.stallEvents += 1;
    }
    this.previousDecodeStall = true;
    this.countReason(reason);
  }

  recordStructuralStall(): void {
    this.stalls += 1;
    this.structuralStalls += 1;
    this.countReason("structural");
  }

  /** A resolved branch disagreed with the prediction it carried and the wrong path was squashed. */
  recordMispredict(): void {
    this.mispredicts += 1;
    this.flushes += 1;
  }

  observePipeline(latches: LatchSet): void {
    this.bubbleCount += Object.values(latches).filter((payload) => payload === null).length;
  }

  reset(): void {
    this.cycleCount = 0;
    this.retired = 0;
    this.stalls = 0;
    this.stallEvents = 0;
    this.structuralStalls = 0;
    this.flushes = 0;
    this.mispredicts = 0;
    this.bubbleCount = 0;
    this.previousDecodeStall = false;
    this.stallReasons.clear();
  }

  getSnapshot(): PipelineStatisticsSnapshot {
    const slots = this.cycleCount * 4;

    return {
      cycleCount: this.cycleCount,
      retired: this.retired,
      stalls: this.stalls,
      stallEvents: this.stallEvents,
      structuralStalls: this.structuralStalls,
      flushes: this.flushes,
      mispredicts: this.mispredicts,
      bubbleCount: this.bubbleCount,
      cpi: this.retired === 0 ? 0 : this.cycleCount / this.retired,
      ipc: this.cycleCount === 0 ? 0 : this.retired / this.cycleCount,
      bubbleRate: slots === 0 ? 0 : this.bubbleCount / slots,
    };
  }

  getCpiBreakdown(): CpiBreakdown {
    const cycles = Math.max(1, this.cycleCount);
    return {
      cycles,
      usefulPct: (this.retired / cycles) * 100,
      stallPct: (this.stalls / cycles) * 100,
      flushPct: (this.flushes / cycles) * 100,
      mispredicts: this.mispredicts,
    };
  }

  /** Sorted by count, most frequent first, then by reason name. */
  getStallBreakdown(): StallBreakdownEntry[] {
    return Array.from(this.stallReasons, ([reason, count]) => ({ reason, count })).sort(
      (a, b) => b.count - a.count || (a.reason < b.reason ? -1 : a.reason > b.reason ? 1 : 0),
    );
  }

  private countReason(reason: StallReason): void {
    this.stallReasons.set(reason, (this.stallReasons.get(reason) ?? 0) + 1);
  }
}
