import type { PredictorMode } from "../pipeline/BranchPredictor";
import type { ForwardingSource } from "../pipeline/ForwardingUnit";
import type { HazardDetail, StallReason } from "../pipeline/HazardUnit";
import type { PipelineStatisticsSnapshot } from "../pipeline/PipelineStatistics";
import type { StageOccupancy, StageTextSnapshot } from "../pipeline/PipelineTypes";

export interface BranchOutcome {
  pc: number;
  taken: boolean;
  predictedTaken: boolean;
  target: number;
  /** Program counter fetch continues from after resolution. */
  redirectPc: number | null;
}

export interface CycleEvents {
  cycle: number;
  stall: boolean;
  stallReason: StallReason | null;
  hazard: HazardDetail | null;
  structuralStall: boolean;
  branch: BranchOutcome | null;
  branchTaken: boolean;
  mispredict: boolean;
  flushed: boolean;
  forwarding: { operandA: ForwardingSource; operandB: ForwardingSource };
}

export interface PipelineSnapshot {
  cycle: number;
  pc: number;
  stages: StageTextSnapshot;
  occupancy: StageOccupancy;
  events: CycleEvents;
  statistics: PipelineStatisticsSnapshot;
  forwardingEnabled: boolean;
  structuralHazardsEnabled: boolean;
  predictorMode: PredictorMode;
}

export type PipelineListener = (snapshot: PipelineSnapshot) => void;

export function createIdleEvents(cycle = 0): CycleEvents {
  return {
    cycle,
    stall: false,
    stallReason: null,
    hazard: null,
    structuralStall: false,
    branch: null,
    branchTaken: false,
    mispredict: false,
    flushed: false,
    forwarding: { operandA: "none", operandB: "none" },
  };
}

/**
 * Per-simulator publication point for cycle snapshots. New subscribers are
 * handed the latest snapshot straight away.
 */
export class PipelineEventChannel {
  private readonly listeners = new Set<PipelineListener>();

  constructor(private latest: PipelineSnapshot) {}

  publish(snapshot: PipelineSnapshot): void {
    this.latest = snapshot;
    this.listeners.forEach((listener) => this.notify(listener, snapshot));
  }

  subscribe(listener: PipelineListener): () => void {
    this.listeners.add(listener);
    this.notify(listener, this.latest);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getLatest(): PipelineSnapshot {
    return this.latest;
  }

  clear(): void {
    this.listeners.clear();
  }

  private notify(listener: PipelineListener, snapshot: PipelineSnapshot): void {
    try {
      listener(snapshot);
    } catch (error) {
      console.error("[pipelineEvents] Listener failed while handling a cycle snapshot:", error);
    }
  }
}
