import {
  destinationRegister,
  isMemoryAccess,
  readsRegister,
  sourceRegisters,
  type Instruction,
  type Opcode,
} from "../program/Instruction";
import type { ExMemLatch, IdExLatch, IfIdLatch, MemWbLatch } from "./PipelineTypes";

export type DecodeStallReason = "lw-use" | "RAW vs EX" | "RAW vs MEM" | "RAW vs WB";
export type StallReason = DecodeStallReason | "structural";

export interface HazardDetail {
  producerPc: number | null;
  producerOpcode: Opcode | null;
  producerRd: number | null;
  consumerOpcode: Opcode;
  consumerReads: number[];
}

export interface DecodeHazard {
  stall: boolean;
  reason: DecodeStallReason | null;
  detail: HazardDetail | null;
}

export const NO_HAZARD: DecodeHazard = { stall: false, reason: null, detail: null };

interface Producer {
  instruction: Instruction;
  pc: number;
}

/** Returns the register a producer would write that the consumer reads, or null. */
export function conflictingRegister(producer: Instruction, consumer: Instruction): number | null {
  const destination = destinationRegister(producer);
  if (destination === null || destination === 0) return null;
  return readsRegister(consumer, destination) ? destination : null;
}

export class HazardUnit {
  /**
   * Decides whether the instruction in ID must stall this cycle. With
   * forwarding only a load in EX can force a stall; without it any pending
   * writer in EX, EX/MEM or MEM/WB does.
   */
  detect(
    decoding: IfIdLatch,
    executing: IdExLatch,
    memoryStage: ExMemLatch,
    writeback: MemWbLatch,
    options?: { forwardingEnabled?: boolean },
  ): DecodeHazard {
    if (!decoding) return NO_HAZARD;

    const consumer = decoding.instruction;
    const forwardingEnabled = options?.forwardingEnabled ?? true;
    const describe = (producer: Producer | null): HazardDetail => ({
      producerPc: producer?.pc ?? null,
      producerOpcode: producer?.instruction.opcode ?? null,
      producerRd: producer ? destinationRegister(producer.instruction) : null,
      consumerOpcode: consumer.opcode,
      consumerReads: sourceRegisters(consumer),
    });

    if (forwardingEnabled) {
      if (executing && executing.instruction.opcode === "lw" && conflictingRegister(executing.instruction, consumer) !== null) {
        return { stall: true, reason: "lw-use", detail: describe(executing) };
      }
      return { stall: false, reason: null, detail: describe(executing) };
    }

    const candidates: Array<[DecodeStallReason, Producer | null]> = [
      ["RAW vs EX", executing],
      ["RAW vs MEM", memoryStage],
      ["RAW vs WB", writeback],
    ];

    for (const [reason, producer] of candidates) {
      if (producer && conflictingRegister(producer.instruction, consumer) !== null) {
        return { stall: true, reason, detail: describe(producer) };
      }
    }

    return { stall: false, reason: null, detail: describe(executing) };
  }

  /**
   * A single memory port is shared between fetch and data access. The check
   * looks at the instruction about to enter MEM (the current EX/MEM latch).
   */
  detectStructural(memoryStage: ExMemLatch, options?: { structuralHazardsEnabled?: boolean }): boolean {
    if (!(options?.structuralHazardsEnabled ?? false)) return false;
    return memoryStage !== null && isMemoryAccess(memoryStage.instruction);
  }
}
