import type { Instruction } from "../program/Instruction";

export type StageName = "IF" | "ID" | "EX" | "MEM" | "WB";

export const STAGES: readonly StageName[] = ["IF", "ID", "EX", "MEM", "WB"];

export type LatchName = "IF/ID" | "ID/EX" | "EX/MEM" | "MEM/WB";

export interface IfIdPayload {
  readonly instruction: Instruction;
  readonly pc: number;
  readonly predictedTaken: boolean;
}

export interface IdExPayload {
  readonly instruction: Instruction;
  readonly pc: number;
  readonly rs1: number;
  readonly rs2: number;
  readonly rd: number;
  readonly imm: number;
  readonly value1: number;
  readonly value2: number;
  readonly predictedTaken: boolean;
}

export interface ExMemPayload {
  readonly instruction: Instruction;
  readonly pc: number;
  readonly rd: number;
  readonly aluResult: number;
  readonly storeValue: number;
  readonly branchTaken: boolean;
  readonly branchTarget: number;
  readonly predictedTaken: boolean;
}

export interface MemWbPayload {
  readonly instruction: Instruction;
  readonly pc: number;
  readonly rd: number;
  readonly aluResult: number;
  readonly memoryValue: number;
  readonly writebackValue: number;
}

// A null payload is a bubble.
export type IfIdLatch = IfIdPayload | null;
export type IdExLatch = IdExPayload | null;
export type ExMemLatch = ExMemPayload | null;
export type MemWbLatch = MemWbPayload | null;

export interface LatchSet {
  readonly ifId: IfIdLatch;
  readonly idEx: IdExLatch;
  readonly exMem: ExMemLatch;
  readonly memWb: MemWbLatch;
}

export type StageOccupancy = Record<StageName, number | null>;
export type StageTextSnapshot = Record<StageName, string>;
