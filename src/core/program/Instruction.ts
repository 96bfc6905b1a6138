export type Opcode = "nop" | "add" | "sub" | "lw" | "sw" | "beq";

export const OPCODES: readonly Opcode[] = ["nop", "add", "sub", "lw", "sw", "beq"];

interface InstructionBase {
  /** Sequence id assigned in textual order at parse time. */
  readonly id: number;
  /** 1-based line number in the assembly source. */
  readonly line: number;
  readonly text: string;
}

export interface NopInstruction extends InstructionBase {
  readonly opcode: "nop";
}

export interface ArithmeticInstruction extends InstructionBase {
  readonly opcode: "add" | "sub";
  readonly rd: number;
  readonly rs1: number;
  readonly rs2: number;
}

export interface LoadInstruction extends InstructionBase {
  readonly opcode: "lw";
  readonly rd: number;
  readonly rs1: number;
  readonly imm: number;
}

export interface StoreInstruction extends InstructionBase {
  readonly opcode: "sw";
  readonly rs1: number;
  readonly rs2: number;
  readonly imm: number;
}

export interface BranchInstruction extends InstructionBase {
  readonly opcode: "beq";
  readonly rs1: number;
  readonly rs2: number;
  /** Absolute program index; equal to the program length when it falls off the end. */
  readonly target: number;
}

export type Instruction =
  | NopInstruction
  | ArithmeticInstruction
  | LoadInstruction
  | StoreInstruction
  | BranchInstruction;

export type Program = readonly Instruction[];

export const BUBBLE_TEXT = "NOP";

export function isOpcode(value: string): value is Opcode {
  return OPCODES.some((opcode) => opcode === value);
}

export function sourceRegisters(instruction: Instruction): number[] {
  switch (instruction.opcode) {
    case "nop":
      return [];
    case "add":
    case "sub":
    case "beq":
    case "sw":
      return [instruction.rs1, instruction.rs2];
    case "lw":
      return [instruction.rs1];
  }
}

export function destinationRegister(instruction: Instruction): number | null {
  switch (instruction.opcode) {
    case "add":
    case "sub":
    case "lw":
      return instruction.rd;
    case "nop":
    case "sw":
    case "beq":
      return null;
  }
}

export function writesRegister(instruction: Instruction): boolean {
  return destinationRegister(instruction) !== null;
}

/** Register 0 is never considered read, since it cannot carry a dependency. */
export function readsRegister(instruction: Instruction, register: number): boolean {
  if (register === 0) return false;
  return sourceRegisters(instruction).includes(register);
}

export function isMemoryAccess(instruction: Instruction): boolean {
  return instruction.opcode === "lw" || instruction.opcode === "sw";
}

export function instructionText(instruction: Instruction | null | undefined): string {
  if (!instruction || instruction.opcode === "nop") return BUBBLE_TEXT;
  return instruction.text;
}
