import type { Instruction } from "../program/Instruction";

export interface ControlSignals {
  RegWrite: boolean;
  MemRead: boolean;
  MemWrite: boolean;
  MemToReg: boolean;
  Branch: boolean;
  ALUSrc: "reg" | "imm";
  ALUOp: "add" | "sub";
}

const IDLE_SIGNALS: ControlSignals = {
  RegWrite: false,
  MemRead: false,
  MemWrite: false,
  MemToReg: false,
  Branch: false,
  ALUSrc: "reg",
  ALUOp: "add",
};

// beq compares by subtraction, so it drives the ALU like sub.
export function decodeControlSignals(instruction: Instruction | null): ControlSignals {
  if (!instruction) return { ...IDLE_SIGNALS };

  switch (instruction.opcode) {
    case "nop":
      return { ...IDLE_SIGNALS };
    case "add":
    case "sub":
      return { ...IDLE_SIGNALS, RegWrite: true, ALUOp: instruction.opcode };
    case "lw":
      return { ...IDLE_SIGNALS, RegWrite: true, MemRead: true, MemToReg: true, ALUSrc: "imm" };
    case "sw":
      return { ...IDLE_SIGNALS, MemWrite: true, ALUSrc: "imm" };
    case "beq":
      return { ...IDLE_SIGNALS, Branch: true, ALUOp: "sub" };
  }
}
