import { ProgramSyntaxError } from "../exceptions/ProgramExceptions";
import { MachineState } from "../state/MachineState";
import type { SourceLine } from "./Lexer";

export interface MemoryOperand {
  base: number;
  offset: number;
}

const REGISTER_PATTERN = /^x(0|[1-9]\d?)$/;
const IMMEDIATE_PATTERN = /^[+-]?(0x[0-9a-f]+|\d+)$/i;
const MEMORY_PATTERN = /^([^()]*)\(([^()]+)\)$/;

/**
 * Operand-level parsing. Every failure is reported against the source line it
 * came from so the caller can surface the offending text.
 */
export class Parser {
  constructor(private readonly line: SourceLine) {}

  fail(reason: string): never {
    throw new ProgramSyntaxError(reason, this.line.line, this.line.text);
  }

  expectArity(mnemonic: string, count: number): string[] {
    const operands = this.line.tokens.slice(1);
    if (operands.length !== count) {
      this.fail(`'${mnemonic}' expects ${count} operand${count === 1 ? "" : "s"}, got ${operands.length}`);
    }
    return operands;
  }

  parseRegister(token: string): number {
    const match = REGISTER_PATTERN.exec(token.trim().toLowerCase());
    const index = match ? Number.parseInt(match[1], 10) : Number.NaN;
    if (!Number.isInteger(index) || index < 0 || index >= MachineState.REGISTER_COUNT) {
      this.fail(`Unknown register '${token}'`);
    }
    return index;
  }

  parseImmediate(token: string): number {
    const value = this.tryParseImmediate(token);
    if (value === null) {
      this.fail(`Malformed immediate '${token}'`);
    }
    return value;
  }

  tryParseImmediate(token: string): number | null {
    const trimmed = token.trim();
    if (!IMMEDIATE_PATTERN.test(trimmed)) return null;

    const negative = trimmed.startsWith("-");
    const unsigned = trimmed.replace(/^[+-]/, "");
    const magnitude = /^0x/i.test(unsigned) ? Number.parseInt(unsigned.slice(2), 16) : Number.parseInt(unsigned, 10);
    return negative ? -magnitude : magnitude;
  }

  parseMemoryOperand(token: string): MemoryOperand {
    const match = MEMORY_PATTERN.exec(token.trim());
    if (!match) {
      this.fail(`Malformed address '${token}', expected offset(base)`);
    }

    const offsetText = match[1].trim();
    return {
      base: this.parseRegister(match[2]),
      offset: offsetText.length === 0 ? 0 : this.parseImmediate(offsetText),
    };
  }
}
