import { isOpcode, type Instruction, type Program } from "../program/Instruction";
import { Lexer, type SourceLine } from "./Lexer";
import { Parser } from "./Parser";

type LabelTable = Map<string, number>;

/**
 * Two-pass assembler for the pipeline's instruction subset.
 *
 * Pass one assigns every label the index of the instruction that follows it.
 * Pass two builds frozen instruction records with branch labels resolved to
 * absolute indices. A failure anywhere aborts the whole parse.
 */
export class Assembler {
  private readonly lexer = new Lexer();

  assemble(source: string): Program {
    const lines = this.lexer.tokenize(source);
    const instructionLines = lines.filter((line) => line.kind === "instruction");
    const labels = this.collectLabels(lines);

    const program = instructionLines.map((line, index) =>
      Object.freeze(this.buildInstruction(line, index, labels, instructionLines.length)),
    );
    return Object.freeze(program);
  }

  private collectLabels(lines: SourceLine[]): LabelTable {
    const labels: LabelTable = new Map();
    let instructionCount = 0;

    for (const line of lines) {
      if (line.kind === "instruction") {
        instructionCount += 1;
        continue;
      }

      const parser: Parser = new Parser(line);
      const name = line.tokens[0];
      if (!name) parser.fail("Empty label name");
      if (labels.has(name)) parser.fail(`Duplicate label '${name}'`);
      labels.set(name, instructionCount);
    }

    return labels;
  }

  private buildInstruction(line: SourceLine, id: number, labels: LabelTable, programLength: number): Instruction {
    const parser: Parser = new Parser(line);
    const mnemonic = line.tokens[0].toLowerCase();
    const base = { id, line: line.line, text: line.text };

    if (!isOpcode(mnemonic)) {
      parser.fail(`Unsupported opcode '${line.tokens[0]}'`);
    }

    switch (mnemonic) {
      case "nop":
        parser.expectArity(mnemonic, 0);
        return { ...base, opcode: mnemonic };
      case "add":
      case "sub": {
        const [rd, rs1, rs2] = parser.expectArity(mnemonic, 3);
        return {
          ...base,
          opcode: mnemonic,
          rd: parser.parseRegister(rd),
          rs1: parser.parseRegister(rs1),
          rs2: parser.parseRegister(rs2),
        };
      }
      case "lw": {
        const [rd, address] = parser.expectArity(mnemonic, 2);
        const destination = parser.parseRegister(rd);
        const { base: rs1, offset } = parser.parseMemoryOperand(address);
        return { ...base, opcode: mnemonic, rd: destination, rs1, imm: offset };
      }
      case "sw": {
        const [rs2, address] = parser.expectArity(mnemonic, 2);
        const value = parser.parseRegister(rs2);
        const { base: rs1, offset } = parser.parseMemoryOperand(address);
        return { ...base, opcode: mnemonic, rs1, rs2: value, imm: offset };
      }
      case "beq": {
        const [rs1, rs2, label] = parser.expectArity(mnemonic, 3);
        const first = parser.parseRegister(rs1);
        const second = parser.parseRegister(rs2);
        const target = labels.get(label) ?? parser.tryParseImmediate(label);
        if (target === null) {
          parser.fail(`Unknown label '${label}'`);
        }
        if (target < 0 || target > programLength) {
          parser.fail(`Branch target ${target} is outside the program (0..${programLength})`);
        }
        return { ...base, opcode: mnemonic, rs1: first, rs2: second, target };
      }
    }
  }
}

export function assemble(source: string): Program {
  return new Assembler().assemble(source);
}

export const parseProgram = assemble;
