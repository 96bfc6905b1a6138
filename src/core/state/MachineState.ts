// Architectural state of the pipeline: the 32-entry register file, the
// program counter (an index into the program, not a byte address) and the
// cycle counter. Register 0 is hardwired to zero.

export class MachineState {
  static readonly REGISTER_COUNT = 32;

  private readonly registers: Int32Array;
  private programCounter: number;
  private cycle: number;

  constructor() {
    this.registers = new Int32Array(MachineState.REGISTER_COUNT);
    this.programCounter = 0;
    this.cycle = 0;
  }

  reset(): void {
    this.registers.fill(0);
    this.programCounter = 0;
    this.cycle = 0;
  }

  getRegister(index: number): number {
    this.validateRegisterIndex(index);
    return index === 0 ? 0 : this.registers[index];
  }

  setRegister(index: number, value: number): void {
    this.validateRegisterIndex(index);
    if (index === 0) return; // x0 is immutable
    this.registers[index] = this.toInt32(value);
  }

  getRegisters(): number[] {
    return Array.from(this.registers);
  }

  /** Re-asserts the hardwired zero at the end of every cycle. */
  clearZeroRegister(): void {
    this.registers[0] = 0;
  }

  getProgramCounter(): number {
    return this.programCounter;
  }

  setProgramCounter(value: number): void {
    this.programCounter = value;
  }

  getCycle(): number {
    return this.cycle;
  }

  advanceCycle(): number {
    this.cycle += 1;
    return this.cycle;
  }

  private validateRegisterIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= MachineState.REGISTER_COUNT) {
      throw new RangeError(`Register index out of bounds: ${index}`);
    }
  }

  private toInt32(value: number): number {
    return value | 0;
  }
}
