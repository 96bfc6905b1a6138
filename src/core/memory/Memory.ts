export interface MemoryEntry {
  address: number;
  value: number;
}

/**
 * Sparse word-addressed data memory. Any integer is a valid address and
 * unset addresses read as zero; there is no alignment or bounds checking.
 */
export class Memory {
  private readonly words = new Map<number, number>();

  reset(): void {
    this.words.clear();
  }

  readWord(address: number): number {
    return this.words.get(this.validateAddress(address)) ?? 0;
  }

  writeWord(address: number, value: number): void {
    this.words.set(this.validateAddress(address), value | 0);
  }

  entries(): MemoryEntry[] {
    return Array.from(this.words, ([address, value]) => ({ address, value })).sort((a, b) => a.address - b.address);
  }

  private validateAddress(address: number): number {
    if (!Number.isInteger(address)) {
      throw new RangeError(`Invalid memory address: ${address}`);
    }
    return address;
  }
}
