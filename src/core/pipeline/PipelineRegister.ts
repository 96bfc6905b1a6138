import type { LatchName } from "./PipelineTypes";

/**
 * An inter-stage latch holding one frozen payload or a bubble (null). Stages
 * read the payload latched at the end of the previous cycle and stage its
 * replacement; the engine commits all four latches together.
 */
export class PipelineRegister<T extends { readonly pc: number }> {
  private current: T | null = null;
  private next: T | null = null;

  constructor(readonly name: LatchName) {}

  getCurrent(): T | null {
    return this.current;
  }

  setNext(payload: T | null): void {
    this.next = payload;
  }

  /** Latches the staged payload; anything not staged this cycle becomes a bubble. */
  advance(): void {
    this.current = this.next;
    this.next = null;
  }

  clear(): void {
    this.current = null;
    this.next = null;
  }

  isEmpty(): boolean {
    return this.current === null;
  }
}
