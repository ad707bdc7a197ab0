// src/core/memory/globalMemory.ts
// Fixed-size integer cells shared by every stack

import type { Outcome } from "../../outcome/outcome";
import { ok, indexOutOfRange } from "../../outcome/constructors";

export const DEFAULT_MEMORY_SIZE = 1024;

/**
 * GlobalMemory: zero-initialised, never resized.
 * Each read or write is a single synchronous step, so it runs whole
 * inside whichever stack critical section issued it.
 */
export class GlobalMemory {
  private readonly cells: bigint[];

  constructor(readonly size: number = DEFAULT_MEMORY_SIZE) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`memory size must be a positive integer, got ${size}`);
    }
    this.cells = new Array<bigint>(size).fill(0n);
  }

  address(addr: bigint | number): Outcome<number> {
    const n = typeof addr === "bigint" ? addr : BigInt(Math.trunc(addr));
    if (n < 0n || n >= BigInt(this.size)) {
      return indexOutOfRange(n, this.size, "address");
    }
    return ok(Number(n));
  }

  read(addr: bigint | number): Outcome<bigint> {
    const checked = this.address(addr);
    if (checked.tag === "Fail") return checked;
    return ok(this.cells[checked.value]);
  }

  write(addr: bigint | number, value: bigint): Outcome<void> {
    const checked = this.address(addr);
    if (checked.tag === "Fail") return checked;
    this.cells[checked.value] = value;
    return ok(undefined);
  }

  /** Copy of `count` cells starting at `from`, clipped to the array. */
  slice(from = 0, count = this.size): bigint[] {
    return this.cells.slice(Math.max(0, from), Math.max(0, from) + Math.max(0, count));
  }

  reset(): void {
    this.cells.fill(0n);
  }
}
