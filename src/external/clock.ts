import type { ChainClock } from "./types.js";

/** Height source driven by hand, for tests and the CLI sandbox. */
export class ManualClock implements ChainClock {
  constructor(private height = 0) {
    if (!Number.isInteger(height) || height < 0) {
      throw new RangeError(`Height must be a non-negative integer, got ${height}`);
    }
  }

  currentHeight(): number {
    return this.height;
  }

  advance(blocks = 1): number {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`Cannot advance by ${blocks} blocks`);
    }
    this.height += blocks;
    return this.height;
  }

  /** Heights only move forward. */
  setHeight(height: number): void {
    if (!Number.isInteger(height) || height < this.height) {
      throw new RangeError(`Cannot move height from ${this.height} to ${height}`);
    }
    this.height = height;
  }
}
