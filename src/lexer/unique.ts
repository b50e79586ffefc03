import { HandleExhaustionError } from "../errors/internal.js";

/**
 * Handle assigned to one distinct identifier spelling within a lexing session.
 * Only equality and ordering are exposed; handles are not numbers.
 */
export class Unique {
  private constructor(private readonly index: number) {}

  static of(index: number): Unique {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new RangeError(`Unique must be a non-negative safe integer, got ${index}`);
    }
    return new Unique(index);
  }

  /** The handle allocated after this one. */
  succ(): Unique {
    if (this.index === Number.MAX_SAFE_INTEGER) {
      throw new HandleExhaustionError(this.index);
    }
    return new Unique(this.index + 1);
  }

  equals(other: Unique): boolean {
    return this.index === other.index;
  }

  compare(other: Unique): number {
    return this.index < other.index ? -1 : this.index > other.index ? 1 : 0;
  }

  // For JSON output and similar boundaries only.
  toNumber(): number {
    return this.index;
  }

  toString(): string {
    return String(this.index);
  }
}
