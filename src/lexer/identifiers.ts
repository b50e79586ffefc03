import { Unique } from "./unique.js";

/**
 * Text-to-handle table for one lexing session. The same spelling anywhere in
 * the session maps to the same handle; there is no notion of scope here.
 *
 * The table is mutable and owned by a single lexer. Interleaving calls from
 * two scanners on one table breaks injectivity.
 */
export class IdentifierState {
  private readonly names = new Map<string, Unique>();
  private nextUnique: Unique;

  constructor(start: Unique) {
    this.nextUnique = start;
  }

  /** The handle the next unseen spelling will receive. */
  get next(): Unique {
    return this.nextUnique;
  }

  get size(): number {
    return this.names.size;
  }

  lookup(text: string): Unique | undefined {
    return this.names.get(text);
  }

  /** Entries in allocation order. */
  entries(): Array<[string, Unique]> {
    return [...this.names.entries()];
  }

  intern(text: string): Unique {
    const known = this.names.get(text);
    if (known !== undefined) return known;

    const unique = this.nextUnique;
    // succ() throws on exhaustion before anything is recorded
    const following = unique.succ();
    this.names.set(text, unique);
    this.nextUnique = following;
    return unique;
  }
}

export function emptyIdentifierState(): IdentifierState {
  return new IdentifierState(Unique.of(0));
}

/**
 * Starts a session whose handles begin at `start`. The caller picks `start`
 * above every handle that must stay distinct; nothing here checks it.
 */
export function identifierStateFrom(start: Unique): IdentifierState {
  return new IdentifierState(start);
}

export function internIdentifier(state: IdentifierState, text: string): Unique {
  return state.intern(text);
}
