import type { ConversionOutcome } from '../domain/model/Record.js';

/**
 * Reassembles decode-worker outputs into the emitted stream.
 *
 * The merge loop hands every outcome to `accept()` and forwards whatever it
 * returns. Workers call `admit()` before converting a record so an ordered
 * merger can cap how far ahead of the cursor work may run.
 */
export interface OutcomeMerger {
  readonly ordered: boolean;
  /** Outcomes received but not yet released for emission. */
  readonly buffered: number;
  /** Highest value `buffered` reached during the run. */
  readonly maxBuffered: number;
  /** Resolve once the record at `index` may be converted. */
  admit(index: number): Promise<void>;
  /** Take one outcome; return the outcomes that are now ready to emit, in emission order. */
  accept(outcome: ConversionOutcome): readonly ConversionOutcome[];
  /** Verify nothing is left behind once the outcome stream has ended. */
  finish(): void;
  /** Drop buffered outcomes and let every waiting worker through. */
  release(): void;
}

/** Forwards outcomes in completion order. */
export class UnorderedMerger implements OutcomeMerger {
  readonly ordered = false;
  readonly buffered = 0;
  readonly maxBuffered = 0;

  admit(): Promise<void> {
    return Promise.resolve();
  }

  accept(outcome: ConversionOutcome): readonly ConversionOutcome[] {
    return [outcome];
  }

  finish(): void {
    // nothing is ever held back
  }

  release(): void {
    // nothing is ever held back
  }
}

/**
 * Re-sequences outcomes by record index.
 *
 * Holds out-of-order outcomes keyed by index and releases them once every
 * lower index has been released. Records at or beyond `cursor + window` are
 * not admitted for conversion, so at most `window - 1` outcomes are ever
 * buffered no matter how long the input is.
 */
export class OrderedMerger implements OutcomeMerger {
  readonly ordered = true;
  private readonly pending = new Map<number, ConversionOutcome>();
  private readonly waiters = new Map<number, () => void>();
  private cursor = 0;
  private highWater = 0;
  private released = false;

  constructor(private readonly window: number) {
    if (!Number.isInteger(window) || window < 1) {
      throw new Error(`Reorder window must be a positive integer, got ${String(window)}`);
    }
  }

  get buffered(): number {
    return this.pending.size;
  }

  get maxBuffered(): number {
    return this.highWater;
  }

  /** Index of the next outcome to be released. */
  get nextIndex(): number {
    return this.cursor;
  }

  admit(index: number): Promise<void> {
    if (this.released || index < this.cursor + this.window) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.set(index, resolve);
    });
  }

  accept(outcome: ConversionOutcome): readonly ConversionOutcome[] {
    if (outcome.index < this.cursor || this.pending.has(outcome.index)) {
      throw new Error(`Duplicate outcome for record ${String(outcome.index)}`);
    }

    if (outcome.index !== this.cursor) {
      this.pending.set(outcome.index, outcome);
      this.highWater = Math.max(this.highWater, this.pending.size);
      return [];
    }

    const ready: ConversionOutcome[] = [outcome];
    this.cursor++;
    for (let next = this.pending.get(this.cursor); next; next = this.pending.get(this.cursor)) {
      this.pending.delete(this.cursor);
      ready.push(next);
      this.cursor++;
    }

    this.wake();
    return ready;
  }

  finish(): void {
    if (this.pending.size > 0) {
      throw new Error(
        `Outcome stream ended with ${String(this.pending.size)} outcome(s) waiting for record ${String(this.cursor)}`,
      );
    }
  }

  release(): void {
    this.released = true;
    this.pending.clear();
    for (const resolve of this.waiters.values()) {
      resolve();
    }
    this.waiters.clear();
  }

  private wake(): void {
    for (const [index, resolve] of this.waiters) {
      if (index < this.cursor + this.window) {
        this.waiters.delete(index);
        resolve();
      }
    }
  }
}

/** Pick the merger for a run. */
export function createMerger(ordered: boolean, window: number): OutcomeMerger {
  return ordered ? new OrderedMerger(window) : new UnorderedMerger();
}
