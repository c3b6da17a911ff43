import type { SizeTracker } from '../../domain/ports/SizeTracker.js';

/** In-memory `SizeTracker`. Counts bytes reported by a single writer. */
export class ByteCounter implements SizeTracker {
  private total = 0;

  add(bytes: number): void {
    this.total += bytes;
  }

  size(): number {
    return this.total;
  }
}
