/**
 * One-way byte-count observer.
 *
 * The record source is its only writer; other components read `size()`
 * snapshots.
 */
export interface SizeTracker {
  add(bytes: number): void;
  size(): number;
}
