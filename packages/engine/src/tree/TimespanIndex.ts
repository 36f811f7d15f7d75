/**
 * Timespan Index
 *
 * An interval tree that knows about owner groups and verticalities. This is
 * the entry point for analysis code: bulk-insert timespans, then ask for
 * the verticality at an offset or walk verticalities one at a time or in
 * sliding windows.
 *
 * ## Iterating while editing
 *
 * Verticality iteration asks the index for the next start offset only
 * after the previous verticality has been consumed. Inserting, removing or
 * splitting timespans between steps is fine and the next verticality
 * reflects the edit; this is how passes such as "merge neighbour tones"
 * are written.
 */

import type { GroupId, ITimespanPayload, Offset } from "@tessitura/contracts";
import {
  InvalidTimespanError,
  InvalidWindowSizeError,
  SplitUnsupportedError,
} from "@tessitura/contracts";
import { debugIndex } from "../debug";
import { Verticality, type IVerticalitySource } from "../verticality/Verticality";
import { VerticalitySequence } from "../verticality/VerticalitySequence";
import { IntervalTree } from "./IntervalTree";
import { Timespan } from "./Timespan";

/**
 * Options for `TimespanIndex.iterateVerticalitiesNwise`.
 */
export interface NwiseOptions {
  /**
   * Walk from the last verticality backwards. Each window is still ordered
   * earliest to latest.
   * @default false
   */
  reverse?: boolean;

  /**
   * Follow the real verticalities with `n - 1` empty sentinel verticalities
   * at the index's end time, so every verticality leads one window.
   * @default false
   */
  padEnd?: boolean;
}

const DEFAULT_NWISE: Required<NwiseOptions> = {
  reverse: false,
  padEnd: false,
};

export class TimespanIndex<P extends ITimespanPayload<P, V>, V = unknown>
  extends IntervalTree<P, V>
  implements IVerticalitySource<P, V>
{
  // === Verticalities ===

  /**
   * Classify everything happening at `offset`. Each timespan lands in
   * exactly one of start, stop or overlap.
   */
  getVerticalityAt(offset: Offset): Verticality<P, V> {
    const start = this.elementsStartingAt(offset);
    const stop = this.elementsStoppingAt(offset).filter((ts) => ts.offset < offset);
    const overlap = this.queryOverlapping(offset).filter((ts) => ts.offset < offset);
    return new Verticality(offset, { start, stop, overlap }, this);
  }

  /**
   * The verticality at `offset` when something starts there, otherwise the
   * one at the previous start offset (null when there is none).
   */
  getVerticalityAtOrBefore(offset: Offset): Verticality<P, V> | null {
    const verticality = this.getVerticalityAt(offset);
    if (verticality.startTimespans.length > 0) return verticality;
    return verticality.previousVerticality();
  }

  /**
   * Verticalities at every start offset, in order (or reverse order).
   * Lazy: each step looks up its successor in the index's current state.
   */
  *iterateVerticalities(reverse = false): Generator<Verticality<P, V>> {
    const first = reverse ? this.highestPosition() : this.lowestPosition();
    if (first === null) return;

    let verticality: Verticality<P, V> | null = this.getVerticalityAt(first);
    while (verticality !== null) {
      yield verticality;
      verticality = reverse
        ? verticality.previousVerticality()
        : verticality.nextVerticality();
    }
  }

  /**
   * Sliding windows of `n` consecutive verticalities. Indexes with fewer
   * than `n` start offsets produce no windows unless `padEnd` is set.
   *
   * @throws InvalidWindowSizeError immediately when `n` is not a positive integer
   */
  iterateVerticalitiesNwise(
    n = 3,
    options: NwiseOptions = {}
  ): Generator<VerticalitySequence<P, V>> {
    if (!Number.isInteger(n) || n <= 0) {
      throw new InvalidWindowSizeError(n);
    }
    const { reverse, padEnd } = { ...DEFAULT_NWISE, ...options };
    return this.windows(n, reverse, padEnd);
  }

  /**
   * Runs of verticalities that start and end on a boundary (as judged by
   * `isBoundary`) with at least one non-boundary verticality between them.
   * Consecutive runs share their boundary verticality.
   */
  *iterateBoundedVerticalities(
    isBoundary: (verticality: Verticality<P, V>) => boolean
  ): Generator<VerticalitySequence<P, V>> {
    let buffer: Verticality<P, V>[] | null = null;

    for (const verticality of this.iterateVerticalities()) {
      const boundary = isBoundary(verticality);
      if (buffer === null) {
        // Skip everything before the first boundary
        if (boundary) buffer = [verticality];
        continue;
      }
      buffer.push(verticality);
      if (boundary) {
        if (buffer.length > 2) yield new VerticalitySequence(buffer);
        buffer = [verticality];
      }
    }
  }

  // === Statistics ===

  /**
   * The most timespans sounding at once, counted at every start offset
   * under the half-open convention (zero-length timespans never sound).
   * Null for an empty index.
   */
  maximumOverlap(): number | null {
    let overlap: number | null = null;
    for (const verticality of this.iterateVerticalities()) {
      const sounding =
        verticality.startTimespans.filter((ts) => !ts.isZeroLength).length +
        verticality.overlapTimespans.length;
      if (overlap === null || sounding > overlap) overlap = sounding;
    }
    return overlap;
  }

  // === Groups ===

  /** Owner groups in timeline order of first appearance. */
  groups(): GroupId[] {
    const groups = new Set<GroupId>();
    for (const timespan of this) groups.add(timespan.ownerGroup);
    return [...groups];
  }

  /**
   * One new index per owner group, each holding only that group's
   * timespans and sharing this index's configuration.
   */
  partitionByGroup(): Map<GroupId, TimespanIndex<P, V>> {
    const partitions = new Map<GroupId, TimespanIndex<P, V>>();
    for (const timespan of this) {
      let partition = partitions.get(timespan.ownerGroup);
      if (partition === undefined) {
        partition = new TimespanIndex<P, V>(this.config);
        partitions.set(timespan.ownerGroup, partition);
      }
      partition.insert(timespan);
    }
    debugIndex("partitioned %d timespans into %d groups", this.size, partitions.size);
    return partitions;
  }

  /**
   * The first timespan of the same owner group starting at a later offset,
   * or null.
   */
  findNextInSameGroup(timespan: Timespan<P, V>): Timespan<P, V> | null {
    let offset = this.getPositionAfter(timespan.offset);
    while (offset !== null) {
      const match = this.startingInGroup(offset, timespan.ownerGroup);
      if (match !== null) return match;
      offset = this.getPositionAfter(offset);
    }
    return null;
  }

  /**
   * The first timespan of the same owner group starting at the nearest
   * earlier offset, or null.
   */
  findPreviousInSameGroup(timespan: Timespan<P, V>): Timespan<P, V> | null {
    let offset = this.getPositionBefore(timespan.offset);
    while (offset !== null) {
      const match = this.startingInGroup(offset, timespan.ownerGroup);
      if (match !== null) return match;
      offset = this.getPositionBefore(offset);
    }
    return null;
  }

  // === Splitting ===

  /**
   * Split every timespan straddling any of `offsets` into two, in place.
   * Payloads are asked for the shards.
   *
   * @throws SplitUnsupportedError when a straddling payload cannot split;
   *   the index is restored to its state before the call
   * @throws InvalidTimespanError when a payload returns shards that do not
   *   tile its bounds at the split offset; the index is restored as well
   */
  splitAt(offsets: Offset | Iterable<Offset>): void {
    const list = typeof offsets === "number" ? [offsets] : [...offsets];
    const removed: Timespan<P, V>[] = [];
    const inserted: Timespan<P, V>[] = [];

    try {
      for (const offset of list) {
        const overlaps = this.getVerticalityAt(offset).overlapTimespans;
        if (overlaps.length === 0) continue;

        // Collect every shard before editing, so a refusal leaves this
        // offset untouched
        const shards = overlaps.map((timespan) => this.shardsOf(timespan, offset));
        this.remove(overlaps);
        removed.push(...overlaps);
        const flat = shards.flat();
        this.insert(flat);
        inserted.push(...flat);
        debugIndex("split %d timespans at %d", overlaps.length, offset);
      }
    } catch (err) {
      if (removed.length > 0) {
        debugIndex("rolling back split: %s", err instanceof Error ? err.message : String(err));
        // Shards may themselves have been split again by a later offset
        const shardSet = new Set(inserted);
        this.remove(inserted.filter((ts) => this.contains(ts)));
        this.insert(removed.filter((ts) => !shardSet.has(ts)));
      }
      throw err;
    }
  }

  // === Internals ===

  private *windows(
    n: number,
    reverse: boolean,
    padEnd: boolean
  ): Generator<VerticalitySequence<P, V>> {
    const window: Verticality<P, V>[] = [];
    const emit = (): VerticalitySequence<P, V> =>
      new VerticalitySequence(reverse ? [...window].reverse() : window);

    for (const verticality of this.iterateVerticalities(reverse)) {
      window.push(verticality);
      if (window.length > n) window.shift();
      if (window.length === n) yield emit();
    }

    if (!padEnd) return;
    const endTime = this.endTime;
    if (endTime === null) return;

    const sentinel = new Verticality<P, V>(endTime, {}, this);
    for (let i = 0; i < n - 1; i++) {
      window.push(sentinel);
      if (window.length > n) window.shift();
      if (window.length === n) yield emit();
    }
  }

  private startingInGroup(offset: Offset, group: GroupId): Timespan<P, V> | null {
    return this.elementsStartingAt(offset).find((ts) => ts.ownerGroup === group) ?? null;
  }

  private shardsOf(timespan: Timespan<P, V>, offset: Offset): [Timespan<P, V>, Timespan<P, V>] {
    const result = timespan.payload.splitAt?.(offset);
    if (result === undefined || result === null) {
      throw new SplitUnsupportedError(offset, String(timespan));
    }

    const before = new Timespan<P, V>(result[0]);
    const after = new Timespan<P, V>(result[1]);
    if (
      before.offset !== timespan.offset ||
      before.endTime !== offset ||
      after.offset !== offset ||
      after.endTime !== timespan.endTime
    ) {
      throw new InvalidTimespanError(
        `Splitting ${timespan} at ${offset} produced ${before} and ${after}`
      );
    }
    return [before, after];
  }
}
