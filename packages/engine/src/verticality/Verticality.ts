/**
 * Verticality
 *
 * Everything happening at one offset of a timespan index: what starts
 * there, what stops there, and what is held across it. Verticalities are
 * computed on request and never stored by the index.
 *
 * A verticality keeps a handle back to the index that produced it and asks
 * it for neighbours only when asked itself, so `nextVerticality()` always
 * reflects the index as it is now. Editing the index while walking
 * verticalities is supported; code that needs a stable picture should copy
 * the verticalities it cares about first.
 */

import type { ITimespanPayload, Offset } from "@tessitura/contracts";
import type { Timespan } from "../tree/Timespan";

/**
 * The parts of a timespan index a verticality needs. Held as a non-owning
 * handle: the index owns its nodes, verticalities only query them.
 */
export interface IVerticalitySource<P extends ITimespanPayload<P, V>, V = unknown> {
  readonly endTime: Offset | null;
  getPositionAfter(offset: Offset): Offset | null;
  getPositionBefore(offset: Offset): Offset | null;
  getVerticalityAt(offset: Offset): Verticality<P, V>;
  findPreviousInSameGroup(timespan: Timespan<P, V>): Timespan<P, V> | null;
}

/**
 * Options for `Verticality.getPairedMotion`.
 */
export interface PairedMotionOptions {
  /**
   * Keep pairs whose earlier timespan ended before this offset (a rest sits
   * between them).
   * @default true
   */
  includeRests?: boolean;

  /**
   * Keep pairs whose values do not change, including held timespans paired
   * with themselves.
   * @default true
   */
  includeOblique?: boolean;
}

const DEFAULT_PAIRED_MOTION: Required<PairedMotionOptions> = {
  includeRests: true,
  includeOblique: true,
};

export type TimespanPair<P extends ITimespanPayload<P, V>, V = unknown> = readonly [
  previous: Timespan<P, V>,
  current: Timespan<P, V>,
];

export class Verticality<P extends ITimespanPayload<P, V>, V = unknown> {
  readonly offset: Offset;
  /** Timespans starting at `offset`, zero-length ones included. */
  readonly startTimespans: readonly Timespan<P, V>[];
  /** Timespans that started earlier and end exactly at `offset`. */
  readonly stopTimespans: readonly Timespan<P, V>[];
  /** Timespans that started earlier and end after `offset`. */
  readonly overlapTimespans: readonly Timespan<P, V>[];
  readonly source: IVerticalitySource<P, V> | null;

  constructor(
    offset: Offset,
    timespans: {
      start?: readonly Timespan<P, V>[];
      stop?: readonly Timespan<P, V>[];
      overlap?: readonly Timespan<P, V>[];
    } = {},
    source: IVerticalitySource<P, V> | null = null
  ) {
    this.offset = offset;
    this.startTimespans = timespans.start ?? [];
    this.stopTimespans = timespans.stop ?? [];
    this.overlapTimespans = timespans.overlap ?? [];
    this.source = source;
  }

  /** Start timespans followed by overlap timespans. */
  get startAndOverlapTimespans(): Timespan<P, V>[] {
    return [...this.startTimespans, ...this.overlapTimespans];
  }

  /** True when nothing starts, stops or is held here (e.g. padding). */
  get isEmpty(): boolean {
    return (
      this.startTimespans.length === 0 &&
      this.stopTimespans.length === 0 &&
      this.overlapTimespans.length === 0
    );
  }

  // === Neighbours ===

  nextStartOffset(): Offset | null {
    return this.source === null ? null : this.source.getPositionAfter(this.offset);
  }

  previousStartOffset(): Offset | null {
    return this.source === null ? null : this.source.getPositionBefore(this.offset);
  }

  /**
   * The verticality at the next start offset in the index's current state,
   * or null at the end (or when detached).
   */
  nextVerticality(): Verticality<P, V> | null {
    const offset = this.nextStartOffset();
    if (this.source === null || offset === null) return null;
    return this.source.getVerticalityAt(offset);
  }

  /**
   * The verticality at the previous start offset in the index's current
   * state, or null at the beginning (or when detached).
   */
  previousVerticality(): Verticality<P, V> | null {
    const offset = this.previousStartOffset();
    if (this.source === null || offset === null) return null;
    return this.source.getVerticalityAt(offset);
  }

  /**
   * Distance to the next start offset, or to the end of the index when this
   * is the last verticality. Null when detached.
   */
  timeToNextEvent(): number | null {
    if (this.source === null) return null;
    const next = this.source.getPositionAfter(this.offset) ?? this.source.endTime;
    return next === null ? null : next - this.offset;
  }

  // === Derived views ===

  /**
   * Values reported by the start and overlap payloads. Payloads without
   * the `activeValues` capability are skipped.
   */
  activeValues(): Set<V> {
    const values = new Set<V>();
    for (const timespan of this.startAndOverlapTimespans) {
      const reported = timespan.payload.activeValues?.();
      if (reported === undefined) continue;
      for (const value of reported) values.add(value);
    }
    return values;
  }

  /**
   * The start or overlap timespan holding the lowest active value under
   * `compare`. On ties the later timespan in start-then-overlap order
   * wins. Null when no payload reports values.
   */
  lowestTimespan(compare: (a: V, b: V) => number): Timespan<P, V> | null {
    let lowest: Timespan<P, V> | null = null;
    let lowestValue: V | undefined;

    for (const timespan of this.startAndOverlapTimespans) {
      const reported = timespan.payload.activeValues?.();
      if (reported === undefined) continue;
      for (const value of reported) {
        if (lowestValue === undefined || compare(value, lowestValue) <= 0) {
          lowestValue = value;
          lowest = timespan;
        }
      }
    }
    return lowest;
  }

  /**
   * Pairs of timespans in the same owner group that move at this offset:
   * `(previous, starting)` for each starting timespan with a predecessor
   * in its group, then `(held, held)` for each overlap timespan when
   * oblique motion is included. Only timespans whose payloads report
   * values take part. Empty when detached.
   */
  getPairedMotion(options: PairedMotionOptions = {}): TimespanPair<P, V>[] {
    const { includeRests, includeOblique } = { ...DEFAULT_PAIRED_MOTION, ...options };
    const pairs: TimespanPair<P, V>[] = [];
    if (this.source === null) return pairs;

    for (const starting of this.startTimespans) {
      if (!hasValues(starting)) continue;
      const previous = this.source.findPreviousInSameGroup(starting);
      if (previous === null || !hasValues(previous)) continue; // nothing sounding before it

      if (!includeRests && !this.stopTimespans.includes(previous)) continue;
      if (!includeOblique && sameValues(previous, starting)) continue;
      pairs.push([previous, starting]);
    }

    if (includeOblique) {
      for (const held of this.overlapTimespans) {
        if (!hasValues(held)) continue;
        pairs.push([held, held]);
      }
    }
    return pairs;
  }

  toString(): string {
    return (
      `<Verticality ${this.offset} ` +
      `start=${this.startTimespans.length} ` +
      `stop=${this.stopTimespans.length} ` +
      `overlap=${this.overlapTimespans.length}>`
    );
  }
}

function hasValues<P extends ITimespanPayload<P, V>, V>(timespan: Timespan<P, V>): boolean {
  const reported = timespan.payload.activeValues?.();
  return reported !== undefined && reported[Symbol.iterator]().next().done !== true;
}

function sameValues<P extends ITimespanPayload<P, V>, V>(
  a: Timespan<P, V>,
  b: Timespan<P, V>
): boolean {
  const left = [...(a.payload.activeValues?.() ?? [])];
  const right = [...(b.payload.activeValues?.() ?? [])];
  return left.length === right.length && left.every((value, i) => value === right[i]);
}
