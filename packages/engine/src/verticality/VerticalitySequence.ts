/**
 * Verticality Sequence
 *
 * A fixed run of consecutive verticalities, earliest first. N-wise
 * iteration builds a new sequence for every window, so callers may keep
 * any window without it changing underneath them.
 */

import type { GroupId, ITimespanPayload, Offset } from "@tessitura/contracts";
import type { Timespan } from "../tree/Timespan";
import type { Verticality } from "./Verticality";

export class VerticalitySequence<P extends ITimespanPayload<P, V>, V = unknown>
  implements Iterable<Verticality<P, V>>
{
  private readonly verticalities: readonly Verticality<P, V>[];

  constructor(verticalities: Iterable<Verticality<P, V>>) {
    this.verticalities = Object.freeze([...verticalities]);
  }

  get length(): number {
    return this.verticalities.length;
  }

  get offsets(): Offset[] {
    return this.verticalities.map((v) => v.offset);
  }

  /** Verticality at `index`; negative indexes count from the end. */
  at(index: number): Verticality<P, V> | undefined {
    return this.verticalities.at(index);
  }

  [Symbol.iterator](): Iterator<Verticality<P, V>> {
    return this.verticalities[Symbol.iterator]();
  }

  toArray(): Verticality<P, V>[] {
    return [...this.verticalities];
  }

  /**
   * Read the window horizontally, one timeline per owner group: the first
   * verticality's overlap and start timespans, then the start timespans of
   * every later verticality. Groups appear in the order first met.
   */
  unwrap(): Map<GroupId, Timespan<P, V>[]> {
    const unwrapped = new Map<GroupId, Timespan<P, V>[]>();
    const add = (timespan: Timespan<P, V>): void => {
      const line = unwrapped.get(timespan.ownerGroup);
      if (line === undefined) {
        unwrapped.set(timespan.ownerGroup, [timespan]);
      } else {
        line.push(timespan);
      }
    };

    const [first, ...rest] = this.verticalities;
    if (first === undefined) return unwrapped;

    first.overlapTimespans.forEach(add);
    first.startTimespans.forEach(add);
    for (const verticality of rest) {
      verticality.startTimespans.forEach(add);
    }
    return unwrapped;
  }

  toString(): string {
    return `<VerticalitySequence [${this.offsets.join(", ")}]>`;
  }
}
