/**
 * Timespan
 *
 * A half-open interval `[offset, endTime)` wrapping one payload. Timespans
 * are immutable: to change an end time, remove the old timespan and insert
 * a new one, since the tree's cached bounds depend on it.
 */

import type { GroupId, ITimespanPayload, Offset } from "@tessitura/contracts";
import { InvalidTimespanError } from "@tessitura/contracts";

/**
 * Counter backing insertion identity, so equal bounds still sort stably.
 */
let serialCounter = 0;

export class Timespan<P extends ITimespanPayload<P, V>, V = unknown> {
  readonly offset: Offset;
  readonly endTime: Offset;
  readonly payload: P;
  readonly ownerGroup: GroupId;
  readonly serial: number;

  constructor(payload: P) {
    const [offset, endTime] = payload.bounds();
    if (!Number.isFinite(offset) || !Number.isFinite(endTime)) {
      throw new InvalidTimespanError(`Timespan bounds must be finite, got [${offset}, ${endTime})`);
    }
    if (offset > endTime) {
      throw new InvalidTimespanError(`Timespan offset ${offset} is after its end time ${endTime}`);
    }

    this.offset = offset;
    this.endTime = endTime;
    this.payload = payload;
    this.ownerGroup = payload.ownerGroup();
    this.serial = serialCounter++;
  }

  get duration(): number {
    return this.endTime - this.offset;
  }

  /** Zero-length timespans are instantaneous events. */
  get isZeroLength(): boolean {
    return this.offset === this.endTime;
  }

  /** True when `x` lies in `[offset, endTime)`. */
  isActiveAt(x: Offset): boolean {
    return this.offset <= x && x < this.endTime;
  }

  toString(): string {
    return `<Timespan ${this.offset} ${this.endTime} ${this.ownerGroup}>`;
  }
}

/**
 * Orders timespans by offset, then end time, then insertion identity.
 */
export function compareTimespans<P extends ITimespanPayload<P, V>, V>(
  a: Timespan<P, V>,
  b: Timespan<P, V>
): number {
  if (a.offset !== b.offset) return a.offset < b.offset ? -1 : 1;
  if (a.endTime !== b.endTime) return a.endTime < b.endTime ? -1 : 1;
  return a.serial - b.serial;
}
