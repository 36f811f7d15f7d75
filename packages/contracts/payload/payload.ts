/**
 * Payload Capability Interface
 *
 * Anything stored in a timespan tree implements this interface. The tree
 * reads `bounds()` and `ownerGroup()` once, when the timespan is created;
 * the optional capabilities are consulted only by the operations that
 * need them.
 */

import type { GroupId, Offset, OffsetBounds } from "../core/offset";

/**
 * Outcome of asking a payload to split itself: the shards covering
 * `[start, offset)` and `[offset, end)`, or null when the payload declines.
 */
export type SplitResult<Self> = readonly [before: Self, after: Self] | null;

/**
 * A payload that can be placed in a timespan tree.
 *
 * `Self` is the concrete payload type (so splits produce the same type) and
 * `V` the type of value reported by `activeValues()`, e.g. MIDI note numbers.
 */
export interface ITimespanPayload<Self, V = unknown> {
  /** Start and end of the payload. Must not change once inserted. */
  bounds(): OffsetBounds;

  /** Owner group used for partitioning and same-voice lookups. */
  ownerGroup(): GroupId;

  /**
   * Split into two payloads at `offset`, strictly inside the bounds.
   * Payloads that are atomic omit this method or return null.
   */
  splitAt?(offset: Offset): SplitResult<Self>;

  /**
   * Values sounding while this payload is active (pitches, for example).
   * Payloads without values omit this method.
   */
  activeValues?(): Iterable<V>;
}
