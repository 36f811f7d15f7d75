/**
 * Timespan Tree Errors
 *
 * Usage contract violations get their own error kinds so callers can tell
 * a bookkeeping bug apart from an expected boundary condition (which is
 * reported with null instead).
 */

import type { Offset } from "../core/offset";

/**
 * Base class for every error raised by the timespan tree.
 */
export class TimespanTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A timespan was removed or looked up but is not stored in the tree.
 */
export class NotFoundError extends TimespanTreeError {
  readonly offset: Offset;

  constructor(offset: Offset, description: string) {
    super(`${description} not in tree at offset ${offset}`);
    this.offset = offset;
  }
}

/**
 * A timespan was inserted while the tree already holds that same object.
 * Distinct timespans with equal bounds are fine.
 */
export class DuplicateTimespanError extends TimespanTreeError {
  readonly offset: Offset;

  constructor(offset: Offset, description: string) {
    super(`${description} already in tree at offset ${offset}`);
    this.offset = offset;
  }
}

/**
 * A payload cannot be split, either because it has no `splitAt`
 * capability or because it declined.
 */
export class SplitUnsupportedError extends TimespanTreeError {
  readonly offset: Offset;

  constructor(offset: Offset, description: string) {
    super(`${description} cannot be split at offset ${offset}`);
    this.offset = offset;
  }
}

/**
 * Window size for n-wise iteration is not a positive integer.
 */
export class InvalidWindowSizeError extends TimespanTreeError {
  readonly size: number;

  constructor(size: number) {
    super(`The number of verticalities in a window must be a positive integer, got ${size}`);
    this.size = size;
  }
}

/**
 * Bounds are not finite, end before they start, or split shards do not
 * tile the payload they came from.
 */
export class InvalidTimespanError extends TimespanTreeError {}

/**
 * The tree's structure disagrees with its cached aggregates or balance.
 * Only raised by the invariant checker; always an engine bug.
 */
export class InvariantViolationError extends TimespanTreeError {}
