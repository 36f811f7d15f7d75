/**
 * Interval Node
 *
 * One node of the AVL tree: the bucket of every timespan sharing a start
 * offset, plus aggregates cached over the node's bucket and both subtrees.
 *
 * Structural helpers here never mutate a sibling through an alias: each one
 * takes a subtree and returns the subtree's new root, and the caller stores
 * it in the parent's slot. Aggregates are refreshed on the same unwind.
 */

import type { ITimespanPayload, Offset } from "@tessitura/contracts";
import { compareTimespans, type Timespan } from "./Timespan";

/**
 * Read-only view of a tree node, as returned by `IntervalTree.getNodeAt`.
 */
export interface IIntervalNode<P extends ITimespanPayload<P, V>, V = unknown> {
  readonly startOffset: Offset;
  /** Timespans starting at `startOffset`, ordered by end time then insertion. */
  readonly timespans: readonly Timespan<P, V>[];
  /** Lowest end time in this node's bucket and both subtrees. */
  readonly endTimeLow: Offset;
  /** Highest end time in this node's bucket and both subtrees. */
  readonly endTimeHigh: Offset;
  readonly height: number;
  /** Number of timespans stored in this subtree. */
  readonly elementCount: number;
  readonly left: IIntervalNode<P, V> | null;
  readonly right: IIntervalNode<P, V> | null;
}

export class IntervalNode<P extends ITimespanPayload<P, V>, V = unknown>
  implements IIntervalNode<P, V>
{
  readonly startOffset: Offset;
  readonly timespans: Timespan<P, V>[] = [];
  endTimeLow: Offset;
  endTimeHigh: Offset;
  height = 1;
  elementCount = 0;
  left: IntervalNode<P, V> | null = null;
  right: IntervalNode<P, V> | null = null;

  constructor(first: Timespan<P, V>) {
    this.startOffset = first.offset;
    this.timespans.push(first);
    this.endTimeLow = first.endTime;
    this.endTimeHigh = first.endTime;
    this.elementCount = 1;
  }

  get balance(): number {
    return nodeHeight(this.left) - nodeHeight(this.right);
  }

  /**
   * Insert into the bucket, keeping it ordered.
   */
  addTimespan(timespan: Timespan<P, V>): void {
    const bucket = this.timespans;
    let lo = 0;
    let hi = bucket.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareTimespans(bucket[mid], timespan) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    bucket.splice(lo, 0, timespan);
  }

  /**
   * Remove by identity. Returns false when the timespan is not here.
   */
  removeTimespan(timespan: Timespan<P, V>): boolean {
    const index = this.timespans.indexOf(timespan);
    if (index === -1) return false;
    this.timespans.splice(index, 1);
    return true;
  }

  /** Push the bucket entries still sounding at `offset` onto `into`. */
  collectActiveAt(offset: Offset, into: Timespan<P, V>[]): void {
    for (const timespan of this.timespans) {
      if (offset < timespan.endTime) into.push(timespan);
    }
  }

  /**
   * Recompute height, end-time bounds and element count from the bucket
   * and the (already up to date) children.
   */
  update(): void {
    const bucket = this.timespans;
    let low = Infinity;
    let high = -Infinity;
    // Bucket is sorted by end time, so its extremes sit at either end
    if (bucket.length > 0) {
      low = bucket[0].endTime;
      high = bucket[bucket.length - 1].endTime;
    }

    let count = bucket.length;
    for (const child of [this.left, this.right]) {
      if (child === null) continue;
      if (child.endTimeLow < low) low = child.endTimeLow;
      if (child.endTimeHigh > high) high = child.endTimeHigh;
      count += child.elementCount;
    }

    this.endTimeLow = low;
    this.endTimeHigh = high;
    this.elementCount = count;
    this.height = 1 + Math.max(nodeHeight(this.left), nodeHeight(this.right));
  }
}

export function nodeHeight<P extends ITimespanPayload<P, V>, V>(
  node: IIntervalNode<P, V> | null
): number {
  return node === null ? 0 : node.height;
}

export function nodeElementCount<P extends ITimespanPayload<P, V>, V>(
  node: IIntervalNode<P, V> | null
): number {
  return node === null ? 0 : node.elementCount;
}

// ============================================================================
// Rotations
// ============================================================================

function rotateRight<P extends ITimespanPayload<P, V>, V>(
  node: IntervalNode<P, V>,
  pivot: IntervalNode<P, V>
): IntervalNode<P, V> {
  node.left = pivot.right;
  pivot.right = node;
  node.update();
  pivot.update();
  return pivot;
}

function rotateLeft<P extends ITimespanPayload<P, V>, V>(
  node: IntervalNode<P, V>,
  pivot: IntervalNode<P, V>
): IntervalNode<P, V> {
  node.right = pivot.left;
  pivot.left = node;
  node.update();
  pivot.update();
  return pivot;
}

/**
 * Refresh `node`'s aggregates and restore the AVL balance at `node`,
 * returning the root of the rebalanced subtree.
 */
export function rebalance<P extends ITimespanPayload<P, V>, V>(
  node: IntervalNode<P, V>
): IntervalNode<P, V> {
  node.update();
  const balance = node.balance;

  if (balance > 1 && node.left !== null) {
    let left = node.left;
    if (left.balance < 0 && left.right !== null) {
      // Left-right case
      left = rotateLeft(left, left.right);
      node.left = left;
    }
    return rotateRight(node, left);
  }

  if (balance < -1 && node.right !== null) {
    let right = node.right;
    if (right.balance > 0 && right.left !== null) {
      // Right-left case
      right = rotateRight(right, right.left);
      node.right = right;
    }
    return rotateLeft(node, right);
  }

  return node;
}

/**
 * Detach the leftmost node of a subtree.
 * Returns the rebalanced remainder and the detached node.
 */
export function detachMin<P extends ITimespanPayload<P, V>, V>(
  node: IntervalNode<P, V>
): [rest: IntervalNode<P, V> | null, min: IntervalNode<P, V>] {
  if (node.left === null) {
    return [node.right, node];
  }
  const [rest, min] = detachMin(node.left);
  node.left = rest;
  return [rebalance(node), min];
}

/**
 * Unlink `node` from its subtree, promoting its in-order successor when it
 * has two children. The successor node moves; it is not copied.
 */
export function unlink<P extends ITimespanPayload<P, V>, V>(
  node: IntervalNode<P, V>
): IntervalNode<P, V> | null {
  if (node.left === null) return node.right;
  if (node.right === null) return node.left;

  const [rest, successor] = detachMin(node.right);
  successor.left = node.left;
  successor.right = rest;
  node.left = null;
  node.right = null;
  return rebalance(successor);
}
