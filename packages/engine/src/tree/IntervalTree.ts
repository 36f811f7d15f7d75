/**
 * Interval Tree
 *
 * An AVL tree keyed by start offset, augmented so that every node knows the
 * lowest and highest end time found anywhere in its subtree. Those bounds
 * let overlap and stop queries skip whole subtrees, so asking "what is
 * sounding at x" costs O(log n + k) rather than a linear scan.
 *
 * Every mutation leaves the tree consistent on return or throws before
 * touching it.
 */

import type { ITimespanPayload, Offset } from "@tessitura/contracts";
import {
  DuplicateTimespanError,
  InvariantViolationError,
  NotFoundError,
} from "@tessitura/contracts";
import { debugTree } from "../debug";
import {
  IntervalNode,
  nodeElementCount,
  nodeHeight,
  rebalance,
  unlink,
  type IIntervalNode,
} from "./IntervalNode";
import { compareTimespans, type Timespan } from "./Timespan";

/**
 * Configuration for an IntervalTree.
 */
export interface IntervalTreeConfig {
  /**
   * Verify BST order, balance and cached aggregates after every mutation.
   * Slow; meant for tests and debugging.
   * @default false
   */
  checkInvariants?: boolean;
}

const DEFAULT_CONFIG: Required<IntervalTreeConfig> = {
  checkInvariants: false,
};

export class IntervalTree<P extends ITimespanPayload<P, V>, V = unknown> {
  protected readonly config: Required<IntervalTreeConfig>;
  private root: IntervalNode<P, V> | null = null;

  constructor(config: IntervalTreeConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // === Size ===

  get size(): number {
    return nodeElementCount(this.root);
  }

  get isEmpty(): boolean {
    return this.root === null;
  }

  /** Root node, or null for an empty tree. */
  get rootNode(): IIntervalNode<P, V> | null {
    return this.root;
  }

  /** Latest end time of any timespan, or null when empty. */
  get endTime(): Offset | null {
    return this.root === null ? null : this.root.endTimeHigh;
  }

  // === Mutation ===

  /**
   * Add timespans. Each object may be held once; equal bounds are stored
   * as distinct entries.
   *
   * @throws DuplicateTimespanError if any timespan is already held or
   *   repeats within the batch; nothing is inserted then
   */
  insert(timespans: Timespan<P, V> | Iterable<Timespan<P, V>>): void {
    const list = asList(timespans);

    const seen = new Set<Timespan<P, V>>();
    for (const timespan of list) {
      if (seen.has(timespan) || this.contains(timespan)) {
        throw new DuplicateTimespanError(timespan.offset, String(timespan));
      }
      seen.add(timespan);
    }

    for (const timespan of list) {
      this.root = this.insertInto(this.root, timespan);
    }
    this.afterMutation();
  }

  /**
   * Remove timespans by identity.
   *
   * @throws NotFoundError if any timespan is absent; nothing is removed then
   */
  remove(timespans: Timespan<P, V> | Iterable<Timespan<P, V>>): void {
    const list = asList(timespans);

    // Validate the whole batch first so a failure leaves the tree untouched
    const seen = new Set<Timespan<P, V>>();
    for (const timespan of list) {
      if (seen.has(timespan) || !this.contains(timespan)) {
        throw new NotFoundError(timespan.offset, String(timespan));
      }
      seen.add(timespan);
    }

    for (const timespan of list) {
      this.root = this.removeFrom(this.root, timespan);
    }
    this.afterMutation();
  }

  clear(): void {
    this.root = null;
  }

  // === Lookup ===

  getNodeAt(offset: Offset): IIntervalNode<P, V> | null {
    return this.findNode(offset);
  }

  contains(timespan: Timespan<P, V>): boolean {
    const node = this.findNode(timespan.offset);
    return node !== null && node.timespans.includes(timespan);
  }

  /** Smallest start offset strictly after `offset`, or null. */
  getPositionAfter(offset: Offset): Offset | null {
    let node = this.root;
    let candidate: Offset | null = null;
    while (node !== null) {
      if (offset < node.startOffset) {
        candidate = node.startOffset;
        node = node.left;
      } else {
        node = node.right;
      }
    }
    return candidate;
  }

  /** Largest start offset strictly before `offset`, or null. */
  getPositionBefore(offset: Offset): Offset | null {
    let node = this.root;
    let candidate: Offset | null = null;
    while (node !== null) {
      if (node.startOffset < offset) {
        candidate = node.startOffset;
        node = node.right;
      } else {
        node = node.left;
      }
    }
    return candidate;
  }

  lowestPosition(): Offset | null {
    let node = this.root;
    if (node === null) return null;
    while (node.left !== null) node = node.left;
    return node.startOffset;
  }

  highestPosition(): Offset | null {
    let node = this.root;
    if (node === null) return null;
    while (node.right !== null) node = node.right;
    return node.startOffset;
  }

  // === Queries ===

  /**
   * Timespans active at `offset`, i.e. with `ts.offset <= offset < ts.endTime`,
   * in timeline order.
   */
  queryOverlapping(offset: Offset): Timespan<P, V>[] {
    const found: Timespan<P, V>[] = [];

    const visit = (node: IntervalNode<P, V> | null): void => {
      // Nothing in this subtree is still sounding
      if (node === null || node.endTimeHigh <= offset) return;
      visit(node.left);
      // This node and everything to its right starts too late
      if (node.startOffset > offset) return;
      node.collectActiveAt(offset, found);
      visit(node.right);
    };

    visit(this.root);
    return found;
  }

  /** Timespans starting exactly at `offset`. */
  elementsStartingAt(offset: Offset): Timespan<P, V>[] {
    const node = this.findNode(offset);
    return node === null ? [] : [...node.timespans];
  }

  /** Timespans ending exactly at `offset`, zero-length ones included. */
  elementsStoppingAt(offset: Offset): Timespan<P, V>[] {
    const found: Timespan<P, V>[] = [];

    const visit = (node: IntervalNode<P, V> | null): void => {
      if (node === null) return;
      if (offset < node.endTimeLow || offset > node.endTimeHigh) return;
      visit(node.left);
      // A timespan starting after `offset` cannot end at it
      if (node.startOffset > offset) return;
      for (const timespan of node.timespans) {
        if (timespan.endTime === offset) found.push(timespan);
      }
      if (node.startOffset < offset) visit(node.right);
    };

    visit(this.root);
    return found;
  }

  /** Timespans strictly straddling `offset`: `ts.offset < offset < ts.endTime`. */
  elementsOverlappingOffset(offset: Offset): Timespan<P, V>[] {
    return this.queryOverlapping(offset).filter((ts) => ts.offset < offset);
  }

  /**
   * Timespans intersecting `[start, end)`. Zero-length timespans count when
   * their offset lies inside the range.
   */
  queryRange(start: Offset, end: Offset): Timespan<P, V>[] {
    const found: Timespan<P, V>[] = [];
    if (end <= start) return found;

    const visit = (node: IntervalNode<P, V> | null): void => {
      if (node === null || node.endTimeHigh < start) return;
      visit(node.left);
      if (node.startOffset >= end) return;
      for (const timespan of node.timespans) {
        if (timespan.endTime > start || timespan.offset >= start) {
          found.push(timespan);
        }
      }
      visit(node.right);
    };

    visit(this.root);
    return found;
  }

  // === Positional access ===

  /**
   * Timespan at `index` in timeline order; negative indexes count from the
   * end. Returns undefined when out of range.
   */
  at(index: number): Timespan<P, V> | undefined {
    const size = this.size;
    let i = index < 0 ? size + index : index;
    if (!Number.isInteger(i) || i < 0 || i >= size) return undefined;

    let node = this.root;
    while (node !== null) {
      const leftCount = nodeElementCount(node.left);
      if (i < leftCount) {
        node = node.left;
      } else if (i < leftCount + node.timespans.length) {
        return node.timespans[i - leftCount];
      } else {
        i -= leftCount + node.timespans.length;
        node = node.right;
      }
    }
    return undefined;
  }

  /**
   * Position of `timespan` in timeline order.
   *
   * @throws NotFoundError if the timespan is not in the tree
   */
  indexOf(timespan: Timespan<P, V>): number {
    let node = this.root;
    let before = 0;
    while (node !== null) {
      if (timespan.offset < node.startOffset) {
        node = node.left;
      } else if (timespan.offset > node.startOffset) {
        before += nodeElementCount(node.left) + node.timespans.length;
        node = node.right;
      } else {
        const position = node.timespans.indexOf(timespan);
        if (position === -1) break;
        return before + nodeElementCount(node.left) + position;
      }
    }
    throw new NotFoundError(timespan.offset, String(timespan));
  }

  // === Traversal ===

  /**
   * In-order iteration over every timespan. Not safe against mutation; use
   * verticality iteration to scan while editing.
   */
  *[Symbol.iterator](): Iterator<Timespan<P, V>> {
    for (const node of this.nodes()) {
      yield* node.timespans;
    }
  }

  /** Distinct start offsets, ascending. */
  offsets(): Offset[] {
    const result: Offset[] = [];
    for (const node of this.nodes()) result.push(node.startOffset);
    return result;
  }

  /** Distinct start and end offsets, ascending. */
  timePoints(): Offset[] {
    const points = new Set<Offset>();
    for (const node of this.nodes()) {
      points.add(node.startOffset);
      for (const timespan of node.timespans) points.add(timespan.endTime);
    }
    return [...points].sort((a, b) => a - b);
  }

  // === Invariants ===

  /**
   * Walk the whole tree and verify BST order, AVL balance, end-time bounds,
   * heights and element counts.
   *
   * @throws InvariantViolationError on the first mismatch found
   */
  checkInvariants(): void {
    const fail = (node: IntervalNode<P, V>, problem: string): never => {
      debugTree("invariant violated at %d: %s", node.startOffset, problem);
      throw new InvariantViolationError(`Node at ${node.startOffset}: ${problem}`);
    };

    const check = (
      node: IntervalNode<P, V> | null,
      lower: Offset,
      upper: Offset
    ): void => {
      if (node === null) return;
      if (!(lower < node.startOffset && node.startOffset < upper)) {
        fail(node, `start offset outside (${lower}, ${upper})`);
      }
      if (node.timespans.length === 0) fail(node, "empty bucket");

      check(node.left, lower, node.startOffset);
      check(node.right, node.startOffset, upper);

      let low = Infinity;
      let high = -Infinity;
      let count = node.timespans.length;
      for (let i = 0; i < node.timespans.length; i++) {
        const timespan = node.timespans[i];
        if (timespan.offset !== node.startOffset) {
          fail(node, `holds timespan starting at ${timespan.offset}`);
        }
        if (i > 0 && compareTimespans(node.timespans[i - 1], timespan) >= 0) {
          fail(node, "bucket out of order");
        }
        low = Math.min(low, timespan.endTime);
        high = Math.max(high, timespan.endTime);
      }
      for (const child of [node.left, node.right]) {
        if (child === null) continue;
        low = Math.min(low, child.endTimeLow);
        high = Math.max(high, child.endTimeHigh);
        count += child.elementCount;
      }

      if (node.endTimeLow !== low) fail(node, `endTimeLow ${node.endTimeLow}, expected ${low}`);
      if (node.endTimeHigh !== high) fail(node, `endTimeHigh ${node.endTimeHigh}, expected ${high}`);
      if (node.elementCount !== count) fail(node, `elementCount ${node.elementCount}, expected ${count}`);

      const height = 1 + Math.max(nodeHeight(node.left), nodeHeight(node.right));
      if (node.height !== height) fail(node, `height ${node.height}, expected ${height}`);
      if (Math.abs(node.balance) > 1) fail(node, `balance factor ${node.balance}`);
    };

    check(this.root, -Infinity, Infinity);
  }

  // === Internals ===

  private afterMutation(): void {
    if (this.config.checkInvariants) {
      this.checkInvariants();
    }
  }

  private findNode(offset: Offset): IntervalNode<P, V> | null {
    let node = this.root;
    while (node !== null) {
      if (offset < node.startOffset) {
        node = node.left;
      } else if (offset > node.startOffset) {
        node = node.right;
      } else {
        return node;
      }
    }
    return null;
  }

  private *nodes(): Generator<IntervalNode<P, V>> {
    const stack: IntervalNode<P, V>[] = [];
    let node = this.root;
    while (node !== null || stack.length > 0) {
      while (node !== null) {
        stack.push(node);
        node = node.left;
      }
      const next = stack.pop();
      if (next === undefined) break;
      yield next;
      node = next.right;
    }
  }

  private insertInto(
    node: IntervalNode<P, V> | null,
    timespan: Timespan<P, V>
  ): IntervalNode<P, V> {
    if (node === null) {
      return new IntervalNode(timespan);
    }
    if (timespan.offset < node.startOffset) {
      node.left = this.insertInto(node.left, timespan);
    } else if (timespan.offset > node.startOffset) {
      node.right = this.insertInto(node.right, timespan);
    } else {
      node.addTimespan(timespan);
    }
    return rebalance(node);
  }

  private removeFrom(
    node: IntervalNode<P, V> | null,
    timespan: Timespan<P, V>
  ): IntervalNode<P, V> | null {
    if (node === null) {
      throw new NotFoundError(timespan.offset, String(timespan));
    }
    if (timespan.offset < node.startOffset) {
      node.left = this.removeFrom(node.left, timespan);
    } else if (timespan.offset > node.startOffset) {
      node.right = this.removeFrom(node.right, timespan);
    } else {
      if (!node.removeTimespan(timespan)) {
        throw new NotFoundError(timespan.offset, String(timespan));
      }
      if (node.timespans.length === 0) {
        return unlink(node);
      }
    }
    return rebalance(node);
  }
}

function asList<T>(items: T | Iterable<T>): T[] {
  if (isIterable(items)) return [...items];
  return [items];
}

function isIterable<T>(value: T | Iterable<T>): value is Iterable<T> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}
