import type {
  GroupId,
  ITimespanPayload,
  Offset,
  OffsetBounds,
  SplitResult,
} from "@tessitura/contracts";

/**
 * A plain stretch of time in one group, with an optional label. Splits
 * freely and reports no active values.
 */
export class Segment implements ITimespanPayload<Segment, never> {
  constructor(
    readonly offset: Offset,
    readonly endTime: Offset,
    readonly group: GroupId = "default",
    readonly label?: string
  ) {}

  bounds(): OffsetBounds {
    return [this.offset, this.endTime];
  }

  ownerGroup(): GroupId {
    return this.group;
  }

  splitAt(offset: Offset): SplitResult<Segment> {
    if (offset <= this.offset || offset >= this.endTime) return null;
    return [
      new Segment(this.offset, offset, this.group, this.label),
      new Segment(offset, this.endTime, this.group, this.label),
    ];
  }
}
