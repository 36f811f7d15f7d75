/**
 * Offsets are positions on the timeline, measured in whatever unit the
 * producer chose (quarter lengths, ticks). They are compared exactly, so
 * producers needing subdivisions that are not exact in binary floating
 * point (triplets, quintuplets) should supply integer ticks.
 */
export type Offset = number;

/** Identifies an owner group (a voice, a part, a track). */
export type GroupId = string;

/** `[offset, endTime]` of a half-open interval `[offset, endTime)`. */
export type OffsetBounds = readonly [offset: Offset, endTime: Offset];
