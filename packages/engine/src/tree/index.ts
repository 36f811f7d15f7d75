export { Timespan, compareTimespans } from "./Timespan";
export { type IIntervalNode } from "./IntervalNode";
export { IntervalTree, type IntervalTreeConfig } from "./IntervalTree";
export { TimespanIndex, type NwiseOptions } from "./TimespanIndex";
