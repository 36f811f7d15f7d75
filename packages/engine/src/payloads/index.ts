export { Segment } from "./Segment";
export { PitchedEvent, type PitchedEventInit, type TieType } from "./PitchedEvent";
export {
  pitchToMidi,
  pitchNames,
  pitchClassSet,
  compareMidi,
  type MidiNoteNumber,
} from "./pitch";
