export {
  Verticality,
  type IVerticalitySource,
  type PairedMotionOptions,
  type TimespanPair,
} from "./Verticality";
export { VerticalitySequence } from "./VerticalitySequence";
