/**
 * Pitch helpers backed by Tonal.js. Pitches travel through the tree as MIDI
 * note numbers; these convert to and from names for display and input.
 */

import * as Tonal from "tonal";

export type MidiNoteNumber = number;

/**
 * Parse a scientific pitch name ("C#4", "Bb2") to a MIDI note number.
 *
 * @throws Error when the name is not a pitch with an octave
 */
export function pitchToMidi(name: string): MidiNoteNumber {
  const midi = Tonal.Note.midi(name);
  if (midi === null || midi === undefined) {
    throw new Error(`Not a pitch with an octave: "${name}"`);
  }
  return midi;
}

/**
 * Names for MIDI note numbers, lowest first, spelled with sharps.
 */
export function pitchNames(values: Iterable<MidiNoteNumber>): string[] {
  return [...values]
    .sort((a, b) => a - b)
    .map((midi) => Tonal.Note.fromMidiSharps(midi));
}

/**
 * Distinct pitch classes (0 = C .. 11 = B) of MIDI note numbers, ascending.
 */
export function pitchClassSet(values: Iterable<MidiNoteNumber>): number[] {
  const classes = new Set<number>();
  for (const midi of values) {
    const chroma = Tonal.Note.get(Tonal.Note.fromMidi(midi)).chroma;
    if (chroma === undefined) continue;
    classes.add(chroma);
  }
  return [...classes].sort((a, b) => a - b);
}

/** Ascending comparator for `Verticality.lowestTimespan`. */
export function compareMidi(a: MidiNoteNumber, b: MidiNoteNumber): number {
  return a - b;
}
