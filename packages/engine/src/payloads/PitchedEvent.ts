/**
 * Pitched Event
 *
 * A note or chord occupying one voice for a stretch of time. Pitches are
 * given by name and stored as MIDI note numbers, which is what the event
 * reports as its active values.
 */

import type {
  GroupId,
  ITimespanPayload,
  Offset,
  OffsetBounds,
  SplitResult,
} from "@tessitura/contracts";
import { pitchNames, pitchToMidi, type MidiNoteNumber } from "./pitch";

/**
 * Tie state after splitting: a split event starts a tie, its continuation
 * stops it, and a piece split on both sides continues it.
 */
export type TieType = "start" | "continue" | "stop";

export interface PitchedEventInit {
  offset: Offset;
  endTime: Offset;
  /** Voice or part the event belongs to. */
  voice: GroupId;
  /** Pitch names such as "C4" or "F#3"; empty for a rest. */
  pitches: readonly string[];
  tie?: TieType | null;
}

export class PitchedEvent implements ITimespanPayload<PitchedEvent, MidiNoteNumber> {
  readonly offset: Offset;
  readonly endTime: Offset;
  readonly voice: GroupId;
  readonly midi: readonly MidiNoteNumber[];
  readonly tie: TieType | null;

  constructor(init: PitchedEventInit) {
    this.offset = init.offset;
    this.endTime = init.endTime;
    this.voice = init.voice;
    this.midi = [...new Set(init.pitches.map(pitchToMidi))].sort((a, b) => a - b);
    this.tie = init.tie ?? null;
  }

  get isRest(): boolean {
    return this.midi.length === 0;
  }

  get pitches(): string[] {
    return pitchNames(this.midi);
  }

  bounds(): OffsetBounds {
    return [this.offset, this.endTime];
  }

  ownerGroup(): GroupId {
    return this.voice;
  }

  activeValues(): Iterable<MidiNoteNumber> {
    return this.midi;
  }

  splitAt(offset: Offset): SplitResult<PitchedEvent> {
    if (offset <= this.offset || offset >= this.endTime) return null;

    const pitches = this.pitches;
    // Rests are split without ties
    const before: TieType | null = this.isRest
      ? null
      : this.tie === "stop" || this.tie === "continue" ? "continue" : "start";
    const after: TieType | null = this.isRest
      ? null
      : this.tie === "start" || this.tie === "continue" ? "continue" : "stop";

    return [
      new PitchedEvent({ offset: this.offset, endTime: offset, voice: this.voice, pitches, tie: before }),
      new PitchedEvent({ offset, endTime: this.endTime, voice: this.voice, pitches, tie: after }),
    ];
  }
}
