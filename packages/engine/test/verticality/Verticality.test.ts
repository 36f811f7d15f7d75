import { describe, it, expect, beforeEach } from "vitest";
import type { GroupId, Offset } from "@tessitura/contracts";
import { TimespanIndex } from "../../src/tree/TimespanIndex";
import { Timespan } from "../../src/tree/Timespan";
import { Verticality } from "../../src/verticality/Verticality";
import { PitchedEvent } from "../../src/payloads/PitchedEvent";
import { compareMidi, pitchClassSet, pitchNames, type MidiNoteNumber } from "../../src/payloads/pitch";
import type { Segment } from "../../src/payloads/Segment";
import { span, scenarioSpans } from "../_harness/timespans";

// ============================================================================
// Test Helpers
// ============================================================================

type Note = Timespan<PitchedEvent, MidiNoteNumber>;

function note(offset: Offset, endTime: Offset, voice: GroupId, ...pitches: string[]): Note {
  return new Timespan<PitchedEvent, MidiNoteNumber>(
    new PitchedEvent({ offset, endTime, voice, pitches })
  );
}

/**
 * Two voices. The soprano repeats F4 at 2 and rests from 3 to 5; the bass
 * holds C3 under the first four beats.
 */
function twoVoices() {
  const s1 = note(0, 1, "soprano", "E4");
  const s2 = note(1, 2, "soprano", "F4");
  const s3 = note(2, 3, "soprano", "F4");
  const s4 = note(5, 6, "soprano", "G4");
  const b1 = note(0, 4, "bass", "C3");
  const b2 = note(4, 6, "bass", "B2");
  const index = new TimespanIndex<PitchedEvent, MidiNoteNumber>({ checkInvariants: true });
  index.insert([s1, s2, s3, s4, b1, b2]);
  return { index, s1, s2, s3, s4, b1, b2 };
}

describe("Verticality", () => {
  describe("detached", () => {
    it("is empty and has no neighbours", () => {
      const v = new Verticality<Segment>(5);

      expect(v.isEmpty).toBe(true);
      expect(v.source).toBeNull();
      expect(v.nextStartOffset()).toBeNull();
      expect(v.previousStartOffset()).toBeNull();
      expect(v.nextVerticality()).toBeNull();
      expect(v.previousVerticality()).toBeNull();
      expect(v.timeToNextEvent()).toBeNull();
      expect(v.getPairedMotion()).toEqual([]);
    });

    it("describes itself", () => {
      const v = new Verticality<Segment>(2, { start: [span(2, 3)], overlap: [span(0, 9)] });
      expect(v.toString()).toBe("<Verticality 2 start=1 stop=0 overlap=1>");
    });
  });

  describe("navigation", () => {
    let index: TimespanIndex<Segment>;

    beforeEach(() => {
      index = new TimespanIndex<Segment>();
      index.insert(scenarioSpans());
    });

    it("steps to neighbouring start offsets", () => {
      const v = index.getVerticalityAt(1);

      expect(v.nextStartOffset()).toBe(2);
      expect(v.previousStartOffset()).toBe(0);
      expect(v.nextVerticality()?.offset).toBe(2);
      expect(v.previousVerticality()?.offset).toBe(0);
    });

    it("stops at either end", () => {
      expect(index.getVerticalityAt(0).previousVerticality()).toBeNull();
      expect(index.getVerticalityAt(3).nextVerticality()).toBeNull();
    });

    it("measures time to the next event, or to the end of the index", () => {
      expect(index.getVerticalityAt(0).timeToNextEvent()).toBe(1);
      expect(index.getVerticalityAt(1.5).timeToNextEvent()).toBe(0.5);
      expect(index.getVerticalityAt(3).timeToNextEvent()).toBe(6);
    });

    it("sees timespans inserted after it was created", () => {
      const v = index.getVerticalityAt(3);
      index.insert(span(7, 8));

      expect(v.nextVerticality()?.offset).toBe(7);
      expect(v.timeToNextEvent()).toBe(4);
    });

    it("reports an empty verticality past the end", () => {
      expect(index.getVerticalityAt(12).isEmpty).toBe(true);
      expect(index.getVerticalityAt(5).isEmpty).toBe(false);
    });

    it("lists start timespans before overlap timespans", () => {
      const v = index.getVerticalityAt(2);
      expect(v.startAndOverlapTimespans.map((ts) => [ts.offset, ts.endTime])).toEqual([
        [2, 3],
        [0, 9],
      ]);
    });
  });

  describe("values", () => {
    it("collects values from start and overlap payloads", () => {
      const { index } = twoVoices();
      const v = index.getVerticalityAt(1);

      expect(pitchNames(v.activeValues())).toEqual(["C3", "F4"]);
      expect(pitchClassSet(v.activeValues())).toEqual([0, 5]);
    });

    it("ignores payloads that report no values", () => {
      const index = new TimespanIndex<Segment>();
      index.insert(scenarioSpans());
      const v = index.getVerticalityAt(2);

      expect(v.activeValues().size).toBe(0);
      expect(v.lowestTimespan(() => -1)).toBeNull();
    });

    it("finds the timespan holding the lowest value", () => {
      const { index, b1, b2 } = twoVoices();

      expect(index.getVerticalityAt(1).lowestTimespan(compareMidi)).toBe(b1);
      expect(index.getVerticalityAt(5).lowestTimespan(compareMidi)).toBe(b2);
    });

    it("takes the later timespan on a tie", () => {
      const upper = note(0, 2, "alto", "A3", "E4");
      const lower = note(0, 2, "tenor", "A3");
      const index = new TimespanIndex<PitchedEvent, MidiNoteNumber>();
      index.insert([upper, lower]);

      expect(index.getVerticalityAt(0).lowestTimespan(compareMidi)).toBe(lower);
    });

    it("takes a held timespan over a starting one on a tie", () => {
      const held = note(0, 4, "bass", "C3");
      const starting = note(2, 3, "tenor", "C3");
      const index = new TimespanIndex<PitchedEvent, MidiNoteNumber>();
      index.insert([held, starting]);

      expect(index.getVerticalityAt(2).lowestTimespan(compareMidi)).toBe(held);
    });
  });

  describe("getPairedMotion", () => {
    it("pairs each new note with its predecessor, then held notes with themselves", () => {
      const { index, s1, s2, b1 } = twoVoices();
      expect(index.getVerticalityAt(1).getPairedMotion()).toEqual([
        [s1, s2],
        [b1, b1],
      ]);
    });

    it("finds nothing at the very first offset", () => {
      const { index } = twoVoices();
      expect(index.getVerticalityAt(0).getPairedMotion()).toEqual([]);
    });

    it("drops repeated values and held notes without oblique motion", () => {
      const { index, s2, s3, b1 } = twoVoices();
      const v = index.getVerticalityAt(2);

      expect(v.getPairedMotion()).toEqual([
        [s2, s3],
        [b1, b1],
      ]);
      expect(v.getPairedMotion({ includeOblique: false })).toEqual([]);
    });

    it("drops pairs separated by a rest when asked", () => {
      const { index, s3, s4, b2 } = twoVoices();
      const v = index.getVerticalityAt(5);

      expect(v.getPairedMotion()).toEqual([
        [s3, s4],
        [b2, b2],
      ]);
      expect(v.getPairedMotion({ includeRests: false })).toEqual([[b2, b2]]);
    });

    it("leaves out rests, held or moving", () => {
      const bassRest = note(0, 4, "bass");
      const s1 = note(0, 1, "soprano", "E4");
      const s2 = note(1, 2, "soprano", "F4");
      const sopranoRest = note(2, 3, "soprano");
      const s3 = note(3, 4, "soprano", "G4");
      const index = new TimespanIndex<PitchedEvent, MidiNoteNumber>();
      index.insert([bassRest, s1, s2, sopranoRest, s3]);

      expect(index.getVerticalityAt(1).getPairedMotion()).toEqual([[s1, s2]]);
      expect(index.getVerticalityAt(2).getPairedMotion()).toEqual([]);
      expect(index.getVerticalityAt(3).getPairedMotion()).toEqual([]);
    });

    it("pairs nothing when payloads report no values", () => {
      const index = new TimespanIndex<Segment>();
      index.insert(scenarioSpans());

      expect(index.getVerticalityAt(2).getPairedMotion()).toEqual([]);
    });

    it("pairs a note with the one stopping where it starts", () => {
      const { index, b1, b2 } = twoVoices();
      expect(index.getVerticalityAt(4).getPairedMotion({ includeRests: false })).toEqual([
        [b1, b2],
      ]);
    });
  });
});
