import { describe, it, expect } from "vitest";
import { PitchedEvent, type TieType } from "../../src/payloads/PitchedEvent";
import { compareMidi, pitchClassSet, pitchNames, pitchToMidi } from "../../src/payloads/pitch";
import { Segment } from "../../src/payloads/Segment";
import { Timespan } from "../../src/tree/Timespan";
import { TimespanIndex } from "../../src/tree/TimespanIndex";

function chord(pitches: string[], tie: TieType | null = null): PitchedEvent {
  return new PitchedEvent({ offset: 0, endTime: 4, voice: "piano", pitches, tie });
}

function halves<P extends { splitAt(offset: number): readonly [P, P] | null }>(
  payload: P,
  offset: number
): readonly [P, P] {
  const result = payload.splitAt(offset);
  if (result === null) throw new Error(`Expected a split at ${offset}`);
  return result;
}

describe("pitch helpers", () => {
  it("parses names with octaves", () => {
    expect(pitchToMidi("C4")).toBe(60);
    expect(pitchToMidi("Bb3")).toBe(58);
    expect(pitchToMidi("C#4")).toBe(61);
  });

  it("rejects names without an octave", () => {
    expect(() => pitchToMidi("C")).toThrow('Not a pitch with an octave: "C"');
    expect(() => pitchToMidi("nonsense")).toThrow(Error);
  });

  it("spells note numbers with sharps, lowest first", () => {
    expect(pitchNames([61, 60])).toEqual(["C4", "C#4"]);
  });

  it("reduces note numbers to pitch classes", () => {
    expect(pitchClassSet([60, 72, 64])).toEqual([0, 4]);
    expect(pitchClassSet([])).toEqual([]);
  });

  it("orders note numbers ascending", () => {
    expect([67, 48, 60].sort(compareMidi)).toEqual([48, 60, 67]);
  });
});

describe("PitchedEvent", () => {
  it("stores distinct pitches in ascending order", () => {
    const event = chord(["E4", "C4", "C4"]);

    expect(event.midi).toEqual([60, 64]);
    expect(event.pitches).toEqual(["C4", "E4"]);
    expect([...event.activeValues()]).toEqual([60, 64]);
    expect(event.isRest).toBe(false);
  });

  it("treats an event without pitches as a rest", () => {
    const rest = chord([]);

    expect(rest.isRest).toBe(true);
    expect([...rest.activeValues()]).toEqual([]);
  });

  it("reports its bounds and voice", () => {
    const event = chord(["G3"]);

    expect(event.bounds()).toEqual([0, 4]);
    expect(event.ownerGroup()).toBe("piano");
  });

  it("rejects unknown pitch names", () => {
    expect(() => chord(["H9x"])).toThrow(Error);
  });

  describe("splitAt", () => {
    it("splits into two tied halves with the same pitches", () => {
      const [before, after] = halves(chord(["C4", "G4"]), 1);

      expect(before.bounds()).toEqual([0, 1]);
      expect(after.bounds()).toEqual([1, 4]);
      expect(before.pitches).toEqual(["C4", "G4"]);
      expect(after.pitches).toEqual(["C4", "G4"]);
      expect(before.tie).toBe("start");
      expect(after.tie).toBe("stop");
    });

    it.each([
      ["start", "start", "continue"],
      ["stop", "continue", "stop"],
      ["continue", "continue", "continue"],
    ] as const)("splits a %s tie into %s and %s", (tie, first, second) => {
      const [before, after] = halves(chord(["D4"], tie), 2);

      expect(before.tie).toBe(first);
      expect(after.tie).toBe(second);
    });

    it("splits rests without ties", () => {
      const [before, after] = halves(chord([]), 2);

      expect(before.tie).toBeNull();
      expect(after.tie).toBeNull();
    });

    it("declines offsets outside its interior", () => {
      const event = chord(["A4"]);

      expect(event.splitAt(0)).toBeNull();
      expect(event.splitAt(4)).toBeNull();
      expect(event.splitAt(6)).toBeNull();
    });

    it("ties across every cut when split in an index", () => {
      const index = new TimespanIndex<PitchedEvent, number>();
      index.insert(new Timespan<PitchedEvent, number>(chord(["C3"])));

      index.splitAt([1, 3]);

      expect([...index].map((ts) => [ts.offset, ts.endTime, ts.payload.tie])).toEqual([
        [0, 1, "start"],
        [1, 3, "continue"],
        [3, 4, "stop"],
      ]);
    });
  });
});

describe("Segment", () => {
  it("keeps its group and label on both halves", () => {
    const [before, after] = halves(new Segment(0, 4, "lead", "intro"), 3);

    expect(before).toEqual(new Segment(0, 3, "lead", "intro"));
    expect(after).toEqual(new Segment(3, 4, "lead", "intro"));
  });

  it("declines offsets on or outside its bounds", () => {
    expect(new Segment(0, 4).splitAt(0)).toBeNull();
    expect(new Segment(0, 4).splitAt(-1)).toBeNull();
  });
});
