import { describe, expect, it } from "vitest";
import {
  MANIFEST_TECHNIQUES,
  SKILL_GROUPS,
  TECHNIQUE_LABELS,
  isTechnique,
  techniqueFlags,
  techniqueGroupFor,
} from "../src/utils/techniques.js";

describe("techniques", () => {
  it("labels every technique", () => {
    expect(MANIFEST_TECHNIQUES).toHaveLength(21);
    expect(Object.keys(TECHNIQUE_LABELS)).toEqual([...MANIFEST_TECHNIQUES]);
    expect(TECHNIQUE_LABELS.slapPop).toBe("Slap & Pop");
  });

  it("recognises technique names exactly", () => {
    expect(isTechnique("fifthsAndOctaves")).toBe(true);
    expect(isTechnique("SlapPop")).toBe(false);
  });

  it("reads a flag for every technique", () => {
    const flags = techniqueFlags(t => t === "bends");
    expect(Object.keys(flags)).toHaveLength(21);
    expect(flags.bends).toBe(true);
    expect(flags.slides).toBe(false);
  });

  it("puts every technique in exactly one skill group", () => {
    const grouped = Object.values(SKILL_GROUPS).flatMap(g => g.techniques);
    expect([...grouped].sort()).toEqual([...MANIFEST_TECHNIQUES].sort());
  });

  it.each([
    ["sustain", "Bass Fundamentals"],
    ["palmMutes", "Rhythm & Muting"],
    ["hopo", "Articulation"],
    ["pickDirection", "Advanced Techniques"],
    ["openChords", "Patterns & Chords"],
  ] as const)("files %s under %s", (technique, group) => {
    expect(techniqueGroupFor(technique)?.name).toBe(group);
  });
});
