/**
 * Comfort ceiling, zone bounds and recommendation ranking
 */
import { describe, expect, it } from "vitest";
import {
  BEGINNER_CEILING,
  computeComfortCeiling,
  computeZoneBounds,
  isZone,
  percentile,
  recommend,
  zoneContains,
} from "../src/services/recommendation-service.js";
import { catalogOf, profileOf, progress, song } from "./helpers.js";

const LADDER = [0.1, 0.2, 0.3, 0.4, 0.5].map((d, i) => song(`s${i + 1}`, d));

describe("percentile", () => {
  it("indexes floor(pct × n) and clamps to the last element", () => {
    expect(percentile([1, 2, 3, 4, 5], 0.85)).toBe(5);
    expect(percentile([1, 2, 3, 4, 5], 0.7)).toBe(4);
    expect(percentile([1, 2, 3], 1)).toBe(3);
  });
});

describe("computeComfortCeiling", () => {
  it("uses the 85th percentile of learned songs", () => {
    const profile = profileOf(LADDER.map(s => progress(s.songId, { hard: 4 })));
    expect(computeComfortCeiling(catalogOf(LADDER), profile)).toBe(0.5);
  });

  it("falls back to the 70th percentile of played songs", () => {
    const profile = profileOf([
      progress("s1", { hard: 4, playCount: 1 }),
      progress("s2", { master: 5, playCount: 1 }),
      progress("s3", { playCount: 2 }),
      progress("s4", { playCount: 1 }),
      progress("s5", { playCount: 9 }),
    ]);
    expect(computeComfortCeiling(catalogOf(LADDER), profile)).toBe(0.4);
  });

  it("ignores progress for songs missing from the catalog", () => {
    const profile = profileOf([
      progress("s1", { hard: 4 }),
      progress("s2", { hard: 4 }),
      progress("elsewhere", { hard: 5 }),
    ]);
    expect(computeComfortCeiling(catalogOf(LADDER), profile)).toBe(BEGINNER_CEILING);
  });

  it("returns the beginner ceiling for an empty profile", () => {
    expect(computeComfortCeiling(catalogOf(LADDER), profileOf([]))).toBe(0.15);
  });
});

describe("computeZoneBounds", () => {
  it("places four adjacent zones around the ceiling", () => {
    const b = computeZoneBounds(0.4);
    expect(b["warm-up"].lo).toBeCloseTo(0.3);
    expect(b["warm-up"].hi).toBe(0.4);
    expect(b.growth.lo).toBe(0.4);
    expect(b.growth.hi).toBeCloseTo(0.5);
    expect(b.challenge.hi).toBeCloseTo(0.6);
    expect(b.reach.hi).toBeCloseTo(0.7);
    expect(b.growth.hi).toBe(b.challenge.lo);
    expect(b.challenge.hi).toBe(b.reach.lo);
  });

  it("clamps to the unit interval", () => {
    const high = computeZoneBounds(0.95);
    expect(high.growth.hi).toBe(1);
    expect(high.reach.lo).toBe(1);
    expect(high.reach.hi).toBe(1);
    expect(zoneContains(high.reach, 1)).toBe(false);

    expect(computeZoneBounds(0.05)["warm-up"].lo).toBe(0);
  });

  it("includes the lower bound and excludes the upper", () => {
    const { growth } = computeZoneBounds(0.4);
    expect(zoneContains(growth, 0.4)).toBe(true);
    expect(zoneContains(growth, growth.hi)).toBe(false);
  });
});

describe("isZone", () => {
  it("accepts the four zone names only", () => {
    expect(isZone("growth")).toBe(true);
    expect(isZone("warm-up")).toBe(true);
    expect(isZone("stretch")).toBe(false);
  });
});

describe("recommend", () => {
  // Learned songs at 0.2, 0.3, 0.4 put the ceiling at 0.4
  const learned = [song("l1", 0.2), song("l2", 0.3), song("l3", 0.4)];
  const candidates = [
    song("g1", 0.44),
    song("g2", 0.40),
    song("c1", 0.55),
    song("w1", 0.35),
    song("r1", 0.65, { techniques: { slapPop: true } }),
    song("far", 0.9),
    song("easy", 0.1),
  ];
  const catalog = catalogOf([...learned, ...candidates]);
  const baseProfile = learned.map(s => progress(s.songId, { hard: 4 }));

  it("ranks by zone priority then distance from the zone midpoint", () => {
    const result = recommend(catalog, profileOf(baseProfile));

    expect(result.ceiling).toBe(0.4);
    expect(result.recommendations.map(r => r.song.songId)).toEqual(["g1", "g2", "c1", "w1", "r1"]);
    expect(result.recommendations.map(r => r.zone)).toEqual(["growth", "growth", "challenge", "warm-up", "reach"]);
  });

  it("puts less-played songs first within a zone", () => {
    const profile = profileOf([...baseProfile, progress("g1", { playCount: 3 })]);

    const ids = recommend(catalog, profile).recommendations.map(r => r.song.songId);

    expect(ids.slice(0, 2)).toEqual(["g2", "g1"]);
  });

  it("filters by technique", () => {
    const ids = recommend(catalog, profileOf(baseProfile), { technique: "slapPop" }).recommendations.map(r => r.song.songId);
    expect(ids).toEqual(["r1"]);
  });

  it("filters by zone", () => {
    const ids = recommend(catalog, profileOf(baseProfile), { zone: "challenge" }).recommendations.map(r => r.song.songId);
    expect(ids).toEqual(["c1"]);
  });

  it("truncates to the requested count", () => {
    const ids = recommend(catalog, profileOf(baseProfile), { count: 2 }).recommendations.map(r => r.song.songId);
    expect(ids).toEqual(["g1", "g2"]);
  });

  it("exposes the sort key", () => {
    const [first] = recommend(catalog, profileOf(baseProfile)).recommendations;
    expect(first.sortKey[0]).toBe(0);
    expect(first.sortKey[1]).toBe(0);
    expect(first.sortKey[2]).toBeCloseTo(0.01);
  });

  it("describes each recommendation in a teaching note", () => {
    const [reach] = recommend(catalog, profileOf(baseProfile), { zone: "reach" }).recommendations;
    expect(reach.teachingNote).toBe("Advanced Techniques (slapPop) | Standard | Medium (100 BPM) | Moderate | Steep progression");
  });
});
