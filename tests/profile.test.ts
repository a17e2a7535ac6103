/**
 * Player profile - save-file discovery and progress parsing
 */
import { mkdir, rm, utimes, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  competentSongIds,
  findProfilePath,
  isCompetent,
  masteredSongIds,
  parseProfile,
  playedSongIds,
  progressForSong,
} from "../src/services/profile-service.js";
import { profileOf, progress, tempDir } from "./helpers.js";

const ID_MAP = new Map([
  ["AAA111", "song_a_bass"],
  ["BBB222", "song_b_bass"],
]);

describe("parseProfile", () => {
  it("merges both sections regardless of key casing", () => {
    const raw = {
      Songs: {
        aaa111: { TimeStamp: 1700000000, DynamicDifficulty: { Avg: 0.42 } },
        ZZZ999: { TimeStamp: 1, DynamicDifficulty: { Avg: 0.9 } },
      },
      SongsSA: {
        AAA111: { Badges: { Easy: 5, Medium: 4, Hard: 4, Master: 1 }, PlayCount: 7, HighScores: { Hard: 91234.5 } },
        bbb222: { PlayCount: 2 },
      },
    };

    const profile = parseProfile(raw, ID_MAP);

    expect([...profile.keys()]).toEqual(["AAA111", "BBB222"]);
    expect(profile.get("AAA111")).toEqual({
      persistentId: "AAA111",
      songId: "song_a_bass",
      badges: { easy: 5, medium: 4, hard: 4, master: 1 },
      playCount: 7,
      highScoreHard: 91234.5,
      lastPlayed: 1700000000,
      dynamicDifficultyAvg: 0.42,
    });
    expect(profile.get("BBB222")).toEqual({
      persistentId: "BBB222",
      songId: "song_b_bass",
      badges: { easy: 0, medium: 0, hard: 0, master: 0 },
      playCount: 2,
      highScoreHard: 0,
      lastPlayed: 0,
      dynamicDifficultyAvg: 0,
    });
  });

  it("coerces numeric strings", () => {
    const profile = parseProfile({ SongsSA: { AAA111: { PlayCount: "12", Badges: { Hard: "5" } } } }, ID_MAP);

    expect(profile.get("AAA111")?.playCount).toBe(12);
    expect(profile.get("AAA111")?.badges.hard).toBe(5);
  });

  it.each([
    ["a string", "nonsense"],
    ["null", null],
    ["wrong section types", { Songs: 5, SongsSA: [] }],
  ])("returns an empty profile for %s", (_label, raw) => {
    expect(parseProfile(raw, ID_MAP).size).toBe(0);
  });
});

describe("progress helpers", () => {
  const profile = profileOf([
    progress("gold", { hard: 5, playCount: 10 }),
    progress("silver_master", { master: 4, playCount: 3 }),
    progress("bronze", { hard: 3, playCount: 1 }),
    progress("unplayed"),
  ]);

  it("treats silver or better on hard or master as competent", () => {
    expect(isCompetent(progress("x", { hard: 4 }))).toBe(true);
    expect(isCompetent(progress("x", { master: 4 }))).toBe(true);
    expect(isCompetent(progress("x", { hard: 3, master: 3 }))).toBe(false);
    expect(competentSongIds(profile)).toEqual(["gold", "silver_master"]);
  });

  it("lists mastered and played songs", () => {
    expect(masteredSongIds(profile)).toEqual(["gold"]);
    expect(playedSongIds(profile)).toEqual(["gold", "silver_master", "bronze"]);
  });

  it("finds progress by song id", () => {
    expect(progressForSong(profile, "bronze")?.playCount).toBe(1);
    expect(progressForSong(profile, "nope")).toBeUndefined();
  });
});

describe("findProfilePath", () => {
  let root: string;

  async function saveFile(user: string, name: string, mtimeSec: number): Promise<string> {
    const remote = path.join(root, user, "221680", "remote");
    await mkdir(remote, { recursive: true });
    const file = path.join(remote, name);
    await writeFile(file, "EVAS");
    await utimes(file, mtimeSec, mtimeSec);
    return file;
  }

  beforeEach(async () => {
    root = await tempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("picks the most recently modified save across users", async () => {
    await saveFile("111", "aaa_PRFLDB", 1_000_000);
    const newest = await saveFile("222", "bbb_PRFLDB", 2_000_000);
    await saveFile("222", "notes.txt", 3_000_000);
    await saveFile("333", "ccc_PRFLDB", 1_500_000);

    await expect(findProfilePath(root)).resolves.toBe(newest);
  });

  it("ignores other games' folders", async () => {
    const other = path.join(root, "111", "999999", "remote");
    await mkdir(other, { recursive: true });
    await writeFile(path.join(other, "x_PRFLDB"), "EVAS");

    await expect(findProfilePath(root)).resolves.toBeNull();
  });

  it("returns null for a missing userdata directory", async () => {
    await expect(findProfilePath(path.join(root, "missing"))).resolves.toBeNull();
  });
});
