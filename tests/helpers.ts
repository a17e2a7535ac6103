/**
 * Shared fixtures: temp directories, a fake archive reader and catalog
 * builders. A fake archive on disk is a JSON object of
 * `internal path → JSON content`; the text "CORRUPT" makes the reader throw.
 */
import { mkdtemp, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { ExtractOptions } from "../src/providers/archive-provider.js";
import type { Catalog, PlayerProfile, SongEntry, SongProgress } from "../src/types/song.js";

export function tempDir(prefix = "coach-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export function manifest(attributes: Record<string, unknown>, entryKey = "ENTRY0001") {
  return { Entries: { [entryKey]: { Attributes: attributes } } };
}

export function bassAttrs(over: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    PersistentID: "PID0001",
    FullName: "Band_Tune_Bass",
    DLCKey: "BandTune",
    ArtistName: "Band",
    SongName: "Tune",
    AlbumName: "Record",
    SongYear: 2001,
    SongAverageTempo: 120,
    SongDiffHard: 0.5,
    ArrangementProperties: { slapPop: 1, standardTuning: 1 },
    ...over,
  };
}

/** Write a fake archive; `mtimeSec` pins its modification time */
export async function writeArchive(
  dir: string,
  name: string,
  content: Record<string, unknown> | "CORRUPT",
  mtimeSec = 1_700_000_000,
): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content === "CORRUPT" ? content : JSON.stringify(content));
  await utimes(file, mtimeSec, mtimeSec);
  return file;
}

/** Archive holding a single bass manifest */
export function bassArchive(attrs: Record<string, unknown>, entryKey?: string) {
  return { "manifests/songs_dlc/song_bass.json": manifest(attrs, entryKey) };
}

/** `internal path → bytes` as the archive reader would return it */
export function archiveContent(files: Record<string, unknown>): Map<string, Buffer> {
  const out = new Map<string, Buffer>();
  for (const [k, v] of Object.entries(files)) {
    out.set(k, Buffer.from(typeof v === "string" ? v : JSON.stringify(v), "utf8"));
  }
  return out;
}

export function fakeExtractor() {
  return {
    extract: vi.fn((bytes: Buffer, _options: ExtractOptions) => {
      const text = bytes.toString("utf8");
      if (text === "CORRUPT") throw new Error("bad archive table");
      const files: unknown = JSON.parse(text);
      if (typeof files !== "object" || files === null) throw new Error("not an archive");
      return archiveContent({ ...files });
    }),
  };
}

export function song(songId: string, hard: number, over: Partial<SongEntry> = {}): SongEntry {
  return {
    songId,
    artist: `Artist ${songId}`,
    title: `Title ${songId}`,
    album: "",
    year: 0,
    tempo: 100,
    songLength: 180,
    difficulty: { easy: hard / 3, medium: hard / 2, hard },
    notes: { easy: 100, medium: 200, hard: 300 },
    maxPhraseDifficulty: 10,
    techniques: {},
    sections: [],
    tuning: {},
    standardTuning: true,
    dlcKey: songId,
    archivePath: `/lib/${songId}_p.psarc`,
    archiveMtime: 0,
    ...over,
  };
}

export function catalogOf(songs: SongEntry[]): Catalog {
  return { version: 1, scannedAt: "", songs: Object.fromEntries(songs.map(s => [s.songId, s])), archives: {} };
}

export function progress(
  songId: string,
  opts: { hard?: number; master?: number; playCount?: number } = {},
): SongProgress {
  return {
    persistentId: `PID_${songId.toUpperCase()}`,
    songId,
    badges: { easy: 0, medium: 0, hard: opts.hard ?? 0, master: opts.master ?? 0 },
    playCount: opts.playCount ?? 0,
    highScoreHard: 0,
    lastPlayed: 0,
    dynamicDifficultyAvg: 0,
  };
}

export function profileOf(entries: SongProgress[]): PlayerProfile {
  return new Map(entries.map(p => [p.persistentId, p]));
}
