import type { TechniqueFlags } from "../utils/techniques.js";

export interface SectionInfo {
  name: string;
  number: number;
  startTime: number;
  endTime: number;
  isSolo: boolean;
}

export interface DifficultyTriple {
  easy: number;
  medium: number;
  hard: number;
}

export interface SongEntry {
  songId: string;
  artist: string;
  title: string;
  album: string;
  year: number;
  tempo: number;
  songLength: number;
  difficulty: DifficultyTriple;
  notes: DifficultyTriple;
  maxPhraseDifficulty: number;
  techniques: TechniqueFlags;
  sections: SectionInfo[];
  tuning: Record<string, number>;
  standardTuning: boolean;
  dlcKey: string;
  archivePath: string;
  /** Archive mtime in ms at the time it was scanned */
  archiveMtime: number;
}

export const CATALOG_VERSION = 1;
export const ID_MAP_VERSION = 1;

export interface Catalog {
  version: number;
  scannedAt: string;
  songs: Record<string, SongEntry>;
  /** Archive path → mtime (ms) of its last successful read, song or not */
  archives: Record<string, number>;
}

export interface IdentifierMapCache {
  version: number;
  archiveHash: string;
  map: Record<string, string>;
}

export interface SongProgress {
  persistentId: string;
  songId: string;
  badges: { easy: number; medium: number; hard: number; master: number };
  playCount: number;
  highScoreHard: number;
  /** Save-file timestamp of the last dynamic-difficulty play */
  lastPlayed: number;
  dynamicDifficultyAvg: number;
}

/** Keyed by persistent (internal) id */
export type PlayerProfile = Map<string, SongProgress>;

export function emptyCatalog(): Catalog {
  return { version: CATALOG_VERSION, scannedAt: "", songs: {}, archives: {} };
}
