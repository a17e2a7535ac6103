/**
 * Player profile - locating the save file and turning its decoded JSON into
 * per-song progress keyed by persistent id.
 */
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { SaveProgressDocument } from "../schemas.js";
import type { PlayerProfile, SongProgress } from "../types/song.js";
import { GAME_APP_ID } from "../utils/config.js";
import logger from "../utils/logger.js";

export const SAVE_FILE_SUFFIX = "_PRFLDB";

/** Badge level from which a song counts as learned (silver) */
export const COMPETENT_BADGE = 4;
/** Gold badge */
export const MASTERED_BADGE = 5;

async function listDir(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch {
    return [];
  }
}

/**
 * Most recently modified `*_PRFLDB` under `<userdata>/<user>/<app>/remote/`,
 * or null when there is none.
 */
export async function findProfilePath(steamUserData: string): Promise<string | null> {
  let best: { file: string; mtimeMs: number } | null = null;
  for (const user of await listDir(steamUserData)) {
    const remote = path.join(steamUserData, user, GAME_APP_ID, "remote");
    for (const name of await listDir(remote)) {
      if (!name.endsWith(SAVE_FILE_SUFFIX)) continue;
      const file = path.join(remote, name);
      const st = await stat(file).catch(() => null);
      if (!st?.isFile()) continue;
      if (!best || st.mtimeMs > best.mtimeMs) best = { file, mtimeMs: st.mtimeMs };
    }
  }
  if (best) logger.debug(`Auto-detected profile: ${best.file}`, { module: "profile" });
  else logger.debug(`No ${SAVE_FILE_SUFFIX} files found under ${steamUserData}`, { module: "profile" });
  return best?.file ?? null;
}

function upperKeys<T>(record: Record<string, T>): Map<string, T> {
  const out = new Map<string, T>();
  for (const [k, v] of Object.entries(record)) out.set(k.toUpperCase(), v);
  return out;
}

/**
 * Merge the dynamic-difficulty (`Songs`) and score-attack (`SongsSA`)
 * sections. Ids the map does not know (other instruments, unscanned DLC)
 * are dropped.
 */
export function parseProfile(raw: unknown, idMap: Map<string, string>): PlayerProfile {
  const doc = SaveProgressDocument.parse(raw);
  const dd = upperKeys(doc.Songs);
  const sa = upperKeys(doc.SongsSA);

  const profile: PlayerProfile = new Map();
  let unmapped = 0;
  for (const pid of new Set([...dd.keys(), ...sa.keys()])) {
    const songId = idMap.get(pid);
    if (!songId) {
      unmapped++;
      continue;
    }
    const d = dd.get(pid);
    const s = sa.get(pid);
    profile.set(pid, {
      persistentId: pid,
      songId,
      badges: {
        easy: s?.Badges.Easy ?? 0,
        medium: s?.Badges.Medium ?? 0,
        hard: s?.Badges.Hard ?? 0,
        master: s?.Badges.Master ?? 0,
      },
      playCount: s?.PlayCount ?? 0,
      highScoreHard: s?.HighScores.Hard ?? 0,
      lastPlayed: d?.TimeStamp ?? 0,
      dynamicDifficultyAvg: d?.DynamicDifficulty.Avg ?? 0,
    });
  }

  if (unmapped) logger.debug(`${unmapped} profile songs not in the identifier map`, { module: "profile" });
  return profile;
}

export function isCompetent(p: SongProgress): boolean {
  return p.badges.hard >= COMPETENT_BADGE || p.badges.master >= COMPETENT_BADGE;
}

export function competentSongIds(profile: PlayerProfile): string[] {
  return [...profile.values()].filter(isCompetent).map(p => p.songId);
}

export function masteredSongIds(profile: PlayerProfile): string[] {
  return [...profile.values()]
    .filter(p => p.badges.hard >= MASTERED_BADGE || p.badges.master >= MASTERED_BADGE)
    .map(p => p.songId);
}

export function playedSongIds(profile: PlayerProfile): string[] {
  return [...profile.values()].filter(p => p.playCount > 0).map(p => p.songId);
}

export function progressForSong(profile: PlayerProfile, songId: string): SongProgress | undefined {
  for (const p of profile.values()) if (p.songId === songId) return p;
  return undefined;
}
