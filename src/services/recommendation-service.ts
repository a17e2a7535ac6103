/**
 * Difficulty-zone recommendations: songs a little harder than what the
 * player already plays comfortably.
 *
 * The comfort ceiling is a percentile of the hard-difficulty ratings of
 * songs the player has learned (or, failing that, played). Four 0.10-wide
 * zones sit around it and eligible songs are ranked by zone priority,
 * play count and distance from the zone midpoint.
 */
import type { Catalog, PlayerProfile, SongEntry } from "../types/song.js";
import { teachingNote } from "../utils/formatters.js";
import logger from "../utils/logger.js";
import type { Technique } from "../utils/techniques.js";
import { competentSongIds, playedSongIds } from "./profile-service.js";

export const ZONES = ["warm-up", "growth", "challenge", "reach"] as const;
export type Zone = (typeof ZONES)[number];

/** Lower value ranks first; independent of where the zone sits numerically */
export const ZONE_PRIORITY: Record<Zone, number> = {
  growth: 0,
  challenge: 1,
  "warm-up": 2,
  reach: 3,
};

export const BEGINNER_CEILING = 0.15;
export const COMPETENT_PERCENTILE = 0.85;
export const PLAYED_PERCENTILE = 0.70;
/** Fewer samples than this and the tier is skipped */
export const MIN_SAMPLES = 3;

export interface ZoneBounds {
  zone: Zone;
  /** inclusive */
  lo: number;
  /** exclusive */
  hi: number;
}

export type ZoneMap = Record<Zone, ZoneBounds>;

export interface Recommendation {
  song: SongEntry;
  zone: Zone;
  playCount: number;
  /** Skill focus, tuning, tempo and density in one line */
  teachingNote: string;
  /** [zone priority, play count, distance from zone midpoint] - ascending */
  sortKey: [number, number, number];
}

export interface RecommendOptions {
  count?: number;
  zone?: Zone;
  technique?: Technique;
}

export interface RecommendResult {
  ceiling: number;
  bounds: ZoneMap;
  recommendations: Recommendation[];
}

export function isZone(value: string): value is Zone {
  return (ZONES as readonly string[]).includes(value);
}

const clamp = (v: number) => Math.max(0, Math.min(1, v));

export function midpoint(b: ZoneBounds): number {
  return (b.lo + b.hi) / 2;
}

export function zoneContains(b: ZoneBounds, difficulty: number): boolean {
  return b.lo <= difficulty && difficulty < b.hi;
}

/** Value at floor(pct × n) of the ascending list, clamped to the last index */
export function percentile(sorted: number[], pct: number): number {
  const idx = Math.floor(sorted.length * pct);
  return sorted[Math.min(idx, sorted.length - 1)];
}

function hardDifficulties(catalog: Catalog, songIds: string[]): number[] {
  return songIds
    .filter(id => id in catalog.songs)
    .map(id => catalog.songs[id].difficulty.hard)
    .sort((a, b) => a - b);
}

export function computeComfortCeiling(catalog: Catalog, profile: PlayerProfile): number {
  const competent = hardDifficulties(catalog, competentSongIds(profile));
  if (competent.length >= MIN_SAMPLES) {
    const ceiling = percentile(competent, COMPETENT_PERCENTILE);
    logger.debug(`Comfort ceiling from ${competent.length} learned songs: ${ceiling.toFixed(3)}`, { module: "recommend" });
    return ceiling;
  }

  const played = hardDifficulties(catalog, playedSongIds(profile));
  if (played.length >= MIN_SAMPLES) {
    const ceiling = percentile(played, PLAYED_PERCENTILE);
    logger.debug(`Comfort ceiling from ${played.length} played songs: ${ceiling.toFixed(3)}`, { module: "recommend" });
    return ceiling;
  }

  logger.debug(`Beginner fallback: ceiling=${BEGINNER_CEILING}`, { module: "recommend" });
  return BEGINNER_CEILING;
}

/** Zone edges relative to the ceiling, warm-up lo through reach hi */
const ZONE_EDGES = [-0.10, 0, 0.10, 0.20, 0.30];

/** Adjacent zones share an endpoint, so the bands never overlap */
export function computeZoneBounds(ceiling: number): ZoneMap {
  const e = ZONE_EDGES.map(off => clamp(ceiling + off));
  return {
    "warm-up": { zone: "warm-up", lo: e[0], hi: e[1] },
    growth: { zone: "growth", lo: e[1], hi: e[2] },
    challenge: { zone: "challenge", lo: e[2], hi: e[3] },
    reach: { zone: "reach", lo: e[3], hi: e[4] },
  };
}

function compareKeys(a: Recommendation, b: Recommendation): number {
  for (let i = 0; i < a.sortKey.length; i++) {
    const d = a.sortKey[i] - b.sortKey[i];
    if (d !== 0) return d;
  }
  return 0;
}

export function recommend(catalog: Catalog, profile: PlayerProfile, options: RecommendOptions = {}): RecommendResult {
  const count = options.count ?? 20;
  const ceiling = computeComfortCeiling(catalog, profile);
  const bounds = computeZoneBounds(ceiling);
  const learned = new Set(competentSongIds(profile));
  const plays = new Map<string, number>();
  for (const p of profile.values()) plays.set(p.songId, p.playCount);

  const recommendations: Recommendation[] = [];
  for (const song of Object.values(catalog.songs)) {
    if (learned.has(song.songId)) continue;
    if (options.technique && !song.techniques[options.technique]) continue;

    const diff = song.difficulty.hard;
    const zones = ZONES.filter(z => zoneContains(bounds[z], diff));
    if (zones.length !== 1) continue;
    const zone = zones[0];
    if (options.zone && zone !== options.zone) continue;

    const playCount = plays.get(song.songId) ?? 0;
    recommendations.push({
      song,
      zone,
      playCount,
      teachingNote: teachingNote(song),
      sortKey: [ZONE_PRIORITY[zone], playCount, Math.abs(diff - midpoint(bounds[zone]))],
    });
  }

  recommendations.sort(compareKeys);
  return { ceiling, bounds, recommendations: recommendations.slice(0, Math.max(0, count)) };
}
