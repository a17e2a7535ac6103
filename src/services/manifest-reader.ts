/**
 * Manifest reader - finds the bass arrangement manifest inside an extracted
 * archive and maps its attribute block onto our catalog types.
 *
 * A manifest looks like:
 *   manifests/songs_dlc_foo/foo_bass.json
 *   { "Entries": { "<PERSISTENT_ID>": { "Attributes": { "FullName": "Foo_Bass", ... } } } }
 */
import type { ArchiveFile } from "../providers/archive-provider.js";
import { ManifestAttributes, ManifestDocument } from "../schemas.js";
import type { SongEntry } from "../types/song.js";
import logger from "../utils/logger.js";
import { techniqueFlags } from "../utils/techniques.js";

const MANIFEST_PREFIX = "manifests/";
const BASS_MANIFEST_SUFFIX = "_bass.json";

export interface BassManifest {
  manifestPath: string;
  entryKey: string;
  attributes: Record<string, unknown>;
}

export function isBassManifestPath(internalPath: string): boolean {
  const p = internalPath.replace(/\\/g, "/");
  return p.startsWith(MANIFEST_PREFIX) && p.endsWith(BASS_MANIFEST_SUFFIX);
}

function parseManifest(bytes: Buffer): ManifestDocument | null {
  let json: unknown;
  try {
    json = JSON.parse(bytes.toString("utf8"));
  } catch {
    return null;
  }
  const result = ManifestDocument.safeParse(json);
  return result.success ? result.data : null;
}

/** Every bass manifest entry with a non-empty attribute block, in path then key order. */
export function listBassManifests(content: Map<string, Buffer>): BassManifest[] {
  const found: BassManifest[] = [];
  const paths = [...content.keys()].filter(isBassManifestPath).sort();
  for (const manifestPath of paths) {
    const bytes = content.get(manifestPath);
    if (!bytes) continue;
    const doc = parseManifest(bytes);
    if (!doc) {
      logger.debug(`Unparsable manifest ${manifestPath}`, { module: "manifest" });
      continue;
    }
    for (const entryKey of Object.keys(doc.Entries).sort()) {
      const attributes = doc.Entries[entryKey].Attributes;
      if (Object.keys(attributes).length) found.push({ manifestPath, entryKey, attributes });
    }
  }
  return found;
}

/**
 * Pick the bass manifest describing this archive's song.
 * With several candidates the richest attribute block wins; ties go to the
 * first manifest path. Returns null when the archive has no bass arrangement.
 */
export function selectBassManifest(content: Map<string, Buffer>, archiveName = ""): BassManifest | null {
  const candidates = listBassManifests(content);
  if (!candidates.length) return null;

  let best = candidates[0];
  for (const c of candidates.slice(1)) {
    if (Object.keys(c.attributes).length > Object.keys(best.attributes).length) best = c;
  }

  const names = new Set(candidates.map(c => String(c.attributes.FullName ?? "")));
  if (names.size > 1) {
    logger.warn(`${archiveName}: ${candidates.length} bass manifests disagree, using ${best.manifestPath}`, { module: "manifest" });
  }
  return best;
}

export function songIdFor(attrs: ManifestAttributes): string {
  return (attrs.FullName || `${attrs.DLCKey}_Bass`).toLowerCase();
}

export function toSongEntry(raw: Record<string, unknown>, archive: ArchiveFile): SongEntry {
  const attrs = ManifestAttributes.parse(raw);
  const props = attrs.ArrangementProperties;

  return {
    songId: songIdFor(attrs),
    artist: attrs.ArtistName,
    title: attrs.SongName,
    album: attrs.AlbumName,
    year: attrs.SongYear,
    tempo: attrs.SongAverageTempo,
    songLength: attrs.SongLength,
    difficulty: { easy: attrs.SongDiffEasy, medium: attrs.SongDiffMed, hard: attrs.SongDiffHard },
    notes: { easy: attrs.NotesEasy, medium: attrs.NotesMedium, hard: attrs.NotesHard },
    maxPhraseDifficulty: attrs.MaxPhraseDifficulty,
    techniques: techniqueFlags(t => Number(props[t] ?? 0) !== 0),
    sections: attrs.Sections.map(s => ({
      name: s.Name,
      number: s.Number,
      startTime: s.StartTime,
      endTime: s.EndTime,
      isSolo: s.IsSolo,
    })),
    tuning: attrs.Tuning,
    standardTuning: Number(props.standardTuning ?? 0) !== 0,
    dlcKey: attrs.DLCKey,
    archivePath: archive.path,
    archiveMtime: archive.mtimeMs,
  };
}

/** Normalised `artist|title` used to merge duplicate releases of one song. */
export function dedupKey(entry: Pick<SongEntry, "artist" | "title">): string {
  return `${entry.artist.trim().toLowerCase()}|${entry.title.trim().toLowerCase()}`;
}

/** Persistent id → song id for every bass entry in the archive. */
export function extractIdPairs(content: Map<string, Buffer>): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const m of listBassManifests(content)) {
    const attrs = ManifestAttributes.parse(m.attributes);
    const pid = (attrs.PersistentID || m.entryKey).toUpperCase();
    if (pid) pairs.set(pid, songIdFor(attrs));
  }
  return pairs;
}
