/**
 * CatalogSyncService - incremental scan of .psarc archives into the catalog
 *
 * Unchanged archives (same mtime as recorded in the catalog's archive index)
 * are skipped unless `force` is set; the index also covers archives that
 * yielded no entry. Changed archives are read through the external
 * reader, their bass manifest mapped to a SongEntry, and the result merged
 * by dedup key. A failing archive is logged and counted, never fatal.
 */
import path from "node:path";
import {
  findArchives,
  readArchive,
  type ArchiveFile,
  type ManifestExtractor,
} from "../providers/archive-provider.js";
import { errorMessage } from "../errors.js";
import { CATALOG_VERSION, emptyCatalog, type Catalog, type SongEntry } from "../types/song.js";
import logger from "../utils/logger.js";
import { dedupKey, selectBassManifest, toSongEntry } from "./manifest-reader.js";

/** PC release; preferred over the Mac (`_m.psarc`) release of the same song */
export const PRIMARY_PLATFORM_SUFFIX = "_p.psarc";

export interface SyncStats {
  archives: number;
  scanned: number;
  skipped: number;
  missingManifest: number;
  songs: number;
  errors: string[];
}

export interface SyncResult {
  catalog: Catalog;
  stats: SyncStats;
}

type ScanOutcome =
  | { kind: "song"; archive: ArchiveFile; entry: SongEntry }
  | { kind: "missing"; archive: ArchiveFile }
  | { kind: "error"; archive: ArchiveFile; message: string };

export function isPrimaryPlatform(archivePath: string): boolean {
  return path.basename(archivePath).toLowerCase().endsWith(PRIMARY_PLATFORM_SUFFIX);
}

/** Primary-platform archives first, then by path */
function compareCandidates(a: SongEntry, b: SongEntry): number {
  const pa = isPrimaryPlatform(a.archivePath) ? 0 : 1;
  const pb = isPrimaryPlatform(b.archivePath) ? 0 : 1;
  if (pa !== pb) return pa - pb;
  return a.archivePath < b.archivePath ? -1 : a.archivePath > b.archivePath ? 1 : 0;
}

export class CatalogSyncService {
  constructor(
    private extractor: ManifestExtractor,
    private concurrency = 4,
  ) {}

  async sync(
    dirs: string[],
    force = false,
    existing: Catalog = emptyCatalog(),
    onProgress?: (msg: string) => void,
  ): Promise<SyncResult> {
    const stats: SyncStats = { archives: 0, scanned: 0, skipped: 0, missingManifest: 0, songs: 0, errors: [] };

    const archives = await findArchives(dirs);
    stats.archives = archives.length;
    if (!archives.length) {
      logger.warn(`No .psarc files found in ${dirs.join(", ")}`, { module: "sync" });
      stats.songs = Object.keys(existing.songs).length;
      return { catalog: { ...existing, songs: { ...existing.songs } }, stats };
    }

    // Catalogs written before the archive index existed only know their song archives
    const cachedMtimes = new Map<string, number>();
    for (const entry of Object.values(existing.songs)) cachedMtimes.set(entry.archivePath, entry.archiveMtime);
    for (const [file, mtimeMs] of Object.entries(existing.archives)) cachedMtimes.set(file, mtimeMs);

    const toScan = archives.filter(a => force || cachedMtimes.get(a.path) !== a.mtimeMs);
    const failed = new Set<string>();
    stats.skipped = archives.length - toScan.length;

    const outcomes: ScanOutcome[] = [];
    const step = Math.max(1, this.concurrency);
    for (let i = 0; i < toScan.length; i += step) {
      const batch = toScan.slice(i, i + step);
      outcomes.push(...await Promise.all(batch.map(a => this.scanArchive(a))));
      onProgress?.(`Scanned ${Math.min(i + batch.length, toScan.length)}/${toScan.length} archives`);
    }

    // Archives that were read successfully are authoritative for their own entries
    const rescanned = new Set<string>();
    const fresh = new Map<string, SongEntry[]>();
    for (const o of outcomes) {
      if (o.kind === "error") {
        stats.errors.push(`${o.archive.name}: ${o.message}`);
        failed.add(o.archive.path);
        continue;
      }
      stats.scanned++;
      rescanned.add(o.archive.path);
      if (o.kind === "missing") {
        stats.missingManifest++;
        continue;
      }
      const key = dedupKey(o.entry);
      const list = fresh.get(key);
      if (list) list.push(o.entry);
      else fresh.set(key, [o.entry]);
    }

    const merged = new Map<string, SongEntry>();
    for (const entry of Object.values(existing.songs)) {
      if (!rescanned.has(entry.archivePath)) merged.set(dedupKey(entry), entry);
    }

    for (const [key, candidates] of fresh) {
      const winner = [...candidates].sort(compareCandidates)[0];
      const holder = merged.get(key);
      // A secondary-platform release never displaces another archive's entry
      if (!holder || (isPrimaryPlatform(winner.archivePath) && compareCandidates(winner, holder) < 0)) {
        merged.set(key, winner);
      }
    }

    const songs: Record<string, SongEntry> = {};
    for (const entry of [...merged.values()].sort((a, b) => (a.songId < b.songId ? -1 : a.songId > b.songId ? 1 : 0))) {
      songs[entry.songId] = entry;
    }
    stats.songs = Object.keys(songs).length;

    // Failed archives stay out of the index so the next run retries them
    const index: Record<string, number> = {};
    for (const a of archives) if (!failed.has(a.path)) index[a.path] = a.mtimeMs;

    if (stats.errors.length) {
      logger.warn(`${stats.errors.length} archives failed to parse`, { module: "sync" });
    }
    logger.info(
      `Catalog sync: ${stats.scanned} scanned, ${stats.skipped} unchanged, ${stats.missingManifest} without bass, ${stats.songs} songs`,
      { module: "sync" },
    );

    return {
      catalog: { version: CATALOG_VERSION, scannedAt: new Date().toISOString(), songs, archives: index },
      stats,
    };
  }

  private async scanArchive(archive: ArchiveFile): Promise<ScanOutcome> {
    try {
      const content = await readArchive(this.extractor, archive);
      const manifest = selectBassManifest(content, archive.name);
      if (!manifest) {
        logger.debug(`${archive.name}: no bass arrangement`, { module: "sync" });
        return { kind: "missing", archive };
      }
      return { kind: "song", archive, entry: toSongEntry(manifest.attributes, archive) };
    } catch (e) {
      logger.warn(`Failed to parse ${archive.name}: ${errorMessage(e)}`, { module: "sync" });
      return { kind: "error", archive, message: errorMessage(e) };
    }
  }
}
