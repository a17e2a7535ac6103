/**
 * IdentifierMapService - persistent id (save file) → catalog song id
 *
 * Building the map means reading every archive, so the result is cached
 * alongside a hash of the archive set. The cache is used only when the hash
 * still matches; otherwise the whole map is rebuilt and rewritten.
 */
import {
  archiveSetHash,
  findArchives,
  readArchive,
  type ManifestExtractor,
} from "../providers/archive-provider.js";
import { errorMessage } from "../errors.js";
import logger from "../utils/logger.js";
import { loadIdMapCache, saveIdMapCache } from "./catalog-store.js";
import { extractIdPairs } from "./manifest-reader.js";

export interface IdMapBuildStats {
  cacheHit: boolean;
  archives: number;
  entries: number;
  errors: string[];
}

/** An extractor, or a loader for one that runs only when archives must be read */
export type ExtractorSource = ManifestExtractor | (() => Promise<ManifestExtractor>);

export class IdentifierMapService {
  /** Stats of the most recent build() */
  lastStats: IdMapBuildStats = { cacheHit: false, archives: 0, entries: 0, errors: [] };

  constructor(
    private extractorSource: ExtractorSource,
    private cachePath: string,
    private concurrency = 4,
  ) {}

  async build(dirs: string[], force = false, onProgress?: (msg: string) => void): Promise<Map<string, string>> {
    const archives = await findArchives(dirs);
    const currentHash = archiveSetHash(archives);
    const stats: IdMapBuildStats = { cacheHit: false, archives: archives.length, entries: 0, errors: [] };
    this.lastStats = stats;

    if (!force) {
      const cached = await loadIdMapCache(this.cachePath);
      if (cached && cached.archiveHash === currentHash) {
        stats.cacheHit = true;
        stats.entries = Object.keys(cached.map).length;
        logger.debug(`ID map cache hit (${stats.entries} entries)`, { module: "id-map" });
        return new Map(Object.entries(cached.map));
      }
      if (cached) logger.debug("ID map cache stale (archive set changed)", { module: "id-map" });
    }

    if (!archives.length) {
      logger.warn(`No .psarc files found to build ID map from ${dirs.join(", ")}`, { module: "id-map" });
      await saveIdMapCache(this.cachePath, currentHash, new Map());
      return new Map();
    }

    const extractor = typeof this.extractorSource === "function"
      ? await this.extractorSource()
      : this.extractorSource;

    // Extraction runs in parallel batches; merging stays in archive order
    const partials: (Map<string, string> | null)[] = [];
    const step = Math.max(1, this.concurrency);
    for (let i = 0; i < archives.length; i += step) {
      const batch = archives.slice(i, i + step);
      partials.push(...await Promise.all(batch.map(async archive => {
        try {
          return extractIdPairs(await readArchive(extractor, archive));
        } catch (e) {
          logger.debug(`Failed to extract IDs from ${archive.name}: ${errorMessage(e)}`, { module: "id-map" });
          stats.errors.push(`${archive.name}: ${errorMessage(e)}`);
          return null;
        }
      })));
      onProgress?.(`Indexed ${Math.min(i + batch.length, archives.length)}/${archives.length} archives`);
    }

    const map = new Map<string, string>();
    for (const partial of partials) {
      if (!partial) continue;
      for (const [pid, songId] of partial) map.set(pid, songId);
    }
    stats.entries = map.size;

    if (stats.errors.length) {
      logger.warn(`${stats.errors.length} archives failed during ID map build`, { module: "id-map" });
    }

    await saveIdMapCache(this.cachePath, currentHash, map);
    logger.debug(`ID map cached: ${map.size} entries -> ${this.cachePath}`, { module: "id-map" });
    return map;
  }
}
