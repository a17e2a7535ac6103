// =====================================================
// ARCHIVE PROVIDER - .psarc discovery and the reader seam
// =====================================================
//
// Parsing the PSARC container is delegated to an external reader. The core
// only needs `internal path → bytes` for one archive at a time.

import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigError } from "../errors.js";
import logger from "../utils/logger.js";

export const ARCHIVE_EXTENSION = ".psarc";

export interface ExtractOptions {
  /** Archive table of contents is encrypted in retail archives */
  decrypt: boolean;
}

export interface ManifestExtractor {
  extract(archive: Buffer, options: ExtractOptions): Promise<Map<string, Buffer>> | Map<string, Buffer>;
}

export interface ArchiveFile {
  path: string;
  name: string;
  mtimeMs: number;
}

/**
 * List archives under each directory, sorted by file name.
 * Directories that do not exist contribute nothing.
 */
export async function findArchives(dirs: string[]): Promise<ArchiveFile[]> {
  const out: ArchiveFile[] = [];
  for (const dir of dirs) {
    const abs = path.resolve(dir);
    let names: string[];
    try {
      const entries = await readdir(abs, { withFileTypes: true });
      names = entries
        .filter(e => (e.isFile() || e.isSymbolicLink()) && e.name.toLowerCase().endsWith(ARCHIVE_EXTENSION))
        .map(e => e.name)
        .sort();
    } catch (e) {
      const code = e instanceof Error && "code" in e ? e.code : undefined;
      if (code === "ENOENT" || code === "ENOTDIR") {
        logger.debug(`Archive dir not found: ${abs}`, { module: "archives" });
        continue;
      }
      throw e;
    }
    for (const name of names) {
      const file = path.join(abs, name);
      const st = await stat(file);
      out.push({ path: file, name, mtimeMs: st.mtimeMs });
    }
  }
  return out;
}

/**
 * SHA-256 over the sorted `[absolutePath, mtimeMs]` pairs of every archive.
 * Any addition, removal or touch of an archive changes the hash.
 */
export function archiveSetHash(archives: ArchiveFile[]): string {
  const pairs: [string, number][] = archives.map(a => [path.resolve(a.path), a.mtimeMs]);
  pairs.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : a[1] - b[1]));
  return createHash("sha256").update(JSON.stringify(pairs)).digest("hex");
}

/** Read one archive from disk and hand it to the reader. */
export async function readArchive(extractor: ManifestExtractor, archive: ArchiveFile): Promise<Map<string, Buffer>> {
  const bytes = await readFile(archive.path);
  return await extractor.extract(bytes, { decrypt: true });
}

function isExtractor(value: unknown): value is ManifestExtractor {
  return typeof value === "object" && value !== null
    && "extract" in value && typeof value.extract === "function";
}

/**
 * Load a reader module by path or package name. The module must export
 * `extract(bytes, options)` directly or on its default export.
 */
export async function loadArchiveReader(specifier: string | undefined): Promise<ManifestExtractor> {
  if (!specifier) {
    throw new ConfigError("No archive reader configured. Use --reader <module> or set ARCHIVE_READER.");
  }
  const local = path.resolve(specifier);
  const target = existsSync(local) ? pathToFileURL(local).href : specifier;

  let mod: unknown;
  try {
    mod = await import(target);
  } catch (e) {
    throw new ConfigError(`Cannot load archive reader "${specifier}"`, { cause: e });
  }
  if (isExtractor(mod)) return mod;
  if (typeof mod === "object" && mod !== null && "default" in mod && isExtractor(mod.default)) {
    return mod.default;
  }
  throw new ConfigError(`Archive reader "${specifier}" does not export extract()`);
}
