/**
 * Persistence for the catalog and identifier-map documents.
 * Each document is read whole and written whole (temp file + rename).
 */
import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { CoachError, errorMessage } from "../errors.js";
import { CatalogDocument, IdentifierMapDocument } from "../schemas.js";
import { CATALOG_VERSION, ID_MAP_VERSION, emptyCatalog, type Catalog, type IdentifierMapCache } from "../types/song.js";
import logger from "../utils/logger.js";

async function writeDocument(file: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
  await rename(tmp, file);
}

/** Missing file → empty catalog. A file that fails validation is an error. */
export async function loadCatalog(file: string): Promise<Catalog> {
  if (!existsSync(file)) return emptyCatalog();
  let json: unknown;
  try {
    json = JSON.parse(await readFile(file, "utf8"));
  } catch (e) {
    throw new CoachError(`Catalog ${file} is not valid JSON`, { cause: e });
  }
  const parsed = CatalogDocument.safeParse(json);
  if (!parsed.success) {
    throw new CoachError(`Catalog ${file} is invalid: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  if (parsed.data.version !== CATALOG_VERSION) {
    logger.warn(`Catalog version ${parsed.data.version} differs from ${CATALOG_VERSION}`, { module: "store" });
  }
  return parsed.data;
}

export async function saveCatalog(file: string, catalog: Catalog): Promise<void> {
  await writeDocument(file, { ...catalog, version: CATALOG_VERSION });
}

/** Returns null when the cache is missing or unreadable; callers rebuild. */
export async function loadIdMapCache(file: string): Promise<IdentifierMapCache | null> {
  if (!existsSync(file)) return null;
  try {
    const parsed = IdentifierMapDocument.safeParse(JSON.parse(await readFile(file, "utf8")));
    if (parsed.success && parsed.data.version === ID_MAP_VERSION) return parsed.data;
    logger.debug(`Identifier map cache ${file} failed validation`, { module: "store" });
  } catch (e) {
    logger.debug(`Identifier map cache ${file} unreadable: ${errorMessage(e)}`, { module: "store" });
  }
  return null;
}

export async function saveIdMapCache(file: string, archiveHash: string, map: Map<string, string>): Promise<void> {
  const doc: IdentifierMapCache = {
    version: ID_MAP_VERSION,
    archiveHash,
    map: Object.fromEntries(map),
  };
  await writeDocument(file, doc);
}
