/**
 * CatalogQueryService - filtering and sorting over a loaded catalog
 */
import type { Catalog, SongEntry } from "../types/song.js";
import type { Technique } from "../utils/techniques.js";

export type CatalogSort = "name" | "difficulty" | "tempo";

export const CATALOG_SORTS: readonly CatalogSort[] = ["name", "difficulty", "tempo"];

export function isCatalogSort(value: string): value is CatalogSort {
  return (CATALOG_SORTS as readonly string[]).includes(value);
}

function byName(a: SongEntry, b: SongEntry): number {
  return a.artist.toLowerCase().localeCompare(b.artist.toLowerCase())
    || a.title.toLowerCase().localeCompare(b.title.toLowerCase());
}

export class CatalogQueryService {
  constructor(private catalog: Catalog) {}

  get songCount(): number {
    return Object.keys(this.catalog.songs).length;
  }

  songsWithTechnique(technique: Technique): SongEntry[] {
    return Object.values(this.catalog.songs).filter(s => s.techniques[technique]);
  }

  /** Case-insensitive substring match on the artist name */
  songsByArtist(artist: string): SongEntry[] {
    const needle = artist.toLowerCase();
    return Object.values(this.catalog.songs).filter(s => s.artist.toLowerCase().includes(needle));
  }

  list(filters?: { technique?: Technique; artist?: string; sort?: CatalogSort }): SongEntry[] {
    let songs = Object.values(this.catalog.songs);
    if (filters?.technique) { const t = filters.technique; songs = songs.filter(s => s.techniques[t]); }
    if (filters?.artist) {
      const needle = filters.artist.toLowerCase();
      songs = songs.filter(s => s.artist.toLowerCase().includes(needle));
    }

    switch (filters?.sort ?? "name") {
      case "difficulty": return songs.sort((a, b) => a.difficulty.hard - b.difficulty.hard);
      case "tempo": return songs.sort((a, b) => a.tempo - b.tempo);
      default: return songs.sort(byName);
    }
  }
}
