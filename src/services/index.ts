/**
 * Services barrel exports
 */
export { CatalogQueryService, isCatalogSort } from "./catalog-query-service.js";
export type { CatalogSort } from "./catalog-query-service.js";
export { loadCatalog, loadIdMapCache, saveCatalog, saveIdMapCache } from "./catalog-store.js";
export { CatalogSyncService, isPrimaryPlatform } from "./catalog-sync-service.js";
export type { SyncResult, SyncStats } from "./catalog-sync-service.js";
export { IdentifierMapService } from "./id-map-service.js";
export type { IdMapBuildStats } from "./id-map-service.js";
export { dedupKey, extractIdPairs, selectBassManifest, toSongEntry } from "./manifest-reader.js";
export { findProfilePath, parseProfile } from "./profile-service.js";
export { isZone, recommend, ZONES } from "./recommendation-service.js";
export type { Recommendation, RecommendResult, Zone, ZoneBounds } from "./recommendation-service.js";
