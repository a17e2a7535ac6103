/**
 * Centralised configuration - every value can be overridden from the
 * environment (or a .env file loaded by the CLI).
 */
import { homedir } from "node:os";
import path from "node:path";

/** Steam app id of the game whose saves and archives we read */
export const GAME_APP_ID = "221680";

type Env = Record<string, string | undefined>;

function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homedir(), p.slice(2));
  return p;
}

function envPath(env: Env, key: string): string | undefined {
  const val = env[key];
  return val ? path.resolve(expandHome(val)) : undefined;
}

function envPathList(env: Env, key: string): string[] | undefined {
  const val = env[key];
  if (!val) return undefined;
  const parts = val.split(path.delimiter).map(s => s.trim()).filter(Boolean);
  return parts.length ? parts.map(p => path.resolve(expandHome(p))) : undefined;
}

function steamRoot(env: Env): string {
  switch (process.platform) {
    case "darwin":
      return path.join(homedir(), "Library", "Application Support", "Steam");
    case "win32":
      return path.join(env["ProgramFiles(x86)"] || "C:\\Program Files (x86)", "Steam");
    default:
      return path.join(homedir(), ".local", "share", "Steam");
  }
}

export interface AppConfig {
  dataDir: string;
  catalogPath: string;
  idMapPath: string;
  archiveDirs: string[];
  archiveReader?: string;
  steamUserData: string;
  scanConcurrency: number;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = envPath(env, "BASS_COACH_DATA_DIR") ?? path.join(homedir(), ".local", "share", "bassline-coach");
  const concurrency = parseInt(env.SCAN_CONCURRENCY || "4");
  return {
    dataDir,
    catalogPath: path.join(dataDir, "catalog.json"),
    idMapPath: path.join(dataDir, "id_map.json"),
    archiveDirs: envPathList(env, "ARCHIVE_DIRS")
      ?? [path.join(steamRoot(env), "steamapps", "common", "Rocksmith2014", "dlc")],
    archiveReader: env.ARCHIVE_READER || undefined,
    steamUserData: envPath(env, "STEAM_USERDATA") ?? path.join(steamRoot(env), "userdata"),
    scanConcurrency: Number.isFinite(concurrency) && concurrency > 0 ? concurrency : 4,
  };
}
