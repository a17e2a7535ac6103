#!/usr/bin/env node
/**
 * bassline-coach CLI
 *
 * Scans a local .psarc library into a bass song catalog, reads the player's
 * save file and suggests what to learn next.
 *
 * Usage:
 *   npx tsx coach.ts scan --dir ~/dlc --reader ./psarc-reader.js
 *   npx tsx coach.ts catalog --technique slapPop --sort difficulty
 *   npx tsx coach.ts recommend --count 10 --zone growth
 *
 * Environment variables (or .env file):
 *   BASS_COACH_DATA_DIR, ARCHIVE_DIRS, ARCHIVE_READER, STEAM_USERDATA,
 *   SCAN_CONCURRENCY, LOG_LEVEL (debug|info|warn|error, default: info)
 */
import "dotenv/config";
import { ConfigError, errorMessage } from "./src/errors.js";
import { loadArchiveReader } from "./src/providers/archive-provider.js";
import {
  CatalogQueryService,
  CatalogSyncService,
  IdentifierMapService,
  findProfilePath,
  isCatalogSort,
  isZone,
  loadCatalog,
  parseProfile,
  recommend,
  saveCatalog,
  ZONES,
  type CatalogSort,
  type Zone,
} from "./src/services/index.js";
import { competentSongIds, playedSongIds } from "./src/services/profile-service.js";
import type { PlayerProfile } from "./src/types/song.js";
import { loadConfig, type AppConfig } from "./src/utils/config.js";
import { formatTable, oneLineSummary, sectionSummary, shortTechniques } from "./src/utils/formatters.js";
import logger, { setLogLevel } from "./src/utils/logger.js";
import { decodeSave } from "./src/utils/save-decoder.js";
import { isTechnique, MANIFEST_TECHNIQUES, TECHNIQUE_LABELS, type Technique } from "./src/utils/techniques.js";

const COMMANDS = ["scan", "catalog", "recommend", "profile"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

interface CliOptions {
  command: Command;
  force: boolean;
  dirs: string[];
  reader?: string;
  technique?: Technique;
  artist?: string;
  sort: CatalogSort;
  count: number;
  zone?: Zone;
  profile?: string;
  rebuildMap: boolean;
}

const HELP = `
bassline-coach: bass catalog & practice recommendations

Usage:
  bassline-coach <command> [options]

Commands:
  scan        Scan .psarc archives and update the catalog
  catalog     Browse the catalog
  recommend   Suggest songs just above your comfort level
  profile     Summarise progress read from the save file

Options:
  --dir, -d <path>         Archive directory (repeatable; default: ARCHIVE_DIRS)
  --reader, -r <module>    Archive reader module (default: ARCHIVE_READER)
  --force                  Re-scan every archive, ignoring cached mtimes
  --technique, -t <name>   Only songs using this technique
  --artist, -a <text>      Only artists containing this text (catalog)
  --sort <name|difficulty|tempo>
  --count, -n <n>          Number of recommendations (default: 20)
  --zone, -z <warm-up|growth|challenge|reach>
  --profile, -p <path>     Save file (default: newest *_PRFLDB in Steam userdata)
  --rebuild-map            Rebuild the identifier map even if the cache is valid
  --verbose, -v            Debug logging
  --help, -h               Show this help
`;

// ── Parse CLI args ──────────────────────────────────────────
function fail(msg: string): never {
  console.error(`Error: ${msg}`);
  process.exit(1);
}

function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  if (!args.length || args.includes("--help") || args.includes("-h")) {
    console.log(HELP);
    process.exit(0);
  }

  const [command, ...rest] = args;
  if (!isCommand(command)) fail(`Unknown command: ${command}`);

  const opts: CliOptions = {
    command,
    force: false,
    dirs: [],
    sort: "name",
    count: 20,
    rebuildMap: false,
  };

  const value = (i: number, flag: string): string => {
    const v = rest[i + 1];
    if (v === undefined || v.startsWith("--")) fail(`${flag} needs a value`);
    return v;
  };

  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    switch (a) {
      case "--force": opts.force = true; break;
      case "--rebuild-map": opts.rebuildMap = true; break;
      case "--verbose": case "-v": setLogLevel("debug"); break;
      case "--dir": case "-d": opts.dirs.push(value(i++, a)); break;
      case "--reader": case "-r": opts.reader = value(i++, a); break;
      case "--artist": case "-a": opts.artist = value(i++, a); break;
      case "--profile": case "-p": opts.profile = value(i++, a); break;
      case "--technique": case "-t": {
        const t = value(i++, a);
        if (!isTechnique(t)) fail(`Unknown technique: ${t}\nAvailable: ${MANIFEST_TECHNIQUES.join(", ")}`);
        opts.technique = t;
        break;
      }
      case "--sort": {
        const s = value(i++, a);
        if (!isCatalogSort(s)) fail(`Unknown sort: ${s}`);
        opts.sort = s;
        break;
      }
      case "--zone": case "-z": {
        const z = value(i++, a);
        if (!isZone(z)) fail(`Unknown zone: ${z}\nAvailable: ${ZONES.join(", ")}`);
        opts.zone = z;
        break;
      }
      case "--count": case "-n": {
        const n = parseInt(value(i++, a));
        if (!Number.isFinite(n) || n < 1) fail(`--count must be a positive integer`);
        opts.count = n;
        break;
      }
      default:
        fail(`Unknown option: ${a}`);
    }
  }
  return opts;
}

// ── Commands ────────────────────────────────────────────────
async function runScan(config: AppConfig, opts: CliOptions): Promise<void> {
  const dirs = opts.dirs.length ? opts.dirs : config.archiveDirs;
  const reader = await loadArchiveReader(opts.reader ?? config.archiveReader);
  const existing = await loadCatalog(config.catalogPath);

  const startTime = Date.now();
  const sync = new CatalogSyncService(reader, config.scanConcurrency);
  const { catalog, stats } = await sync.sync(dirs, opts.force, existing, (msg) => logger.debug(msg, { module: "scan" }));
  await saveCatalog(config.catalogPath, catalog);
  for (const song of Object.values(catalog.songs)) {
    if (!(song.songId in existing.songs)) logger.debug(`+ ${oneLineSummary(song)}`, { module: "scan" });
  }

  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  logger.info(`✅ Scan complete in ${duration}s`);
  logger.info(`   Archives:     ${stats.archives} (${stats.skipped} unchanged)`);
  logger.info(`   No bass:      ${stats.missingManifest}`);
  logger.info(`   Songs:        ${stats.songs}`);
  if (stats.errors.length) {
    logger.warn(`   Errors:       ${stats.errors.length}`);
    for (const e of stats.errors) logger.debug(`     - ${e}`);
  }
  console.log(`Catalog saved: ${stats.songs} bass songs → ${config.catalogPath}`);
}

async function runCatalog(config: AppConfig, opts: CliOptions): Promise<void> {
  const catalog = await loadCatalog(config.catalogPath);
  const query = new CatalogQueryService(catalog);
  if (!query.songCount) {
    console.log("No catalog found. Run 'bassline-coach scan' first.");
    return;
  }

  const songs = query.list({ technique: opts.technique, artist: opts.artist, sort: opts.sort });
  const heading = opts.technique ? ` - ${TECHNIQUE_LABELS[opts.technique]}` : "";
  console.log(`Bass Catalog (${songs.length} songs)${heading}\n`);
  console.log(formatTable(
    ["Artist", "Song", "BPM", "Diff", "Notes", "Techniques", "Sections"],
    songs.map(s => [
      s.artist,
      s.title,
      s.tempo.toFixed(0),
      s.difficulty.hard.toFixed(2),
      String(s.notes.hard),
      shortTechniques(s),
      sectionSummary(s).slice(0, 40),
    ]),
    [2, 3, 4],
  ));
}

async function loadPlayerProfile(config: AppConfig, opts: CliOptions): Promise<PlayerProfile> {
  const savePath = opts.profile ?? await findProfilePath(config.steamUserData);
  if (!savePath) {
    throw new ConfigError(`No save file found under ${config.steamUserData}. Use --profile <path>.`);
  }
  const dirs = opts.dirs.length ? opts.dirs : config.archiveDirs;
  const ids = new IdentifierMapService(
    () => loadArchiveReader(opts.reader ?? config.archiveReader),
    config.idMapPath,
    config.scanConcurrency,
  );
  const idMap = await ids.build(dirs, opts.rebuildMap, (msg) => logger.debug(msg, { module: "id-map" }));
  logger.debug(`Reading save ${savePath}`);
  return parseProfile(await decodeSave(savePath), idMap);
}

async function runRecommend(config: AppConfig, opts: CliOptions): Promise<void> {
  const catalog = await loadCatalog(config.catalogPath);
  if (!Object.keys(catalog.songs).length) {
    console.log("No catalog found. Run 'bassline-coach scan' first.");
    return;
  }
  const profile = await loadPlayerProfile(config, opts);
  const { ceiling, bounds, recommendations } = recommend(catalog, profile, {
    count: opts.count,
    zone: opts.zone,
    technique: opts.technique,
  });

  console.log(`Comfort ceiling: ${ceiling.toFixed(2)}`);
  for (const z of ZONES) {
    console.log(`  ${z.padEnd(9)} [${bounds[z].lo.toFixed(2)}, ${bounds[z].hi.toFixed(2)})`);
  }
  console.log("");
  console.log(formatTable(
    ["Zone", "Artist", "Song", "Diff", "Plays", "Teaching note"],
    recommendations.map(r => [
      r.zone,
      r.song.artist,
      r.song.title,
      r.song.difficulty.hard.toFixed(2),
      String(r.playCount),
      r.teachingNote,
    ]),
    [3, 4],
  ));
}

async function runProfile(config: AppConfig, opts: CliOptions): Promise<void> {
  const profile = await loadPlayerProfile(config, opts);
  const catalog = await loadCatalog(config.catalogPath);
  console.log(`Songs with progress: ${profile.size}`);
  console.log(`Learned (silver+):   ${competentSongIds(profile).length}`);
  console.log(`Played:              ${playedSongIds(profile).length}\n`);

  const rows = [...profile.values()]
    .sort((a, b) => b.playCount - a.playCount)
    .slice(0, opts.count)
    .map(p => {
      const song = catalog.songs[p.songId];
      return [
        song ? `${song.artist} - ${song.title}` : p.songId,
        String(p.playCount),
        `${p.badges.hard}/${p.badges.master}`,
        p.highScoreHard.toFixed(0),
        p.dynamicDifficultyAvg.toFixed(2),
      ];
    });
  console.log(formatTable(["Song", "Plays", "Badge H/M", "Hard score", "DD avg"], rows, [1, 3, 4]));
}

// ── Main ────────────────────────────────────────────────────
async function main() {
  const opts = parseArgs(process.argv);
  const config = loadConfig();

  switch (opts.command) {
    case "scan": return runScan(config, opts);
    case "catalog": return runCatalog(config, opts);
    case "recommend": return runRecommend(config, opts);
    case "profile": return runProfile(config, opts);
  }
}

main().catch((e) => {
  logger.error(e instanceof Error ? `${e.name}: ${e.message}` : errorMessage(e));
  process.exit(1);
});
