/**
 * Zod schemas for every document we read: archive manifests, the decoded
 * save file and our own persisted catalog / identifier map.
 *
 * Manifest and save schemas list the keys we understand, each with an
 * explicit default; anything else in the source document is dropped.
 */
import { z } from "zod";
import { MANIFEST_TECHNIQUES, type TechniqueFlags } from "./utils/techniques.js";

// ── Coercers ──────────────────────────────────────────────

/** Number-like value → number, anything unparsable → def */
export const num = (def = 0) => z.coerce.number().catch(def);

/** Number-like value → truncated integer */
export const int = (def = 0) => z.coerce.number().transform(Math.trunc).catch(def);

export const str = (def = "") => z.string().catch(def);

const looseObject = z.record(z.string(), z.unknown());

// ── Archive manifests ─────────────────────────────────────

export const ManifestSection = z.object({
  Name: str(),
  Number: int(),
  StartTime: num(),
  EndTime: num(),
  IsSolo: z.boolean().catch(false),
});

export const ManifestAttributes = z.object({
  PersistentID: str(),
  FullName: str(),
  DLCKey: str(),
  ArtistName: str("Unknown"),
  SongName: str("Unknown"),
  AlbumName: str(),
  SongYear: int(),
  SongAverageTempo: num(),
  SongLength: num(),
  SongDiffEasy: num(),
  SongDiffMed: num(),
  SongDiffHard: num(),
  NotesEasy: int(),
  NotesMedium: int(),
  NotesHard: int(),
  MaxPhraseDifficulty: int(),
  ArrangementProperties: looseObject.catch({}),
  Tuning: z.record(z.string(), z.coerce.number()).catch({}),
  Sections: z.array(ManifestSection).catch([]),
});
export type ManifestAttributes = z.infer<typeof ManifestAttributes>;

export const ManifestDocument = z.object({
  Entries: z.record(
    z.string(),
    z.object({ Attributes: looseObject.catch({}) }).catch({ Attributes: {} }),
  ).catch({}),
});
export type ManifestDocument = z.infer<typeof ManifestDocument>;

// ── Decoded save file ─────────────────────────────────────

const DynamicDifficultyEntry = z.object({
  TimeStamp: num(),
  DynamicDifficulty: z.object({ Avg: num() }).catch({ Avg: 0 }),
}).catch({ TimeStamp: 0, DynamicDifficulty: { Avg: 0 } });

const ZERO_BADGES = { Easy: 0, Medium: 0, Hard: 0, Master: 0 };

const ScoreAttackEntry = z.object({
  Badges: z.object({ Easy: int(), Medium: int(), Hard: int(), Master: int() }).catch(ZERO_BADGES),
  PlayCount: int(),
  HighScores: z.object({ Hard: num() }).catch({ Hard: 0 }),
}).catch({ Badges: ZERO_BADGES, PlayCount: 0, HighScores: { Hard: 0 } });

export const SaveProgressDocument = z.object({
  Songs: z.record(z.string(), DynamicDifficultyEntry).catch({}),
  SongsSA: z.record(z.string(), ScoreAttackEntry).catch({}),
}).catch({ Songs: {}, SongsSA: {} });
export type SaveProgressDocument = z.infer<typeof SaveProgressDocument>;

// ── Persisted documents ───────────────────────────────────

/** Known technique keys only; keys written by a newer release are dropped */
const TechniqueFlagsSchema = z.record(z.string(), z.boolean()).transform(rec => {
  const flags: TechniqueFlags = {};
  for (const t of MANIFEST_TECHNIQUES) if (t in rec) flags[t] = rec[t];
  return flags;
});

const Triple = z.object({ easy: z.number(), medium: z.number(), hard: z.number() });

export const SongEntrySchema = z.object({
  songId: z.string().min(1),
  artist: z.string(),
  title: z.string(),
  album: z.string(),
  year: z.number(),
  tempo: z.number(),
  songLength: z.number(),
  difficulty: Triple,
  notes: Triple,
  maxPhraseDifficulty: z.number(),
  techniques: TechniqueFlagsSchema,
  sections: z.array(z.object({
    name: z.string(),
    number: z.number(),
    startTime: z.number(),
    endTime: z.number(),
    isSolo: z.boolean(),
  })),
  tuning: z.record(z.string(), z.number()),
  standardTuning: z.boolean(),
  dlcKey: z.string(),
  archivePath: z.string(),
  archiveMtime: z.number(),
});

export const CatalogDocument = z.object({
  version: z.number().int(),
  scannedAt: z.string(),
  songs: z.record(z.string(), SongEntrySchema),
  archives: z.record(z.string(), z.number()).catch({}),
});

export const IdentifierMapDocument = z.object({
  version: z.number().int(),
  archiveHash: z.string(),
  map: z.record(z.string(), z.string()),
});
