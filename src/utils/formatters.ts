/**
 * Text formatting for catalog and recommendation output.
 */
import type { SongEntry } from "../types/song.js";
import { MANIFEST_TECHNIQUES, techniqueGroupFor, type Technique, type TechniqueFlags } from "./techniques.js";

/** Techniques flagged on the song, in taxonomy order */
export function techniqueList(song: SongEntry): Technique[] {
  return MANIFEST_TECHNIQUES.filter(t => song.techniques[t]);
}

/**
 * Compact section summary, first-seen order.
 * e.g. intro, verse, chorus, verse, chorus → "intro(1),verse(2),chorus(2)"
 */
export function sectionSummary(song: SongEntry): string {
  const counts = new Map<string, number>();
  for (const s of song.sections) counts.set(s.name, (counts.get(s.name) ?? 0) + 1);
  return [...counts].map(([name, count]) => `${name}(${count})`).join(",");
}

export function oneLineSummary(song: SongEntry): string {
  return [
    `${song.artist} - ${song.title}`,
    `${song.tempo.toFixed(0)}bpm`,
    `diff:${song.difficulty.hard.toFixed(2)}`,
    techniqueList(song).join(","),
    `sections: ${sectionSummary(song)}`,
  ].join(" | ");
}

/** First `max` techniques, then "+N" for the rest */
export function shortTechniques(song: SongEntry, max = 4): string {
  const all = techniqueList(song);
  const head = all.slice(0, max).join(", ");
  return all.length > max ? `${head} +${all.length - max}` : head;
}

/** Left-aligned plain-text table; `right` lists column indexes to right-align */
export function formatTable(headers: string[], rows: string[][], right: number[] = []): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? "").length)));
  const line = (cells: string[]) => cells
    .map((c, i) => (right.includes(i) ? c.padStart(widths[i]) : c.padEnd(widths[i])))
    .join("  ")
    .trimEnd();
  return [line(headers), line(widths.map(w => "-".repeat(w))), ...rows.map(line)].join("\n");
}

// Teaching notes: a deterministic one-line description built from song metadata

/** Offsets of the four bass strings, low to high */
type BassTuning = [number, number, number, number];

const KNOWN_TUNINGS: [string, BassTuning][] = [
  ["Drop D", [-2, 0, 0, 0]],
  ["Drop C#", [-3, -1, -1, -1]],
  ["Drop C", [-4, -2, -2, -2]],
  ["Eb Standard", [-1, -1, -1, -1]],
  ["D Standard", [-2, -2, -2, -2]],
  ["C Standard", [-4, -4, -4, -4]],
];

/** Reads `string0`..`string3`, falling back to bare `0`..`3` keys */
export function bassTuning(tuning: Record<string, number>): BassTuning {
  const at = (i: number) => tuning[`string${i}`] ?? tuning[String(i)] ?? 0;
  return [at(0), at(1), at(2), at(3)];
}

export function detectTuningName(tuning: Record<string, number>): string {
  const offsets = bassTuning(tuning);
  if (offsets.every(v => v === 0)) return "Standard";
  const known = KNOWN_TUNINGS.find(([, t]) => t.every((v, i) => v === offsets[i]));
  if (known) return known[0];
  return `Custom (${offsets.map(v => (v >= 0 ? `+${v}` : String(v))).join(",")})`;
}

export function tempoBand(bpm: number): string {
  const label = bpm < 90 ? "Slow" : bpm < 140 ? "Medium" : bpm < 180 ? "Fast" : "Very Fast";
  return `${label} (${bpm.toFixed(0)} BPM)`;
}

export function noteDensityLabel(notes: number, lengthSec: number): string {
  if (lengthSec <= 0) return "Unknown";
  const perSecond = notes / lengthSec;
  if (perSecond < 1.5) return "Sparse";
  if (perSecond < 3) return "Moderate";
  if (perSecond < 5) return "Dense";
  return "Very Dense";
}

/** How much harder the hard chart is than the easy one */
export function difficultyCurveLabel(easy: number, hard: number): string {
  const spread = hard - easy;
  if (spread < 0.05) return "Flat";
  if (spread < 0.15) return "Gradual";
  if (spread < 0.30) return "Moderate";
  return "Steep";
}

/**
 * Active techniques grouped by skill group, groups in first-seen order.
 * e.g. "Articulation (hopo, slides) | Advanced Techniques (slapPop)"
 */
export function skillFocus(techniques: TechniqueFlags): string {
  const groups = new Map<string, Technique[]>();
  for (const t of MANIFEST_TECHNIQUES) {
    if (!techniques[t]) continue;
    const group = techniqueGroupFor(t);
    if (!group) continue;
    const list = groups.get(group.name);
    if (list) list.push(t);
    else groups.set(group.name, [t]);
  }
  if (!groups.size) return "General";
  return [...groups].map(([name, list]) => `${name} (${list.join(", ")})`).join(" | ");
}

export function teachingNote(song: SongEntry): string {
  const parts = [
    skillFocus(song.techniques),
    detectTuningName(song.tuning),
    tempoBand(song.tempo),
    noteDensityLabel(song.notes.hard, song.songLength),
  ];
  const curve = difficultyCurveLabel(song.difficulty.easy, song.difficulty.hard);
  if (curve !== "Flat") parts.push(`${curve} progression`);
  if (song.sections.some(s => s.isSolo)) parts.push("Features solo");
  return parts.join(" | ");
}
