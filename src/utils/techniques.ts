/**
 * Bass technique flags read from a manifest's ArrangementProperties block,
 * with their display labels.
 */

export const MANIFEST_TECHNIQUES = [
  "slides",
  "unpitchedSlides",
  "hopo",
  "slapPop",
  "fretHandMutes",
  "palmMutes",
  "harmonics",
  "pinchHarmonics",
  "tapping",
  "vibrato",
  "tremolo",
  "bends",
  "sustain",
  "syncopation",
  "twoFingerPicking",
  "bassPick",
  "fingerPicking",
  "fifthsAndOctaves",
  "doubleStops",
  "openChords",
  "pickDirection",
] as const;

export type Technique = (typeof MANIFEST_TECHNIQUES)[number];

export const TECHNIQUE_LABELS: Record<Technique, string> = {
  slides:           "Slides",
  unpitchedSlides:  "Unpitched Slides",
  hopo:             "Hammer-On / Pull-Off",
  slapPop:          "Slap & Pop",
  fretHandMutes:    "Fret-Hand Mutes",
  palmMutes:        "Palm Mutes",
  harmonics:        "Harmonics",
  pinchHarmonics:   "Pinch Harmonics",
  tapping:          "Tapping",
  vibrato:          "Vibrato",
  tremolo:          "Tremolo",
  bends:            "Bends",
  sustain:          "Sustain",
  syncopation:      "Syncopation",
  twoFingerPicking: "Two-Finger Picking",
  bassPick:         "Bass Pick",
  fingerPicking:    "Finger Picking",
  fifthsAndOctaves: "Fifths & Octaves",
  doubleStops:      "Double Stops",
  openChords:       "Open Chords",
  pickDirection:    "Pick Direction",
};

export function isTechnique(value: string): value is Technique {
  return (MANIFEST_TECHNIQUES as readonly string[]).includes(value);
}

export type TechniqueFlags = Partial<Record<Technique, boolean>>;

/** Read every known technique flag; keys the source lacks come out false */
export function techniqueFlags(read: (technique: Technique) => unknown): TechniqueFlags {
  const flags: TechniqueFlags = {};
  for (const t of MANIFEST_TECHNIQUES) flags[t] = Boolean(read(t));
  return flags;
}

export type SkillGroupId = "fundamentals" | "rhythm" | "articulation" | "advanced" | "patterns";

export interface SkillGroup {
  name: string;
  order: number;
  level: string;
  techniques: readonly Technique[];
}

/** Every technique belongs to exactly one group */
export const SKILL_GROUPS: Record<SkillGroupId, SkillGroup> = {
  fundamentals: {
    name: "Bass Fundamentals",
    order: 1,
    level: "beginner",
    techniques: ["sustain", "twoFingerPicking", "bassPick", "fingerPicking"],
  },
  rhythm: {
    name: "Rhythm & Muting",
    order: 2,
    level: "beginner-intermediate",
    techniques: ["syncopation", "fretHandMutes", "palmMutes"],
  },
  articulation: {
    name: "Articulation",
    order: 3,
    level: "intermediate",
    techniques: ["hopo", "slides", "unpitchedSlides", "bends", "vibrato"],
  },
  advanced: {
    name: "Advanced Techniques",
    order: 4,
    level: "advanced",
    techniques: ["slapPop", "tapping", "harmonics", "pinchHarmonics", "tremolo", "pickDirection"],
  },
  patterns: {
    name: "Patterns & Chords",
    order: 5,
    level: "intermediate-advanced",
    techniques: ["fifthsAndOctaves", "doubleStops", "openChords"],
  },
};

export function techniqueGroupFor(technique: Technique): SkillGroup | undefined {
  return Object.values(SKILL_GROUPS).find(g => g.techniques.includes(technique));
}
