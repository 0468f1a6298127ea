// Interview Coach Engine - Signal Features
// Turns the richer payloads returned by upstream providers (per-emotion face
// confidences, raw transcript text) into the scalar features a MetricVector
// holds. Pure functions; the normalizer decides when to call them.

// ─── Filler Words ───────────────────────────────────────────────────────────────

export const DEFAULT_FILLER_WORDS: readonly string[] = [
  "um",
  "uh",
  "like",
  "you know",
  "actually",
  "basically",
  "literally",
];

/** Punctuation stripped from token edges before filler matching. */
const EDGE_PUNCTUATION = /^[,.?!]+|[,.?!]+$/g;

/** Each pause marker ("...") adds this much to the mumble score. */
const MUMBLE_PER_PAUSE_MARKER = 0.05;

// ─── Facial Emotions ────────────────────────────────────────────────────────────

export interface FacialFeatures {
  engagement: number;
  positivity: number;
  anxiety: number;
}

/**
 * Derive engagement, positivity and anxiety from per-emotion confidences
 * expressed in percent (0-100). Only happy, calm, fear and confused
 * contribute. Labels are matched case-insensitively; missing labels count as 0.
 */
export function deriveFacialFromEmotions(emotions: Readonly<Record<string, number>>): FacialFeatures {
  const score = (label: string): number => {
    for (const [key, value] of Object.entries(emotions)) {
      if (key.toLowerCase() === label && Number.isFinite(value)) {
        return Math.max(0, value);
      }
    }
    return 0;
  };

  const happy = score("happy");
  const calm = score("calm");
  const nervous = score("fear") + score("confused");

  return {
    engagement: Math.min(1, (happy + calm) / 200 + 0.3),
    positivity: Math.min(1, happy / 100),
    anxiety: Math.min(1, nervous / 100),
  };
}

// ─── Transcript Analysis ────────────────────────────────────────────────────────

export interface TranscriptAnalysis {
  wordCount: number;
  fillerHits: number;
  fillerRatio: number;
  mumbleScore: number;
}

/**
 * Count filler words in a transcript and estimate how mumbled it is.
 *
 * Multi-word fillers ("you know") are matched as consecutive tokens and the
 * longest filler wins at each position, so "you know" is one hit, not two.
 */
export function analyzeTranscript(
  text: string,
  fillerWords: readonly string[] = DEFAULT_FILLER_WORDS,
): TranscriptAnalysis {
  const tokens = text
    .toLowerCase()
    .split(/\s+/)
    .map((t) => t.replace(EDGE_PUNCTUATION, ""))
    .filter((t) => t.length > 0);

  const phrases = fillerWords
    .map((f) => f.toLowerCase().split(/\s+/).filter((p) => p.length > 0))
    .filter((p) => p.length > 0)
    .sort((a, b) => b.length - a.length);

  let fillerHits = 0;
  let i = 0;
  while (i < tokens.length) {
    const match = phrases.find((phrase) =>
      phrase.every((part, offset) => tokens[i + offset] === part),
    );
    if (match) {
      fillerHits++;
      i += match.length;
    } else {
      i++;
    }
  }

  const fillerRatio = fillerHits / Math.max(tokens.length, 1);
  const pauseMarkers = text.split("...").length - 1;

  return {
    wordCount: tokens.length,
    fillerHits,
    fillerRatio,
    mumbleScore: Math.min(1, fillerRatio * 0.5 + pauseMarkers * MUMBLE_PER_PAUSE_MARKER),
  };
}

// ─── Highlights ─────────────────────────────────────────────────────────────────

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Lower-cased transcript segments that contain at least one filler word,
 * in transcript order, capped at `limit`.
 */
export function extractFillerHighlights(
  segments: readonly string[],
  fillerWords: readonly string[] = DEFAULT_FILLER_WORDS,
  limit: number = 5,
): string[] {
  const patterns = fillerWords
    .map((f) => f.trim().toLowerCase())
    .filter((f) => f.length > 0)
    .map((f) => new RegExp(`\\b${escapeRegExp(f).replace(/\s+/g, "\\s+")}\\b`));

  const highlights: string[] = [];
  for (const segment of segments) {
    if (highlights.length >= limit) break;
    const lower = segment.toLowerCase();
    if (patterns.some((p) => p.test(lower))) {
      highlights.push(lower);
    }
  }
  return highlights;
}
