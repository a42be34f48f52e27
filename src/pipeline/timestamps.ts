const TIMESTAMP_RE = /(\d{2}):(\d{2}):(\d{2})/g;
const EXACT_TIMESTAMP_RE = /^(\d{2,}):(\d{2}):(\d{2})$/;

/**
 * Pulls every `HH:MM:SS` out of free model text, in order of appearance.
 * Brackets, commas and chatter around the matches are ignored. Minutes and
 * seconds are not range-checked: `00:01:75` reads as 135.
 */
export function extractTimestamps(rawText: string | null | undefined): number[] {
  if (!rawText) return [];
  const out: number[] = [];
  for (const m of rawText.matchAll(TIMESTAMP_RE)) {
    out.push(Number(m[1]) * 3600 + Number(m[2]) * 60 + Number(m[3]));
  }
  return out;
}

export function parseTimestamp(s: string): number | null {
  const m = EXACT_TIMESTAMP_RE.exec(s.trim());
  if (!m) return null;
  return Number(m[1]) * 3600 + Number(m[2]) * 60 + Number(m[3]);
}

/**
 * Duration given either as `HH:MM:SS` or as plain seconds; null when it is neither
 */
export function parseDuration(s: string): number | null {
  const fromClock = parseTimestamp(s);
  if (fromClock !== null) return fromClock;
  const trimmed = s.trim();
  const n = Number(trimmed);
  return trimmed !== "" && Number.isFinite(n) && n >= 0 ? n : null;
}

export function formatTimestamp(sec: number): string {
  const total = Math.max(0, Math.floor(sec));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map((n) => String(n).padStart(2, "0")).join(":");
}
