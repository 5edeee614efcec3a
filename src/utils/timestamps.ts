const MARKER_RE = /^\[(\d{2}):(\d{2}):(\d{2})\]/;

export const MARKER_GLOBAL_RE = /\[\d{2}:\d{2}:\d{2}\]/g;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `[HH:MM:SS]` for a non-negative offset in seconds. Hours are not wrapped at 24. */
export function formatMarker(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;
  return `[${pad2(h)}:${pad2(m)}:${pad2(s)}]`;
}

/** Seconds encoded by a leading `[HH:MM:SS]`, or null when the line has none. */
export function parseLeadingMarker(line: string): number | null {
  const match = MARKER_RE.exec(line);
  if (!match) return null;
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

export function countMarkers(text: string): number {
  return text.match(MARKER_GLOBAL_RE)?.length ?? 0;
}
