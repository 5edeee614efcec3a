import type { ChunkBoundary } from "../config/types.js";

const PARAGRAPH_BREAK = "\n\n";
const MARKER_LENGTH = "[00:00:00]".length;
const MARKER_RE = /^\[\d{2}:\d{2}:\d{2}\]$/;

/** Pull a cut back to the start of a `[HH:MM:SS]` marker it would split. */
function avoidSplitMarker(text: string, from: number, cut: number): number {
  const open = text.lastIndexOf("[", cut - 1);
  if (open <= from || open < cut - MARKER_LENGTH + 1) return cut;
  return MARKER_RE.test(text.slice(open, open + MARKER_LENGTH)) ? open : cut;
}

/**
 * Cut text into pieces of at most `chunkChars` characters.
 *
 * `hard` cuts at character offsets (moved back only when an offset would
 * fall inside a timestamp marker), so `chunks.join("")` is the input.
 * `paragraph` cuts at the last blank line inside each window and drops that
 * separator, so `chunks.join("\n\n")` is the input; a window with no blank
 * line falls back to a hard cut.
 */
export function chunkText(text: string, chunkChars: number, boundary: ChunkBoundary = "hard"): string[] {
  if (chunkChars <= 0) {
    throw new Error(`chunkChars must be positive, got ${chunkChars}`);
  }

  const chunks: string[] = [];
  let pos = 0;

  while (pos < text.length) {
    if (text.length - pos <= chunkChars) {
      chunks.push(text.slice(pos));
      break;
    }

    if (boundary === "paragraph") {
      const cut = text.slice(pos, pos + chunkChars).lastIndexOf(PARAGRAPH_BREAK);
      if (cut > 0) {
        chunks.push(text.slice(pos, pos + cut));
        pos += cut + PARAGRAPH_BREAK.length;
        continue;
      }
    }

    const end = avoidSplitMarker(text, pos, pos + chunkChars);
    chunks.push(text.slice(pos, end));
    pos = end;
  }

  return chunks;
}
