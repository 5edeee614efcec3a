import { writeFile } from "node:fs/promises";
import path from "node:path";
import { sanitizeSegment } from "../dataPaths.js";

export type TranscriptFiles = {
  rawPath: string;
  formattedPath: string;
};

/** Write `<label>.txt` (refined) and `<label>_raw.txt` side by side. */
export async function writeTranscriptFiles(
  dir: string,
  label: string,
  raw: string,
  formatted: string
): Promise<TranscriptFiles> {
  const base = sanitizeSegment(label);
  const formattedPath = path.join(dir, `${base}.txt`);
  const rawPath = path.join(dir, `${base}_raw.txt`);

  await writeFile(formattedPath, formatted, "utf8");
  await writeFile(rawPath, raw, "utf8");

  return { rawPath, formattedPath };
}
