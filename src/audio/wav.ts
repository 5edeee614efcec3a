/**
 * Minimal RIFF/WAVE support for 16-bit PCM: enough to read what ffmpeg
 * writes with `-acodec pcm_s16le` and to write windows back out.
 */

import { DecodeFailure } from "../errors.js";

export type WavFormat = {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
};

export type WavLayout = WavFormat & {
  dataOffset: number;
  dataBytes: number;
};

export const WAV_HEADER_BYTES = 44;

export function bytesPerSecond(format: WavFormat): number {
  return format.sampleRate * format.channels * (format.bitsPerSample / 8);
}

export function buildWavHeader(dataBytes: number, format: WavFormat): Buffer {
  const blockAlign = format.channels * (format.bitsPerSample / 8);
  const header = Buffer.alloc(WAV_HEADER_BYTES);

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16); // PCM fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(bytesPerSecond(format), 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataBytes, 40);

  return header;
}

/** Wrap raw PCM in a WAV container, dropping any trailing partial frame. */
export function pcmToWav(pcm: Buffer, format: WavFormat): Buffer {
  const frameBytes = format.channels * (format.bitsPerSample / 8);
  const aligned = pcm.length - (pcm.length % frameBytes);
  return Buffer.concat([buildWavHeader(aligned, format), pcm.subarray(0, aligned)]);
}

/**
 * Walk the RIFF chunks in `head` to find `fmt ` and `data`.
 * `fileBytes` caps the data size when the header carries a placeholder
 * (streamed writers leave 0 or 0xFFFFFFFF there).
 */
export function parseWavHeader(head: Buffer, fileBytes: number): WavLayout {
  if (head.length < 12 || head.toString("ascii", 0, 4) !== "RIFF" || head.toString("ascii", 8, 12) !== "WAVE") {
    throw new DecodeFailure("invalid_wav", "missing RIFF/WAVE signature");
  }

  let offset = 12;
  let format: WavFormat | null = null;

  while (offset + 8 <= head.length) {
    const id = head.toString("ascii", offset, offset + 4);
    const size = head.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      if (body + 16 > head.length) break;
      const audioFormat = head.readUInt16LE(body);
      if (audioFormat !== 1) {
        throw new DecodeFailure("invalid_wav", `unsupported audio format ${audioFormat}`);
      }
      format = {
        channels: head.readUInt16LE(body + 2),
        sampleRate: head.readUInt32LE(body + 4),
        bitsPerSample: head.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      if (!format) {
        throw new DecodeFailure("invalid_wav", "data chunk before fmt chunk");
      }
      const available = Math.max(0, fileBytes - body);
      const dataBytes = size === 0 || size === 0xffffffff ? available : Math.min(size, available);
      return { ...format, dataOffset: body, dataBytes };
    }

    // chunks are word-aligned
    offset = body + size + (size % 2);
  }

  throw new DecodeFailure("invalid_wav", "no data chunk in header");
}
