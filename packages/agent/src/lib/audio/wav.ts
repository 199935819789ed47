/**
 * Canonical PCM WAV header handling.
 *
 * Writers emit the 44-byte RIFF/fmt/data layout. The parser walks chunks so
 * files with extra chunks (LIST, fact) from other tools still read, and
 * clamps the data size to what is actually on disk: a capture killed before
 * it could fix its header may declare more data than it wrote.
 */

import { ValidationError } from "@edge-fleet/shared";

export const WAV_HEADER_SIZE = 44;

const PCM_FORMAT = 1;
const EXTENSIBLE_FORMAT = 0xfffe;

export interface WavFormat {
  channels: number;
  sampleRate: number;
  bitDepth: number;
}

export interface WavInfo extends WavFormat {
  /** Byte offset of the first sample */
  dataOffset: number;
  dataBytes: number;
  durationSeconds: number;
}

export function blockAlign(format: WavFormat): number {
  return format.channels * (format.bitDepth / 8);
}

export function encodeWavHeader(format: WavFormat, dataBytes: number): Buffer {
  const align = blockAlign(format);
  const header = Buffer.alloc(WAV_HEADER_SIZE);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write("WAVE", 8, "ascii");

  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(PCM_FORMAT, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * align, 28);
  header.writeUInt16LE(align, 32);
  header.writeUInt16LE(format.bitDepth, 34);

  header.write("data", 36, "ascii");
  header.writeUInt32LE(dataBytes, 40);
  return header;
}

/**
 * Parse the header at the start of `buf`.
 *
 * @param fileSize total file size; defaults to `buf.length`
 * @throws ValidationError VALIDATION_WAV_HEADER
 */
export function parseWavHeader(buf: Buffer, fileSize: number = buf.length): WavInfo {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new ValidationError("Not a RIFF/WAVE file", "VALIDATION_WAV_HEADER");
  }

  let format: WavFormat | null = null;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      if (body + 16 > buf.length) break;
      const audioFormat = buf.readUInt16LE(body);
      if (audioFormat !== PCM_FORMAT && audioFormat !== EXTENSIBLE_FORMAT) {
        throw new ValidationError(`Unsupported WAV format tag ${audioFormat}`, "VALIDATION_WAV_HEADER", {
          format_tag: audioFormat,
        });
      }
      format = {
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitDepth: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      if (!format) break;
      const available = Math.max(0, fileSize - body);
      const dataBytes = Math.min(size, available);
      const bytesPerSecond = format.sampleRate * blockAlign(format);
      return {
        ...format,
        dataOffset: body,
        dataBytes,
        durationSeconds: bytesPerSecond > 0 ? Math.round((dataBytes / bytesPerSecond) * 1000) / 1000 : 0,
      };
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw new ValidationError(
    format ? "WAV file has no data chunk" : "WAV file has no fmt chunk",
    "VALIDATION_WAV_HEADER",
  );
}
