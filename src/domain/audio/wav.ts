import type { Frame } from "./Frame";

export interface WavFormat {
  sampleRate: number;
  channels: number;
}

const HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;

/** Packs 16-bit PCM frames into a single RIFF/WAVE buffer. */
export function encodeWav(frames: readonly Frame[], format: WavFormat): Buffer {
  const sampleCount = frames.reduce((total, frame) => total + frame.samples.length, 0);
  const dataSize = sampleCount * BYTES_PER_SAMPLE;
  const blockAlign = format.channels * BYTES_PER_SAMPLE;
  const buffer = Buffer.alloc(HEADER_BYTES + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16); // PCM
  buffer.writeUInt16LE(1, 20); // format
  buffer.writeUInt16LE(format.channels, 22);
  buffer.writeUInt32LE(format.sampleRate, 24);
  buffer.writeUInt32LE(format.sampleRate * blockAlign, 28); // byte rate
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(16, 34); // bits per sample
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);

  let offset = HEADER_BYTES;
  for (const frame of frames) {
    for (let i = 0; i < frame.samples.length; i++) {
      buffer.writeInt16LE(frame.samples[i], offset);
      offset += BYTES_PER_SAMPLE;
    }
  }

  return buffer;
}
