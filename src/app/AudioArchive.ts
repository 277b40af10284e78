import type { StoragePort } from "../ports/sys/StoragePort";

/** Keeps a copy of each transcribed burst as `<ISO timestamp>.wav` (colons become dashes). */
export class AudioArchive {
  constructor(private readonly storage: StoragePort) {}

  save(wav: Buffer, capturedAt: number): Promise<string> {
    const stamp = new Date(capturedAt).toISOString().replace(/:/g, "-");
    return this.storage.write(`${stamp}.wav`, wav);
  }
}
