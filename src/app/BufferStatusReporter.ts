import type { SegmentBuffer } from "./SegmentBuffer";
import type { TranscriptLog } from "../domain/transcript/TranscriptLog";
import type { ShutdownSignal } from "../domain/pipeline/ShutdownSignal";

export type StatusWriter = (text: string) => void;

/** Rewrites a single terminal line with the buffered frame and segment counts. */
export class BufferStatusReporter {
  constructor(
    private readonly buffer: SegmentBuffer,
    private readonly log: TranscriptLog,
    private readonly shutdown: ShutdownSignal,
    private readonly write: StatusWriter,
    private readonly intervalMs: number
  ) {}

  render(): string {
    return `Buffers: audio=${this.buffer.size}, transcript=${this.log.length}`;
  }

  async run(): Promise<void> {
    while (this.shutdown.running) {
      this.write(`${this.render()}\r`);
      await this.shutdown.sleep(this.intervalMs);
    }
  }
}
