import type { Frame, FrameGate } from "../domain/audio/Frame";

export interface Burst {
  readonly frames: readonly Frame[];
  /** True when more than `cap` frames had accumulated since the last drain. */
  readonly truncated: boolean;
  /** Frames dropped past the cap. They are not carried into the next burst. */
  readonly discarded: number;
}

/**
 * Collects gated frames from the capture side until the segmentation loop drains
 * them. `offer` runs inside the capture callback and only gates and pushes;
 * `drain` swaps the whole list out in one step, which is the only state the two
 * sides share.
 */
export class SegmentBuffer {
  private frames: Frame[] = [];

  constructor(
    private readonly gate: FrameGate,
    private readonly cap: number
  ) {
    if (!Number.isInteger(cap) || cap < 1) {
      throw new RangeError(`Truncation cap must be a positive integer (got ${cap}).`);
    }
  }

  get size(): number {
    return this.frames.length;
  }

  get isEmpty(): boolean {
    return this.frames.length === 0;
  }

  offer(frame: Frame): boolean {
    if (!this.gate(frame)) return false;
    this.frames.push(frame);
    return true;
  }

  drain(): Burst | null {
    const taken = this.frames;
    this.frames = [];
    if (!taken.length) return null;

    if (taken.length > this.cap) {
      return {
        frames: taken.slice(0, this.cap),
        truncated: true,
        discarded: taken.length - this.cap,
      };
    }
    return { frames: taken, truncated: false, discarded: 0 };
  }
}
