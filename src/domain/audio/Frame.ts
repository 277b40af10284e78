export interface Frame {
  readonly samples: Int16Array;
  /** Mean absolute sample magnitude, computed once at capture time. */
  readonly meanAmplitude: number;
  readonly capturedAt: number;
}

/** Decides whether a captured frame is worth keeping. */
export type FrameGate = (frame: Frame) => boolean;

export const DEFAULT_SILENCE_THRESHOLD = 300;

export function meanAbsoluteAmplitude(samples: Int16Array): number {
  if (!samples.length) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i];
    sum += sample < 0 ? -sample : sample;
  }
  return sum / samples.length;
}

export function createFrame(samples: Int16Array, capturedAt: number): Frame {
  return Object.freeze({
    samples,
    meanAmplitude: meanAbsoluteAmplitude(samples),
    capturedAt,
  });
}

/**
 * Keeps frames whose mean absolute amplitude is strictly above `threshold`.
 *
 * This is a loudness gate, not voice-activity detection: steady background noise
 * above the threshold passes and quiet speech below it is dropped. Swap in another
 * {@link FrameGate} for anything smarter.
 */
export function amplitudeGate(threshold = DEFAULT_SILENCE_THRESHOLD): FrameGate {
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new RangeError(`Silence threshold must be a non-negative number (got ${threshold}).`);
  }
  return (frame) => frame.meanAmplitude > threshold;
}
