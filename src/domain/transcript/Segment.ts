export interface Segment {
  readonly position: number;
  readonly text: string;
  /** Set when the source burst held more frames than the truncation cap. */
  readonly truncated: boolean;
  readonly captureStart: number;
  readonly captureEnd: number;
  /** captureEnd - captureStart, in milliseconds. */
  readonly processingDelay: number;
}

export type SegmentDraft = Pick<Segment, "text" | "truncated" | "captureStart" | "captureEnd">;

export function formatDelay(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}
