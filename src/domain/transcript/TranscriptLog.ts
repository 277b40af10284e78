import type { Segment, SegmentDraft } from "./Segment";

/**
 * Append-only, position-indexed record of every transcribed segment.
 *
 * One writer appends; any number of readers walk it through their own
 * {@link TranscriptCursor}. Entries are frozen and positions are never reused.
 */
export class TranscriptLog {
  private readonly segments: Segment[] = [];

  get length(): number {
    return this.segments.length;
  }

  append(draft: SegmentDraft): Segment {
    const segment: Segment = Object.freeze({
      position: this.segments.length,
      text: draft.text,
      truncated: draft.truncated,
      captureStart: draft.captureStart,
      captureEnd: draft.captureEnd,
      processingDelay: draft.captureEnd - draft.captureStart,
    });
    this.segments.push(segment);
    return segment;
  }

  get(position: number): Segment | undefined {
    return this.segments[position];
  }

  readFrom(position: number): readonly Segment[] {
    return this.segments.slice(Math.max(0, position));
  }

  cursor(start = 0): TranscriptCursor {
    return new TranscriptCursor(this, start);
  }
}

export class TranscriptCursor {
  private next: number;

  constructor(private readonly log: TranscriptLog, start = 0) {
    if (!Number.isInteger(start) || start < 0) {
      throw new RangeError(`Cursor start must be a non-negative integer (got ${start}).`);
    }
    this.next = start;
  }

  /** Next position this reader has not consumed yet. */
  get position(): number {
    return this.next;
  }

  get backlog(): number {
    return Math.max(0, this.log.length - this.next);
  }

  pending(): readonly Segment[] {
    return this.log.readFrom(this.next);
  }

  commit(segment: Segment): void {
    if (segment.position !== this.next) {
      throw new Error(
        `Cursor expected position ${this.next} but was asked to commit ${segment.position}.`
      );
    }
    this.next = segment.position + 1;
  }
}
