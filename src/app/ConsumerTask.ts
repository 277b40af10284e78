import type { Segment } from "../domain/transcript/Segment";
import type { TranscriptCursor, TranscriptLog } from "../domain/transcript/TranscriptLog";
import type { ShutdownSignal } from "../domain/pipeline/ShutdownSignal";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../domain/errors";

/** One downstream side effect per transcript segment. */
export interface SegmentSink {
  readonly name: string;
  accept(segment: Segment): Promise<void>;
}

export interface ConsumerTaskOptions {
  pollIntervalMs: number;
  /** First position to read; defaults to the start of the log. */
  startAt?: number;
}

/**
 * Walks the transcript log at its own pace and feeds one sink.
 *
 * The cursor advances past every segment it hands over, including ones the sink
 * failed on, so a permanently failing segment is never retried.
 */
export class ConsumerTask {
  private readonly cursor: TranscriptCursor;

  constructor(
    private readonly sink: SegmentSink,
    log: TranscriptLog,
    private readonly shutdown: ShutdownSignal,
    private readonly logger: LoggerPort,
    private readonly options: ConsumerTaskOptions
  ) {
    this.cursor = log.cursor(options.startAt ?? 0);
  }

  get name(): string {
    return this.sink.name;
  }

  get position(): number {
    return this.cursor.position;
  }

  get backlog(): number {
    return this.cursor.backlog;
  }

  async run(): Promise<void> {
    while (this.shutdown.running) {
      await this.tick();
      await this.shutdown.sleep(this.options.pollIntervalMs);
    }
  }

  /** Hands every pending segment to the sink. Resolves with how many were read. */
  async tick(): Promise<number> {
    let read = 0;
    for (const segment of this.cursor.pending()) {
      if (!this.shutdown.running) break;
      try {
        await this.sink.accept(segment);
      } catch (err) {
        this.logger.error(
          `${this.sink.name} failed on segment #${segment.position}: ${describeError(err)}`
        );
      }
      this.cursor.commit(segment);
      read += 1;
    }
    return read;
  }
}
