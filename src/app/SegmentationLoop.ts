import type { SegmentBuffer, Burst } from "./SegmentBuffer";
import type { AudioArchive } from "./AudioArchive";
import type {
  TranscribedPiece,
  TranscriberPort,
  TranscriptionTask,
} from "../ports/speech/TranscriberPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import type { Segment } from "../domain/transcript/Segment";
import type { TranscriptLog } from "../domain/transcript/TranscriptLog";
import type { ShutdownSignal } from "../domain/pipeline/ShutdownSignal";
import {
  SegmentationState,
  type SegmentationStateValue,
} from "../domain/segmentation/SegmentationState";
import { encodeWav } from "../domain/audio/wav";
import { TranscriptionFailure, describeError } from "../domain/errors";

export const DEFAULT_NO_SPEECH_THRESHOLD = 0.5;

export interface SegmentationLoopOptions {
  sampleRate: number;
  channels: number;
  drainIntervalMs: number;
  task: TranscriptionTask;
  language?: string;
  prompt?: string;
  /** Pieces at or above this no-speech probability are dropped. */
  noSpeechThreshold?: number;
  archive?: AudioArchive;
}

export class SegmentationLoop {
  private readonly state = new SegmentationState();
  private readonly noSpeechThreshold: number;

  constructor(
    private readonly buffer: SegmentBuffer,
    private readonly transcriber: TranscriberPort,
    private readonly log: TranscriptLog,
    private readonly shutdown: ShutdownSignal,
    private readonly time: TimePort,
    private readonly logger: LoggerPort,
    private readonly options: SegmentationLoopOptions
  ) {
    this.noSpeechThreshold = options.noSpeechThreshold ?? DEFAULT_NO_SPEECH_THRESHOLD;
  }

  get stateValue(): SegmentationStateValue {
    return this.state.value;
  }

  async run(): Promise<void> {
    this.logger.debug(`Segmentation loop started (every ${this.options.drainIntervalMs}ms).`);
    while (this.shutdown.running) {
      await this.tick();
      await this.shutdown.sleep(this.options.drainIntervalMs);
    }
    this.logger.debug("Segmentation loop stopped.");
  }

  /**
   * Drains the buffer once and transcribes what it held. Resolves with the
   * appended segment, or null when nothing was appended.
   */
  async tick(): Promise<Segment | null> {
    if (!this.shutdown.running || this.buffer.isEmpty) return null;

    this.state.toDraining();
    try {
      const captureStart = this.time.now();
      const burst = this.buffer.drain();
      if (!burst) return null;
      return await this.process(burst, captureStart);
    } finally {
      this.state.toIdle();
    }
  }

  private async process(burst: Burst, captureStart: number): Promise<Segment | null> {
    if (burst.truncated) {
      this.logger.warn(
        `Burst truncated: kept ${burst.frames.length} frames, discarded ${burst.discarded}.`
      );
    }

    const audio = encodeWav(burst.frames, {
      sampleRate: this.options.sampleRate,
      channels: this.options.channels,
    });

    let pieces: TranscribedPiece[] | null = null;
    try {
      pieces = await this.transcriber.transcribe({
        audio,
        language: this.options.language,
        task: this.options.task,
        prompt: this.options.prompt,
      });
    } catch (err) {
      const failure =
        err instanceof TranscriptionFailure
          ? err
          : new TranscriptionFailure("Transcriber call failed.", { cause: err });
      this.logger.error(`Transcription failed; burst dropped: ${describeError(failure)}`, {
        frames: burst.frames.length,
      });
    }
    const captureEnd = this.time.now();

    await this.retain(audio, captureStart);

    if (!pieces) return null;
    const text = selectSpeech(pieces, this.noSpeechThreshold);
    if (!text) {
      this.logger.debug("Burst produced no speech.", { delayMs: captureEnd - captureStart });
      return null;
    }
    if (!this.shutdown.running) {
      this.logger.debug("Dropping transcript that finished after shutdown.");
      return null;
    }

    return this.log.append({
      text,
      truncated: burst.truncated,
      captureStart,
      captureEnd,
    });
  }

  private async retain(audio: Buffer, capturedAt: number) {
    const archive = this.options.archive;
    if (!archive) return;
    try {
      const saved = await archive.save(audio, capturedAt);
      this.logger.debug(`Retained burst audio at ${saved}.`);
    } catch (err) {
      this.logger.warn(`Failed to retain burst audio: ${describeError(err)}`);
    }
  }
}

/**
 * Joins the text of pieces the transcriber believes are speech. Each piece is
 * trimmed, empty ones are skipped, and the rest are joined with single spaces.
 */
export function selectSpeech(pieces: readonly TranscribedPiece[], noSpeechThreshold: number): string {
  return pieces
    .filter((piece) => piece.noSpeechProbability < noSpeechThreshold)
    .map((piece) => piece.text.trim())
    .filter((text) => text.length > 0)
    .join(" ");
}
