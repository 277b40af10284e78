import type { SegmentBuffer } from "./SegmentBuffer";
import type { SegmentationLoop } from "./SegmentationLoop";
import type { ConsumerTask } from "./ConsumerTask";
import type { BufferStatusReporter } from "./BufferStatusReporter";
import type { AudioInputPort, DeviceSelector } from "../ports/audio/AudioInputPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ShutdownSignal } from "../domain/pipeline/ShutdownSignal";
import { StreamFault, describeError } from "../domain/errors";

export interface PipelineParts {
  audioIn: AudioInputPort;
  buffer: SegmentBuffer;
  loop: SegmentationLoop;
  consumers: ConsumerTask[];
  status?: BufferStatusReporter;
}

export type PipelineStateValue = "CREATED" | "RUNNING" | "STOPPING" | "STOPPED";

/**
 * Owns the two sides of the pipeline: capture feeds the buffer through the frame
 * handler, and the segmentation loop, consumers and status line run as
 * independent tasks until the shared shutdown signal fires.
 */
export class TranscriptionPipeline {
  private state: PipelineStateValue = "CREATED";
  private tasks: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private fault: StreamFault | null = null;
  private unhooks: Array<() => void> = [];
  private resolveFinished: () => void = () => undefined;
  /** Settles once the pipeline has fully stopped, for whatever reason. */
  readonly finished: Promise<void>;

  constructor(
    private readonly parts: PipelineParts,
    private readonly shutdownSignal: ShutdownSignal,
    private readonly logger: LoggerPort
  ) {
    this.finished = new Promise<void>((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  get stateValue(): PipelineStateValue {
    return this.state;
  }

  get running(): boolean {
    return this.shutdownSignal.running;
  }

  /** The capture fault that stopped the pipeline, if any. */
  get streamFault(): StreamFault | null {
    return this.fault;
  }

  async start(selector?: DeviceSelector): Promise<void> {
    if (this.state !== "CREATED") {
      throw new Error(`Pipeline cannot start from state ${this.state}.`);
    }
    const { audioIn, buffer } = this.parts;

    this.unhooks.push(audioIn.onFrame((frame) => {
      buffer.offer(frame);
    }));
    this.unhooks.push(audioIn.onFault((fault) => this.handleFault(fault)));
    this.unhooks.push(this.shutdownSignal.onShutdown((reason) => {
      this.shutdown(reason).catch((err) => {
        this.logger.error(`Shutdown failed: ${describeError(err)}`);
      });
    }));

    try {
      await audioIn.start(selector);
    } catch (err) {
      this.unhook();
      this.state = "STOPPED";
      this.shutdownSignal.trigger("audio device failed to start");
      this.resolveFinished();
      throw err;
    }

    this.state = "RUNNING";
    const runs: Promise<void>[] = [
      this.guard("segmentation loop", this.parts.loop.run()),
      ...this.parts.consumers.map((consumer) => this.guard(`${consumer.name} consumer`, consumer.run())),
    ];
    if (this.parts.status) {
      runs.push(this.guard("status line", this.parts.status.run()));
    }
    this.tasks = Promise.all(runs).then(() => undefined);
    this.logger.info("Recording started. Speak into the microphone. Press Ctrl+C to exit.");
  }

  /**
   * Stops capture and waits for every task to wind down. Safe to call repeatedly
   * and from the shutdown signal; later calls share the first call's promise.
   */
  shutdown(reason = "shutdown requested"): Promise<void> {
    if (!this.stopping) {
      this.state = "STOPPING";
      this.stopping = Promise.resolve().then(() => this.stop());
      this.shutdownSignal.trigger(reason);
    }
    return this.stopping;
  }

  private async stop() {
    this.logger.info(`Shutting down (${this.shutdownSignal.reason ?? "shutdown requested"})...`);
    try {
      await this.parts.audioIn.stop();
    } catch (err) {
      this.logger.warn(`Failed to stop audio input: ${describeError(err)}`);
    }
    this.unhook();
    await this.tasks;
    this.state = "STOPPED";
    this.logger.info("Resources cleaned up.");
    this.resolveFinished();
  }

  private handleFault(fault: StreamFault) {
    if (this.fault) return;
    this.fault = fault;
    this.logger.error(`Audio stream fault: ${describeError(fault)}`);
    this.shutdown("audio stream fault").catch((err) => {
      this.logger.error(`Shutdown after stream fault failed: ${describeError(err)}`);
    });
  }

  private guard(name: string, task: Promise<void>): Promise<void> {
    return task.catch((err) => {
      this.logger.error(`${name} stopped unexpectedly: ${describeError(err)}`);
    });
  }

  private unhook() {
    for (const unhook of this.unhooks.splice(0)) {
      unhook();
    }
  }
}
