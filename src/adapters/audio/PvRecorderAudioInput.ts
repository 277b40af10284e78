import { PvRecorder } from "@picovoice/pvrecorder-node";
import type {
  AudioInputPort,
  DeviceSelector,
  FrameHandler,
  StreamFaultHandler,
} from "../../ports/audio/AudioInputPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { TimePort } from "../../ports/sys/TimePort";
import { createFrame, type Frame } from "../../domain/audio/Frame";
import { DeviceError, StreamFault, describeError } from "../../domain/errors";

/** PvRecorder always captures 16 kHz mono PCM. */
export const PV_RECORDER_SAMPLE_RATE = 16000;

/**
 * Samples per native read. `read()` blocks the event loop until this many samples
 * have arrived, so it stays small and frames are assembled from several reads.
 */
export const PV_RECORDER_READ_LENGTH = 512;

export interface PvRecorderAudioInputOptions {
  /** Samples per delivered frame. */
  frameLength: number;
  sampleRate?: number;
  channels?: number;
}

export class PvRecorderAudioInput implements AudioInputPort {
  private recorder: PvRecorder | null = null;
  private frameHandlers = new Set<FrameHandler>();
  private faultHandlers = new Set<StreamFaultHandler>();
  private loopPromise: Promise<void> | null = null;

  constructor(
    private readonly options: PvRecorderAudioInputOptions,
    private readonly time: TimePort,
    private readonly logger: LoggerPort
  ) {}

  static listDevices(): string[] {
    try {
      return PvRecorder.getAvailableDevices();
    } catch (err) {
      throw new DeviceError("Could not enumerate audio input devices.", { cause: err });
    }
  }

  async start(selector?: DeviceSelector): Promise<void> {
    if (this.recorder) return;

    const channels = this.options.channels ?? 1;
    if (channels !== 1) {
      throw new DeviceError(`PvRecorder captures mono audio only (configured channels: ${channels}).`);
    }

    const deviceIndex = resolveAudioDeviceIndex(selector, () => PvRecorderAudioInput.listDevices());
    const readLength = Math.min(PV_RECORDER_READ_LENGTH, this.options.frameLength);
    let recorder: PvRecorder;
    try {
      recorder = new PvRecorder(readLength, deviceIndex);
    } catch (err) {
      throw new DeviceError(`Failed to open audio device (index ${deviceIndex}).`, { cause: err });
    }

    const expectedRate = this.options.sampleRate ?? PV_RECORDER_SAMPLE_RATE;
    if (recorder.sampleRate !== expectedRate) {
      this.releaseQuietly(recorder);
      throw new DeviceError(
        `Recorder captures at ${recorder.sampleRate}Hz but ${expectedRate}Hz is configured.`
      );
    }

    try {
      recorder.start();
    } catch (err) {
      this.releaseQuietly(recorder);
      throw new DeviceError(`Failed to open audio device (index ${deviceIndex}).`, { cause: err });
    }

    this.logger.info(`🎙️  Using microphone: ${recorder.getSelectedDevice()}`);

    this.recorder = recorder;
    this.loopPromise = this.pumpAudio(recorder).finally(() => {
      this.loopPromise = null;
    });
  }

  async stop(): Promise<void> {
    const recorder = this.recorder;
    if (!recorder) return;
    this.recorder = null;
    try {
      recorder.stop();
      recorder.release();
    } catch (err) {
      this.logger.warn(`Failed to stop PvRecorder: ${describeError(err)}`);
    }
    await this.loopPromise;
  }

  onFrame(handler: FrameHandler): () => void {
    this.frameHandlers.add(handler);
    return () => {
      this.frameHandlers.delete(handler);
    };
  }

  onFault(handler: StreamFaultHandler): () => void {
    this.faultHandlers.add(handler);
    return () => {
      this.faultHandlers.delete(handler);
    };
  }

  private async pumpAudio(recorder: PvRecorder) {
    const { frameLength } = this.options;
    let pending = new Int16Array(frameLength);
    let filled = 0;

    while (this.recorder === recorder && recorder.isRecording) {
      let pcm: Int16Array;
      try {
        pcm = await recorder.read();
      } catch (err) {
        if (this.recorder !== recorder) return;
        this.reportFault(recorder, err);
        return;
      }
      if (this.recorder !== recorder) break;

      let offset = 0;
      while (offset < pcm.length) {
        const take = Math.min(frameLength - filled, pcm.length - offset);
        pending.set(pcm.subarray(offset, offset + take), filled);
        filled += take;
        offset += take;
        if (filled === frameLength) {
          this.emit(createFrame(pending, this.time.now()));
          pending = new Int16Array(frameLength);
          filled = 0;
        }
      }
    }
  }

  private emit(frame: Frame) {
    for (const handler of this.frameHandlers) {
      try {
        handler(frame);
      } catch (err) {
        this.logger.warn(`Audio frame handler failed: ${describeError(err)}`);
      }
    }
  }

  private releaseQuietly(recorder: PvRecorder) {
    try {
      recorder.release();
    } catch (err) {
      this.logger.warn(`Failed to release PvRecorder: ${describeError(err)}`);
    }
  }

  private reportFault(recorder: PvRecorder, err: unknown) {
    this.recorder = null;
    this.releaseQuietly(recorder);
    const fault = new StreamFault("Audio device stopped delivering audio.", { cause: err });
    for (const handler of this.faultHandlers) {
      try {
        handler(fault);
      } catch (handlerErr) {
        this.logger.warn(`Stream fault handler failed: ${describeError(handlerErr)}`);
      }
    }
  }
}

/**
 * Maps a selector to a PvRecorder device index. `-1` is the system default.
 * Numbers (or numeric strings) are taken as indices; other strings must match part
 * of a device name, ignoring case.
 */
export function resolveAudioDeviceIndex(
  selector: DeviceSelector | undefined,
  listDevices: () => string[]
): number {
  if (selector === undefined) return -1;
  if (typeof selector === "number") return checkIndex(selector, listDevices);

  const label = selector.trim();
  if (!label || label.toLowerCase() === "default") return -1;
  if (/^-?\d+$/.test(label)) return checkIndex(Number.parseInt(label, 10), listDevices);

  const devices = listDevices();
  const idx = devices.findIndex((name) => name.toLowerCase().includes(label.toLowerCase()));
  if (idx >= 0) return idx;

  throw new DeviceError(
    `No audio device found matching "${label}". Available devices:\n${formatDeviceList(devices)}`
  );
}

export function formatDeviceList(devices: readonly string[]): string {
  if (!devices.length) return "  (none)";
  return devices.map((name, i) => `  [${i}] ${name}`).join("\n");
}

function checkIndex(index: number, listDevices: () => string[]): number {
  if (index === -1) return -1;
  const devices = listDevices();
  if (!Number.isInteger(index) || index < 0 || index >= devices.length) {
    throw new DeviceError(
      `Audio device index ${index} is out of range. Available devices:\n${formatDeviceList(devices)}`
    );
  }
  return index;
}
