import type { Frame } from "../../domain/audio/Frame";
import type { StreamFault } from "../../domain/errors";

export type FrameHandler = (frame: Frame) => void;
export type StreamFaultHandler = (fault: StreamFault) => void;

/** Device index, or a case-insensitive substring of the device name. */
export type DeviceSelector = number | string;

export interface AudioInputPort {
  /** Rejects with `DeviceError` when the device cannot be selected or opened. */
  start(selector?: DeviceSelector): Promise<void>;
  stop(): Promise<void>;
  onFrame(handler: FrameHandler): () => void;
  onFault(handler: StreamFaultHandler): () => void;
}
