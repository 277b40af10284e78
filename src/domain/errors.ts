export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The capture device could not be selected or opened. Fatal at startup. */
export class DeviceError extends PipelineError {}

/** The capture device failed after the stream was running. Fatal. */
export class StreamFault extends PipelineError {}

/** One burst could not be transcribed. The loop carries on with the next one. */
export class TranscriptionFailure extends PipelineError {}

export class TranslationFailure extends PipelineError {}

export class RenderFailure extends PipelineError {}

/** Invalid flags or configuration file contents. */
export class ConfigError extends PipelineError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    if (cause !== undefined && cause !== err) {
      return `${err.message} (${describeError(cause)})`;
    }
    return err.message;
  }
  return String(err);
}

export function isFatal(err: unknown): boolean {
  return err instanceof DeviceError || err instanceof StreamFault || err instanceof ConfigError;
}
