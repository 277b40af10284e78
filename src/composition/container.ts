import type { AppSettings } from "../config";
import type { AudioInputPort } from "../ports/audio/AudioInputPort";
import type { TranscriberPort } from "../ports/speech/TranscriberPort";
import type { TranslatorPort } from "../ports/translation/TranslatorPort";
import type { RendererPort } from "../ports/render/RendererPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import type { StoragePort } from "../ports/sys/StoragePort";
import { amplitudeGate } from "../domain/audio/Frame";
import { TranscriptLog } from "../domain/transcript/TranscriptLog";
import { ShutdownSignal } from "../domain/pipeline/ShutdownSignal";
import { describeError } from "../domain/errors";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { NodeTime } from "../adapters/sys/NodeTime";
import { FileStorage } from "../adapters/sys/FileStorage";
import { PvRecorderAudioInput } from "../adapters/audio/PvRecorderAudioInput";
import { OpenAiTranscriber } from "../adapters/speech/OpenAiTranscriber";
import { OpenAiTranslator } from "../adapters/translation/OpenAiTranslator";
import { WsPageRenderer } from "../adapters/render/WsPageRenderer";
import { SegmentBuffer } from "../app/SegmentBuffer";
import { SegmentationLoop } from "../app/SegmentationLoop";
import { ConsumerTask, type SegmentSink } from "../app/ConsumerTask";
import { BufferStatusReporter, type StatusWriter } from "../app/BufferStatusReporter";
import { AudioArchive } from "../app/AudioArchive";
import { TranscriptionPipeline } from "../app/TranscriptionPipeline";
import { ConsoleSink, type LinePrinter } from "../app/sinks/ConsoleSink";
import { RendererSink } from "../app/sinks/RendererSink";
import { TranslationSink } from "../app/sinks/TranslationSink";

/** Replacements for the real adapters, used by tests and embedders. */
export interface ApplicationOverrides {
  audioIn?: AudioInputPort;
  transcriber?: TranscriberPort;
  translator?: TranslatorPort;
  renderer?: RendererPort;
  storage?: StoragePort;
  time?: TimePort;
  logger?: LoggerPort;
  print?: LinePrinter;
  writeStatus?: StatusWriter;
  debug?: boolean;
}

export interface ApplicationInstance {
  readonly log: TranscriptLog;
  readonly pipeline: TranscriptionPipeline;
  readonly shutdownSignal: ShutdownSignal;
  readonly consumers: readonly ConsumerTask[];
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export function buildApplication(
  settings: AppSettings,
  overrides: ApplicationOverrides = {}
): ApplicationInstance {
  const { pipeline: tuning } = settings;
  const logger = overrides.logger ?? new ConsoleLogger({ debug: overrides.debug ?? false });
  const time = overrides.time ?? new NodeTime();
  const shutdownSignal = new ShutdownSignal();
  const log = new TranscriptLog();

  const writeStatus: StatusWriter =
    overrides.writeStatus ??
    ((text) => {
      process.stdout.write(text);
    });
  // The status line ends in "\r", so printed lines start on a fresh row.
  const print: LinePrinter =
    overrides.print ??
    (tuning.statusLine ? (line) => console.log(`\n${line}`) : (line) => console.log(line));

  const audioIn =
    overrides.audioIn ??
    new PvRecorderAudioInput(
      { frameLength: tuning.frameLength, sampleRate: tuning.sampleRate, channels: tuning.channels },
      time,
      logger
    );
  const transcriber =
    overrides.transcriber ?? new OpenAiTranscriber({ model: settings.transcribeModel });

  const buffer = new SegmentBuffer(amplitudeGate(tuning.silenceThreshold), tuning.truncationCap);
  const archive = tuning.retainAudio
    ? new AudioArchive(overrides.storage ?? new FileStorage(tuning.retainDir))
    : undefined;

  const loop = new SegmentationLoop(buffer, transcriber, log, shutdownSignal, time, logger, {
    sampleRate: tuning.sampleRate,
    channels: tuning.channels,
    drainIntervalMs: tuning.drainIntervalMs,
    noSpeechThreshold: tuning.noSpeechThreshold,
    task: settings.mode === "translate-whisper" ? "translate" : "transcribe",
    language: settings.language,
    prompt: settings.transcriptionPrompt,
    archive,
  });

  const sinks: SegmentSink[] = [];
  switch (settings.mode) {
    case "transcribe":
      sinks.push(new ConsoleSink(print, { label: "Transcribed", showDelay: settings.showDelay }));
      break;
    case "translate-whisper":
      sinks.push(new ConsoleSink(print, { label: "Translated", showDelay: settings.showDelay }));
      break;
    case "translate-llm": {
      const translator =
        overrides.translator ??
        new OpenAiTranslator({
          model: settings.translateModel,
          prompt: settings.translationPrompt ?? "",
        });
      sinks.push(new TranslationSink(translator, time, print, { showDelay: settings.showDelay }));
      break;
    }
  }

  let renderer: RendererPort | null = null;
  if (overrides.renderer) {
    renderer = overrides.renderer;
  } else if (settings.renderPort !== undefined) {
    renderer = new WsPageRenderer({ port: settings.renderPort }, logger);
  }
  if (renderer) {
    sinks.push(new RendererSink(renderer));
  }

  const consumers = sinks.map(
    (sink) =>
      new ConsumerTask(sink, log, shutdownSignal, logger, {
        pollIntervalMs: tuning.consumerIntervalMs,
      })
  );

  const status = tuning.statusLine
    ? new BufferStatusReporter(buffer, log, shutdownSignal, writeStatus, tuning.drainIntervalMs)
    : undefined;

  const pipeline = new TranscriptionPipeline(
    { audioIn, buffer, loop, consumers, status },
    shutdownSignal,
    logger
  );

  const closeRenderer = async () => {
    if (!renderer) return;
    try {
      await renderer.close();
    } catch (err) {
      logger.warn(`Failed to close page renderer: ${describeError(err)}`);
    }
  };

  return {
    log,
    pipeline,
    shutdownSignal,
    consumers,
    start: async () => {
      logger.info(
        `Starting in ${settings.mode} mode (language=${settings.language ?? "auto"}, cap=${tuning.truncationCap} frames).`
      );
      if (renderer) {
        await renderer.start();
      }
      try {
        await pipeline.start(settings.device);
      } catch (err) {
        await closeRenderer();
        throw err;
      }
    },
    shutdown: async () => {
      await pipeline.shutdown();
      await closeRenderer();
    },
  };
}
