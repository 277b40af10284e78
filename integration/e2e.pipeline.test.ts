import { buildApplication, type ApplicationOverrides } from "../src/composition/container";
import { DEFAULT_PIPELINE_CONFIG, type AppSettings, type PipelineConfig } from "../src/config";
import { DeviceError } from "../src/domain/errors";
import type { RendererPort } from "../src/ports/render/RendererPort";
import type { StoragePort } from "../src/ports/sys/StoragePort";
import type { TranslatorPort } from "../src/ports/translation/TranslatorPort";
import {
  FakeAudioInput,
  FakeClock,
  RecordingLogger,
  ScriptedTranscriber,
  frameOf,
  waitFor,
} from "../tests/helpers/fakes";

jest.mock("dotenv", () => ({ config: jest.fn() }));
jest.mock("@picovoice/pvrecorder-node", () => ({ PvRecorder: class {} }));

type SettingsOverrides = Partial<Omit<AppSettings, "pipeline">> & { pipeline?: Partial<PipelineConfig> };

function settings(overrides: SettingsOverrides = {}): AppSettings {
  return {
    mode: "transcribe",
    device: "default",
    showDelay: false,
    transcribeModel: "whisper-1",
    translateModel: "gpt-4o-mini",
    ...overrides,
    pipeline: {
      ...DEFAULT_PIPELINE_CONFIG,
      drainIntervalMs: 5,
      consumerIntervalMs: 5,
      statusLine: false,
      ...overrides.pipeline,
    },
  };
}

class MemoryRenderer implements RendererPort {
  started = false;
  closed = false;
  lines: string[] = [];
  async start() {
    this.started = true;
  }
  async update(text: string) {
    this.lines.push(text);
  }
  async close() {
    this.closed = true;
  }
}

function harness(appSettings: AppSettings, extra: ApplicationOverrides = {}) {
  const audioIn = new FakeAudioInput();
  const transcriber = new ScriptedTranscriber();
  const logger = new RecordingLogger();
  const printed: string[] = [];
  const app = buildApplication(appSettings, {
    audioIn,
    transcriber,
    logger,
    time: new FakeClock(1_000),
    print: (line) => printed.push(line),
    ...extra,
  });
  return { app, audioIn, transcriber, logger, printed };
}

describe("e2e: capture to fan-out", () => {
  test("transcribe mode prints and renders each segment once, in order", async () => {
    const renderer = new MemoryRenderer();
    const { app, audioIn, transcriber, printed } = harness(settings({ device: "usb", language: "en" }), { renderer });
    transcriber.push([{ text: " Good morning.", noSpeechProbability: 0.05 }]);
    transcriber.push([
      { text: " How are you?", noSpeechProbability: 0.1 },
      { text: " (music)", noSpeechProbability: 0.9 },
    ]);

    await app.start();
    expect(renderer.started).toBe(true);
    expect(audioIn.startCalls).toEqual(["usb"]);

    audioIn.emit(frameOf(20));
    audioIn.emit(frameOf(800));
    await waitFor(() => printed.length === 1);
    audioIn.emit(frameOf(900));
    await waitFor(() => printed.length === 2 && renderer.lines.length === 2);

    await app.shutdown();

    expect(printed).toEqual(["Transcribed: Good morning.", "Transcribed: How are you?"]);
    expect(renderer.lines).toEqual(["Good morning.", "How are you?"]);
    expect(renderer.closed).toBe(true);
    expect(transcriber.requests.map((r) => [r.task, r.language])).toEqual([
      ["transcribe", "en"],
      ["transcribe", "en"],
    ]);
    expect(app.consumers.map((c) => [c.name, c.position])).toEqual([
      ["console", 2],
      ["renderer", 2],
    ]);
    expect(app.pipeline.stateValue).toBe("STOPPED");
  });

  test("translate-whisper mode asks the transcriber to translate", async () => {
    const { app, audioIn, transcriber, printed } = harness(settings({ mode: "translate-whisper", showDelay: true }));
    transcriber.push([{ text: "See you tomorrow", noSpeechProbability: 0 }]);

    await app.start();
    audioIn.emit(frameOf(700));
    await waitFor(() => printed.length === 1);
    await app.shutdown();

    expect(transcriber.requests[0].task).toBe("translate");
    expect(printed).toEqual(["Translated: See you tomorrow [Delay: 0.00s]"]);
  });

  test("translate-llm mode sends each segment through the translator", async () => {
    const translator: TranslatorPort = { translate: async (text) => `[en] ${text}` };
    const { app, audioIn, transcriber, printed } = harness(
      settings({ mode: "translate-llm", translationPrompt: "Translate into English." }),
      { translator }
    );
    transcriber.push([{ text: "Bonjour", noSpeechProbability: 0 }]);

    await app.start();
    audioIn.emit(frameOf(700));
    await waitFor(() => printed.length === 1);
    await app.shutdown();

    expect(printed).toEqual(["Translated: [en] Bonjour"]);
  });

  test("a failing renderer does not hold back the console", async () => {
    const renderer = new MemoryRenderer();
    renderer.update = async () => {
      throw new Error("page crashed");
    };
    const { app, audioIn, transcriber, printed, logger } = harness(settings(), { renderer });
    transcriber.push([{ text: "still printed", noSpeechProbability: 0 }]);

    await app.start();
    audioIn.emit(frameOf(700));
    await waitFor(() => printed.length === 1 && app.consumers[1].position === 1);
    await app.shutdown();

    expect(printed).toEqual(["Transcribed: still printed"]);
    expect(logger.messages("error")).toEqual([
      "renderer failed on segment #0: Renderer update failed. (page crashed)",
    ]);
  });

  test("retained audio goes to storage as one wav per burst", async () => {
    const keys: string[] = [];
    const storage: StoragePort = {
      write: async (key) => {
        keys.push(key);
        return key;
      },
    };
    const { app, audioIn, transcriber } = harness(settings({ pipeline: { retainAudio: true } }), {
      storage,
    });
    transcriber.push([{ text: "kept", noSpeechProbability: 0 }]);

    await app.start();
    audioIn.emit(frameOf(700));
    await waitFor(() => keys.length === 1);
    await app.shutdown();

    expect(keys).toEqual(["1970-01-01T00-00-01.000Z.wav"]);
  });

  test("the status line reports buffer sizes while running", async () => {
    const writes: string[] = [];
    const { app } = harness(settings({ pipeline: { statusLine: true } }), {
      writeStatus: (text) => writes.push(text),
    });

    await app.start();
    await waitFor(() => writes.length > 0);
    await app.shutdown();

    expect(writes[0]).toBe("Buffers: audio=0, transcript=0\r");
  });

  test("a device that cannot be opened fails start and closes the renderer", async () => {
    const renderer = new MemoryRenderer();
    const { app, audioIn } = harness(settings(), { renderer });
    audioIn.startError = new DeviceError('No audio device found matching "usb".');

    await expect(app.start()).rejects.toBeInstanceOf(DeviceError);
    expect(renderer.closed).toBe(true);
    expect(app.shutdownSignal.running).toBe(false);
  });
});
