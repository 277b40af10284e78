import { config } from "dotenv";

config();

export type Mode = "transcribe" | "translate-whisper" | "translate-llm";

export const MODES: readonly Mode[] = ["transcribe", "translate-whisper", "translate-llm"];

export interface CliOptions {
  configPath?: string;
  logFile?: string;
  mode?: Mode;
  language?: string;
  device?: string;
  listDevices: boolean;
  keepAudio?: boolean;
  showDelay?: boolean;
  renderPort?: number;
  translateModel?: string;
  translationPromptPath?: string;
  promptFile?: string;
  debug?: boolean;
  /** Flags that were not understood. */
  ignored: string[];
  /** Flags with a missing or unusable value. */
  errors: string[];
}

function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? "", 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const out: CliOptions = { listDevices: false, ignored: [], errors: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = (): string | undefined => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        out.errors.push(`${arg} expects a value`);
        return undefined;
      }
      i++;
      return value;
    };

    switch (arg) {
      case "--config": {
        out.configPath = next() ?? out.configPath;
        break;
      }
      case "--log-file": {
        out.logFile = next() ?? out.logFile;
        break;
      }
      case "--mode": {
        const value = next();
        if (value === undefined) break;
        if (isMode(value)) out.mode = value;
        else out.errors.push(`--mode must be one of ${MODES.join(", ")} (got "${value}")`);
        break;
      }
      case "--lang": {
        out.language = next() ?? out.language;
        break;
      }
      case "--device": {
        out.device = next() ?? out.device;
        break;
      }
      case "--render-port": {
        const value = next();
        if (value === undefined) break;
        const port = Number.parseInt(value, 10);
        if (Number.isInteger(port) && port >= 0 && port <= 65535) out.renderPort = port;
        else out.errors.push(`--render-port must be a port number (got "${value}")`);
        break;
      }
      case "--model-translate": {
        out.translateModel = next() ?? out.translateModel;
        break;
      }
      case "--translation-prompt": {
        out.translationPromptPath = next() ?? out.translationPromptPath;
        break;
      }
      case "--prompt-file": {
        out.promptFile = next() ?? out.promptFile;
        break;
      }
      case "--list-devices":
        out.listDevices = true;
        break;
      case "--keep":
        out.keepAudio = true;
        break;
      case "--show-delay":
        out.showDelay = true;
        break;
      case "--debug":
        out.debug = true;
        break;
      case "--no-debug":
        out.debug = false;
        break;
      default:
        out.ignored.push(arg);
        break;
    }
  }

  return out;
}

export const OPENAI_API_KEY = process.env.OPENAI_API_KEY;
export const OPENAI_BASE_URL = process.env.OPENAI_BASE_URL || undefined;
export const OPENAI_TIMEOUT_MS = parsePositiveInt(process.env.OPENAI_TIMEOUT_MS, 30_000);
export const OPENAI_TRANSCRIBE_MODEL = process.env.OPENAI_TRANSCRIBE_MODEL || "whisper-1";
export const OPENAI_TRANSLATE_MODEL = process.env.OPENAI_TRANSLATE_MODEL || "gpt-4o-mini";
export const AUDIO_DEVICE = process.env.AUDIO_DEVICE || "default";

export const CLI = parseCliArgs(process.argv.slice(2));
export const DEBUG_MODE = CLI.debug ?? process.env.DEBUG_MODE === "true";
