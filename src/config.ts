import fs from "fs";
import path from "path";
import type { CliOptions, Mode } from "./env";
import { ConfigError } from "./domain/errors";

export interface PipelineConfig {
  sampleRate: number;
  channels: number;
  /** Samples per captured frame. */
  frameLength: number;
  silenceThreshold: number;
  /** Most frames handed to the transcriber per drain. */
  truncationCap: number;
  drainIntervalMs: number;
  consumerIntervalMs: number;
  noSpeechThreshold: number;
  retainAudio: boolean;
  retainDir: string;
  statusLine: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  sampleRate: 16000,
  channels: 1,
  frameLength: 1024 * 128,
  silenceThreshold: 300,
  truncationCap: 60,
  drainIntervalMs: 100,
  consumerIntervalMs: 100,
  noSpeechThreshold: 0.5,
  retainAudio: false,
  retainDir: ".",
  statusLine: true,
};

const DEFAULT_CONFIG_FILENAMES = ["livescribe.config.json", "config.json"];
const DEFAULT_PROMPT_FILE = "transcribe_prompt.txt";

export interface LoadedConfig {
  config: Partial<PipelineConfig>;
  path?: string;
}

type NumberKey = {
  [K in keyof PipelineConfig]: PipelineConfig[K] extends number ? K : never;
}[keyof PipelineConfig];

type BooleanKey = {
  [K in keyof PipelineConfig]: PipelineConfig[K] extends boolean ? K : never;
}[keyof PipelineConfig];

interface NumberRule {
  integer: boolean;
  min: number;
  max?: number;
  /** Exclusive lower bound instead of inclusive. */
  positive?: boolean;
}

const NUMBER_RULES: Record<NumberKey, NumberRule> = {
  sampleRate: { integer: true, min: 1 },
  channels: { integer: true, min: 1 },
  frameLength: { integer: true, min: 1 },
  silenceThreshold: { integer: false, min: 0 },
  truncationCap: { integer: true, min: 1 },
  drainIntervalMs: { integer: false, min: 0, positive: true },
  consumerIntervalMs: { integer: false, min: 0, positive: true },
  noSpeechThreshold: { integer: false, min: 0, max: 1, positive: true },
};

const BOOLEAN_KEYS: readonly BooleanKey[] = ["retainAudio", "statusLine"];

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    const resolved = path.resolve(candidate);
    if (!fs.existsSync(resolved)) continue;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
      return { config: normalizeConfig(parsed), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

/** Keeps the recognised, valid keys of a parsed config file and warns about the rest. */
export function normalizeConfig(input: unknown): Partial<PipelineConfig> {
  const out: Partial<PipelineConfig> = {};
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    console.warn("Config file must contain a JSON object; ignoring it.");
    return out;
  }

  for (const [key, value] of Object.entries(input)) {
    if (isNumberKey(key)) {
      const rule = NUMBER_RULES[key];
      if (isValidNumber(value, rule)) {
        out[key] = value;
      } else {
        console.warn(`Invalid value for "${key}" in config: ${JSON.stringify(value)}; using default.`);
      }
      continue;
    }
    if (isBooleanKey(key)) {
      if (typeof value === "boolean") out[key] = value;
      else console.warn(`Invalid value for "${key}" in config: expected true or false.`);
      continue;
    }
    if (key === "retainDir") {
      if (typeof value === "string" && value.trim()) out.retainDir = value.trim();
      else console.warn(`Invalid value for "retainDir" in config: expected a directory path.`);
      continue;
    }
    console.warn(`Unknown config key "${key}" ignored.`);
  }

  return out;
}

export interface AppSettings {
  mode: Mode;
  language?: string;
  device: string;
  showDelay: boolean;
  renderPort?: number;
  transcribeModel: string;
  translateModel: string;
  /** Instructions for the LLM translator; required in translate-llm mode. */
  translationPrompt?: string;
  /** Initial prompt passed to the transcriber. */
  transcriptionPrompt?: string;
  pipeline: PipelineConfig;
}

export interface SettingsDefaults {
  device: string;
  transcribeModel: string;
  translateModel: string;
}

export function buildSettings(
  file: Partial<PipelineConfig>,
  cli: CliOptions,
  defaults: SettingsDefaults,
  readText: (filePath: string) => string | null = readOptionalFile
): AppSettings {
  if (cli.errors.length) {
    throw new ConfigError(cli.errors.join("; "));
  }
  const mode = cli.mode ?? "transcribe";
  const pipeline: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...file };
  if (cli.keepAudio) pipeline.retainAudio = true;

  let translationPrompt: string | undefined;
  if (mode === "translate-llm") {
    if (!cli.translationPromptPath) {
      throw new ConfigError("--translation-prompt is required for 'translate-llm' mode.");
    }
    const text = readText(cli.translationPromptPath);
    if (text === null) {
      throw new ConfigError(`Translation prompt file ${cli.translationPromptPath} could not be read.`);
    }
    translationPrompt = text.trim();
  }

  const promptPath = cli.promptFile ?? DEFAULT_PROMPT_FILE;
  const promptText = readText(promptPath);
  if (promptText === null && cli.promptFile) {
    throw new ConfigError(`Transcription prompt file ${cli.promptFile} could not be read.`);
  }
  const transcriptionPrompt = promptText?.trim() || undefined;

  return {
    mode,
    language: cli.language,
    device: cli.device ?? defaults.device,
    showDelay: cli.showDelay ?? false,
    renderPort: cli.renderPort,
    transcribeModel: defaults.transcribeModel,
    translateModel: cli.translateModel ?? defaults.translateModel,
    translationPrompt,
    transcriptionPrompt,
    pipeline,
  };
}

function readOptionalFile(filePath: string): string | null {
  try {
    return fs.readFileSync(path.resolve(filePath), "utf8");
  } catch {
    return null;
  }
}

function isNumberKey(key: string): key is NumberKey {
  return Object.prototype.hasOwnProperty.call(NUMBER_RULES, key);
}

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((candidate) => candidate === key);
}

function isValidNumber(value: unknown, rule: NumberRule): value is number {
  if (typeof value !== "number" || !Number.isFinite(value)) return false;
  if (rule.integer && !Number.isInteger(value)) return false;
  if (rule.positive ? value <= rule.min : value < rule.min) return false;
  if (rule.max !== undefined && value > rule.max) return false;
  return true;
}
