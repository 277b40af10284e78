import OpenAI from "openai";
import { OPENAI_API_KEY, OPENAI_BASE_URL, OPENAI_TIMEOUT_MS } from "./env";

export interface OpenAIClientSettings {
  apiKey: string;
  baseURL?: string;
  timeoutMs: number;
}

/** Each request is attempted once, with no retries, and bounded by `timeoutMs`. */
export function createOpenAI(settings: OpenAIClientSettings): OpenAI {
  return new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseURL,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  });
}

let client: OpenAI | null = null;

export function getOpenAI(): OpenAI {
  if (client) return client;
  if (!OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is missing. Set it in your environment.");
  }
  client = createOpenAI({
    apiKey: OPENAI_API_KEY,
    baseURL: OPENAI_BASE_URL,
    timeoutMs: OPENAI_TIMEOUT_MS,
  });
  return client;
}
