import type OpenAI from "openai";
import { toFile } from "openai";
import type {
  TranscribedPiece,
  TranscriberPort,
  TranscriptionRequest,
} from "../../ports/speech/TranscriberPort";
import { TranscriptionFailure } from "../../domain/errors";
import { getOpenAI } from "../../openai";

export interface OpenAiTranscriberOptions {
  /** Defaults to the shared client from `getOpenAI()`. */
  client?: OpenAI;
  model: string;
}

export class OpenAiTranscriber implements TranscriberPort {
  constructor(private readonly options: OpenAiTranscriberOptions) {}

  async transcribe(request: TranscriptionRequest): Promise<TranscribedPiece[]> {
    const client = this.options.client ?? getOpenAI();
    let result: unknown;
    try {
      const file = await toFile(request.audio, "segment.wav", { type: "audio/wav" });
      if (request.task === "translate") {
        result = await client.audio.translations.create({
          file,
          model: this.options.model,
          response_format: "verbose_json",
          prompt: request.prompt,
        });
      } else {
        result = await client.audio.transcriptions.create({
          file,
          model: this.options.model,
          response_format: "verbose_json",
          language: request.language,
          prompt: request.prompt,
        });
      }
    } catch (err) {
      throw new TranscriptionFailure(`OpenAI ${request.task} request failed.`, { cause: err });
    }
    return toPieces(result);
  }
}

interface VerboseSegment {
  text: string;
  no_speech_prob: number;
}

function isVerboseSegment(value: unknown): value is VerboseSegment {
  if (!value || typeof value !== "object") return false;
  return (
    "text" in value &&
    typeof value.text === "string" &&
    "no_speech_prob" in value &&
    typeof value.no_speech_prob === "number"
  );
}

/**
 * Reads the per-segment text and no-speech probability out of a verbose_json
 * response. A response without segments counts as one fully-confident piece.
 */
export function toPieces(result: unknown): TranscribedPiece[] {
  if (typeof result === "string") {
    return result.trim() ? [{ text: result, noSpeechProbability: 0 }] : [];
  }
  if (!result || typeof result !== "object") {
    throw new TranscriptionFailure("OpenAI returned an unreadable transcription response.");
  }
  if ("segments" in result && Array.isArray(result.segments)) {
    const segments: unknown[] = result.segments;
    return segments.filter(isVerboseSegment).map((segment) => ({
      text: segment.text,
      noSpeechProbability: segment.no_speech_prob,
    }));
  }
  if ("text" in result && typeof result.text === "string") {
    return result.text.trim() ? [{ text: result.text, noSpeechProbability: 0 }] : [];
  }
  return [];
}
