import type OpenAI from "openai";
import type { TranslatorPort } from "../../ports/translation/TranslatorPort";
import { TranslationFailure } from "../../domain/errors";
import { getOpenAI } from "../../openai";

export interface OpenAiTranslatorOptions {
  /** Defaults to the shared client from `getOpenAI()`. */
  client?: OpenAI;
  model: string;
  /** Instructions placed above the text, e.g. "Translate into French". */
  prompt: string;
}

export class OpenAiTranslator implements TranslatorPort {
  constructor(private readonly options: OpenAiTranslatorOptions) {}

  async translate(text: string): Promise<string> {
    const client = this.options.client ?? getOpenAI();
    let content: string | null | undefined;
    try {
      const resp = await client.chat.completions.create({
        model: this.options.model,
        messages: [{ role: "user", content: `${this.options.prompt}\n---\n${text}` }],
      });
      content = resp.choices?.[0]?.message?.content;
    } catch (err) {
      throw new TranslationFailure("OpenAI translation request failed.", { cause: err });
    }

    const output = (content ?? "").trim();
    if (!output) {
      throw new TranslationFailure("OpenAI returned an empty translation.");
    }
    return output;
  }
}
