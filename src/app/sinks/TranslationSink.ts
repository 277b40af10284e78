import type { LinePrinter } from "./ConsoleSink";
import type { SegmentSink } from "../ConsumerTask";
import { formatDelay, type Segment } from "../../domain/transcript/Segment";
import type { TranslatorPort } from "../../ports/translation/TranslatorPort";
import type { TimePort } from "../../ports/sys/TimePort";
import { TranslationFailure } from "../../domain/errors";

export interface TranslationSinkOptions {
  showDelay?: boolean;
}

export interface TranslationResult {
  position: number;
  text: string;
  /** Time spent in the translator alone, in milliseconds. */
  translationDelay: number;
  /** Capture-to-transcript delay plus translation delay. */
  totalDelay: number;
}

export class TranslationSink implements SegmentSink {
  readonly name = "translator";
  private last: TranslationResult | null = null;

  constructor(
    private readonly translator: TranslatorPort,
    private readonly time: TimePort,
    private readonly print: LinePrinter,
    private readonly options: TranslationSinkOptions = {}
  ) {}

  get lastResult(): TranslationResult | null {
    return this.last;
  }

  async accept(segment: Segment): Promise<void> {
    const started = this.time.now();
    let output: string;
    try {
      output = await this.translator.translate(segment.text);
    } catch (err) {
      if (err instanceof TranslationFailure) throw err;
      throw new TranslationFailure("Translator call failed.", { cause: err });
    }
    const translationDelay = this.time.now() - started;

    this.last = {
      position: segment.position,
      text: output,
      translationDelay,
      totalDelay: segment.processingDelay + translationDelay,
    };

    if (this.options.showDelay) {
      this.print(
        `Translated: ${output} [Delay: ${formatDelay(segment.processingDelay)}] [Translation delay: ${formatDelay(translationDelay)}]`
      );
    } else {
      this.print(`Translated: ${output}`);
    }
  }
}
