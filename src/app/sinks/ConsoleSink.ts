import type { SegmentSink } from "../ConsumerTask";
import { formatDelay, type Segment } from "../../domain/transcript/Segment";

export type LinePrinter = (line: string) => void;

export interface ConsoleSinkOptions {
  /** Shown before the text, e.g. "Transcribed" or "Translated". */
  label: string;
  showDelay?: boolean;
}

export class ConsoleSink implements SegmentSink {
  readonly name = "console";

  constructor(
    private readonly print: LinePrinter,
    private readonly options: ConsoleSinkOptions
  ) {}

  async accept(segment: Segment): Promise<void> {
    let line = `${this.options.label}: ${segment.text}`;
    if (segment.truncated) line += " (truncated)";
    if (this.options.showDelay) line += ` [Delay: ${formatDelay(segment.processingDelay)}]`;
    this.print(line);
  }
}
