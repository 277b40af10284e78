import type { SegmentSink } from "../ConsumerTask";
import type { Segment } from "../../domain/transcript/Segment";
import type { RendererPort } from "../../ports/render/RendererPort";
import { RenderFailure } from "../../domain/errors";

export class RendererSink implements SegmentSink {
  readonly name = "renderer";

  constructor(private readonly renderer: RendererPort) {}

  async accept(segment: Segment): Promise<void> {
    try {
      await this.renderer.update(segment.text);
    } catch (err) {
      if (err instanceof RenderFailure) throw err;
      throw new RenderFailure("Renderer update failed.", { cause: err });
    }
  }
}
