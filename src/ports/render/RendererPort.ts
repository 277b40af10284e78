export interface RendererPort {
  start(): Promise<void>;
  /** Appends one line of text to the rendered surface. */
  update(text: string): Promise<void>;
  close(): Promise<void>;
}
