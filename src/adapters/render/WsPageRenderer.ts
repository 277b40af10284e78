import { WebSocketServer, WebSocket } from "ws";
import type { RendererPort } from "../../ports/render/RendererPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { RenderFailure, describeError } from "../../domain/errors";

export interface WsPageRendererOptions {
  port: number;
  host?: string;
}

export type PageMessage =
  | { type: "snapshot"; lines: string[] }
  | { type: "append"; text: string };

/**
 * Pushes transcript lines to any page connected over WebSocket.
 *
 * Pages joining late receive every earlier line as a single snapshot; after that
 * each update arrives as one `append` message.
 */
export class WsPageRenderer implements RendererPort {
  private server: WebSocketServer | null = null;
  private readonly lines: string[] = [];

  constructor(
    private readonly options: WsPageRendererOptions,
    private readonly logger: LoggerPort
  ) {}

  /** Bound port, or null before `start()`. */
  get port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") return null;
    return address.port;
  }

  async start(): Promise<void> {
    if (this.server) return;
    const server = new WebSocketServer({ port: this.options.port, host: this.options.host });
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(new RenderFailure(`Could not listen on port ${this.options.port}.`, { cause: err }));
      };
      const onListening = () => {
        server.off("error", onError);
        resolve();
      };
      server.once("error", onError);
      server.once("listening", onListening);
    });

    server.on("connection", (socket) => {
      this.logger.info(`🖥️  Page connected (${server.clients.size} open).`);
      socket.send(encode({ type: "snapshot", lines: [...this.lines] }));
    });
    server.on("error", (err) => {
      this.logger.error(`Page renderer server error: ${describeError(err)}`);
    });

    this.server = server;
    this.logger.info(`Page renderer listening on ws://${this.options.host ?? "localhost"}:${this.port}`);
  }

  async update(text: string): Promise<void> {
    const server = this.server;
    if (!server) {
      throw new RenderFailure("Page renderer is not running.");
    }
    this.lines.push(text);

    const payload = encode({ type: "append", text });
    const open = Array.from(server.clients).filter((client) => client.readyState === WebSocket.OPEN);
    if (!open.length) {
      this.logger.debug("No pages connected; line kept for the next snapshot.");
      return;
    }

    const results = await Promise.allSettled(open.map((client) => send(client, payload)));
    const failed = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );
    if (failed.length === open.length) {
      throw new RenderFailure(`Failed to update ${failed.length} page(s).`, {
        cause: failed[0].reason,
      });
    }
    if (failed.length) {
      this.logger.warn(`Failed to update ${failed.length} of ${open.length} page(s).`);
    }
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function encode(message: PageMessage): string {
  return JSON.stringify(message);
}

function send(client: WebSocket, payload: string): Promise<void> {
  return new Promise((resolve, reject) => {
    client.send(payload, (err) => (err ? reject(err) : resolve()));
  });
}
