import createDebug from "debug";
import type { PlinthLogger } from "@plinth/types";

const debug = createDebug("plinth:core:websocket");

/**
 * Message-level view of an upgraded connection, supplied by the transport.
 * Byte-level framing stays on the transport's side of this interface.
 */
export interface WebSocketChannel {
  send(data: string): void | Promise<void>;
  close(code?: number, reason?: string): void | Promise<void>;
  onMessage(listener: (data: string) => void): void;
  onClose(listener: (code?: number, reason?: string) => void): void;
}

/**
 * Handed to WebSocket route handlers. Request-scoped dependencies live until
 * the client disconnects or the handler calls `close()`, whichever happens first.
 */
export class WebSocketSession {
  private finished = false;
  private released: Promise<void> | null = null;
  private readonly closeListeners: ((code?: number, reason?: string) => void)[] = [];

  constructor(
    private readonly channel: WebSocketChannel,
    private readonly releaseScope: () => Promise<void>,
    private readonly logger?: PlinthLogger,
  ) {
    channel.onClose((code, reason) => {
      debug("channel closed by peer (code=%s)", code);
      void this.finish(code, reason).catch((error: unknown) => {
        this.logger?.error("Failed to release WebSocket session", { error: String(error) });
      });
    });
  }

  get closed(): boolean {
    return this.finished;
  }

  async send(data: string): Promise<void> {
    if (this.finished) throw new Error("WebSocket session is closed");
    await this.channel.send(data);
  }

  async sendJson(value: unknown): Promise<void> {
    await this.send(JSON.stringify(value));
  }

  onMessage(listener: (data: string) => void): void {
    this.channel.onMessage((data) => {
      if (!this.finished) listener(data);
    });
  }

  onClose(listener: (code?: number, reason?: string) => void): void {
    this.closeListeners.push(listener);
  }

  /** Closes the connection and releases the session's request-scoped dependencies. */
  async close(code = 1000, reason?: string): Promise<void> {
    if (this.finished) return this.released ?? undefined;
    const finishing = this.finish(code, reason);
    await this.channel.close(code, reason);
    await finishing;
  }

  private finish(code?: number, reason?: string): Promise<void> {
    if (!this.finished) {
      this.finished = true;
      for (const listener of this.closeListeners) listener(code, reason);
      this.released = this.releaseScope();
    }
    return this.released ?? Promise.resolve();
  }
}
