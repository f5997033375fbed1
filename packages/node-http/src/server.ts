import { createServer, type IncomingMessage, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import createDebug from "debug";
import {
  HttpException,
  NotImplementedException,
  PayloadTooLargeException,
  RequestCancelledError,
  toErrorResponse,
  type PlinthApplication,
} from "@plinth/core";
import { mapIncomingMessage, toHttpMethod, writeResponse, type ResponseWriter } from "./request-mapper";

const debug = createDebug("plinth:node-http");

export const DEFAULT_PORT = 8080;
export const DEFAULT_BODY_LIMIT_BYTES = 1024 * 1024;

export type RequestListenerOptions = {
  /** Largest accepted request body. Larger bodies get a 413. */
  bodyLimitBytes?: number;
};

export type ServeOptions = RequestListenerOptions & {
  port?: number;
  host?: string;
  env?: NodeJS.ProcessEnv;
};

export async function readBody(
  body: AsyncIterable<Buffer | string>,
  limit = DEFAULT_BODY_LIMIT_BYTES,
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of body) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > limit) throw new PayloadTooLargeException();
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

/**
 * Adapts an application to `node:http`'s request event. A client that goes
 * away before the response is written aborts the request's signal.
 */
export function createRequestListener(
  app: PlinthApplication,
  options: RequestListenerOptions = {},
): (req: IncomingMessage, res: ResponseWriter) => void {
  return (req, res) => {
    handleRequest(app, req, res, options).catch((error: unknown) => {
      app.logger.error("Failed to serve request", {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.writableEnded) {
        writeResponse(res, { status: 500, headers: { "content-type": "application/json" }, body: '{"message":"Internal Server Error"}' }, "GET");
      }
    });
  };
}

async function handleRequest(
  app: PlinthApplication,
  req: IncomingMessage,
  res: ResponseWriter,
  options: RequestListenerOptions,
): Promise<void> {
  const method = toHttpMethod(req.method);
  if (!method) {
    debug("unsupported method %s → 501", req.method);
    req.resume();
    writeResponse(res, toErrorResponse(new NotImplementedException(`Method ${req.method ?? ""} is not supported`)), "GET");
    return;
  }

  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort(new Error("Client disconnected"));
  });

  let body: Buffer;
  try {
    body = await readBody(req, options.bodyLimitBytes);
  } catch (error) {
    if (!(error instanceof HttpException)) throw error;
    writeResponse(res, toErrorResponse(error), method);
    return;
  }

  const request = mapIncomingMessage(req, method, { body, signal: controller.signal });
  try {
    const response = await app.dispatch(request);
    writeResponse(res, response, method);
  } catch (error) {
    if (!(error instanceof RequestCancelledError)) throw error;
    debug("request %s cancelled: client disconnected", request.requestId);
  }
}

function rejectUpgrade(_req: IncomingMessage, socket: Duplex): void {
  socket.end("HTTP/1.1 501 Not Implemented\r\nConnection: close\r\nContent-Length: 0\r\n\r\n");
}

export function resolveListenAddress(options: ServeOptions): { port: number; host?: string } {
  const env = options.env ?? process.env;
  const rawPort = env.PLINTH_HTTP_PORT;
  let port = options.port ?? DEFAULT_PORT;
  if (options.port === undefined && rawPort !== undefined) {
    port = Number(rawPort);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`Invalid PLINTH_HTTP_PORT: "${rawPort}"`);
    }
  }
  const host = options.host ?? env.PLINTH_HTTP_HOST;
  return host ? { port, host } : { port };
}

/**
 * Serves an application over `node:http`. `listen` runs the startup hooks
 * before the port opens; `close` stops accepting connections, then runs the
 * shutdown hooks.
 */
export class PlinthHttpServer {
  readonly server: Server;
  private closing: Promise<void> | null = null;

  constructor(
    private readonly app: PlinthApplication,
    private readonly options: ServeOptions = {},
  ) {
    this.server = createServer(createRequestListener(app, options));
    this.server.on("upgrade", rejectUpgrade);
  }

  async listen(): Promise<AddressInfo> {
    const { port, host } = resolveListenAddress(this.options);
    await this.app.start();

    try {
      await new Promise<void>((resolve, reject) => {
        this.server.once("error", reject);
        this.server.listen(port, host, () => {
          this.server.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      this.app.logger.error("Failed to listen", {
        host,
        port,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.close();
      throw error;
    }

    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    this.app.logger.info("Listening", { host: address.address, port: address.port });
    return address;
  }

  close(): Promise<void> {
    this.closing ??= this.stop();
    return this.closing;
  }

  private async stop(): Promise<void> {
    if (this.server.listening) {
      await new Promise<void>((resolve, reject) => {
        this.server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await this.app.shutdown();
  }
}

export async function serve(app: PlinthApplication, options: ServeOptions = {}): Promise<PlinthHttpServer> {
  const server = new PlinthHttpServer(app, options);
  await server.listen();
  return server;
}
