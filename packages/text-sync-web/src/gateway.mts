import type { IncomingMessage, RequestListener, Server, ServerResponse } from "node:http";
import { WebSocketServer } from "ws";
import type { RawData, WebSocket } from "ws";
import type { SessionChannel } from "../../text-sync/src/connectionRegistry.mjs";
import type { Logger } from "../../text-sync/src/logger.mjs";
import type { SyncHub } from "../../text-sync/src/syncHub.mjs";
import { handleHttpRequest } from "./httpRoutes.mjs";
import type { RouteContext } from "./httpRoutes.mjs";
import { SessionController } from "./sessionController.mjs";

export interface GatewayOptions {
  hub: SyncHub;
  logger: Logger;
  publicDir: string;
  maxContentBytes: number;
}

export interface Gateway {
  close(): Promise<void>;
}

/**
 * Upper bound for a frame or request body carrying `maxContentBytes` of
 * text: JSON may escape every byte as `\u00XX`, plus room for the envelope.
 */
export function maxPayloadBytes(maxContentBytes: number): number {
  return maxContentBytes * 6 + 1024;
}

function describe(error: unknown): unknown {
  return error instanceof Error ? error.message : error;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/** Adapts a `ws` socket to the hub's outbound channel. */
export function socketChannel(socket: WebSocket): SessionChannel {
  return {
    send: (payload) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== socket.OPEN) {
          reject(new Error("socket is not open"));
          return;
        }
        socket.send(payload, (error) => (error ? reject(error) : resolve()));
      }),
    close: (code, reason) => socket.close(code, reason)
  };
}

/** Resolves null once the body grows past `limit`. */
async function readBody(request: IncomingMessage, limit: number): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limit) return null;
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function createRequestListener(options: GatewayOptions): RequestListener {
  const context: RouteContext = {
    hub: options.hub,
    logger: options.logger,
    publicDir: options.publicDir
  };
  const limit = maxPayloadBytes(options.maxContentBytes);

  const respond = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const body = await readBody(req, limit);
    if (body === null) {
      res.writeHead(413, { "Content-Type": "application/json", Connection: "close" });
      res.end(JSON.stringify({ error: "Request body exceeds the transport limit", code: "OVERSIZED_CONTENT" }));
      return;
    }

    const response = await handleHttpRequest(context, {
      method: req.method ?? "GET",
      pathname: url.pathname,
      body
    });
    res.writeHead(response.status, response.headers);
    res.end(response.body);
  };

  return (req, res) => {
    respond(req, res).catch((error: unknown) => {
      options.logger.error(`${req.method} ${req.url} failed:`, describe(error));
      if (!res.headersSent) res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Internal server error" }));
    });
  };
}

/**
 * Serves the streaming channel on `/ws` of an existing HTTP server. Every
 * connection becomes one hub session; an optional `?user_id=` names it.
 */
export function attachGateway(server: Server, options: GatewayOptions): Gateway {
  const { hub, logger } = options;
  const wss = new WebSocketServer({
    server,
    path: "/ws",
    maxPayload: maxPayloadBytes(options.maxContentBytes)
  });

  wss.on("connection", (socket, request) => {
    const url = new URL(request.url ?? "/ws", "http://localhost");
    const controller = new SessionController(hub, socketChannel(socket), logger);

    controller.open(url.searchParams.get("user_id")).catch((error: unknown) => {
      logger.error("Opening session failed:", describe(error));
      socket.close(1011, "internal error");
    });

    socket.on("message", (data) => {
      controller.receive(rawToString(data)).catch((error: unknown) => {
        logger.error("Handling message failed:", describe(error));
      });
    });

    socket.on("close", () => {
      controller.close().catch((error: unknown) => {
        logger.error("Closing session failed:", describe(error));
      });
    });

    socket.on("error", (error) => {
      logger.warn("WebSocket error:", error.message);
    });
  });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
