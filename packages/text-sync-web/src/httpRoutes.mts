import { readFile } from "node:fs/promises";
import path from "node:path";
import { MalformedMessageError, OversizedContentError } from "../../text-sync/src/errors.mjs";
import type { Logger } from "../../text-sync/src/logger.mjs";
import { parseEditBody } from "../../text-sync/src/protocol.mjs";
import type { SyncHub } from "../../text-sync/src/syncHub.mjs";

export interface HttpRequest {
  method: string;
  pathname: string;
  body: string;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

export interface RouteContext {
  hub: SyncHub;
  logger: Logger;
  /** Directory holding the editor page and its bundle. */
  publicDir: string;
}

type Handler = (context: RouteContext, request: HttpRequest) => Promise<HttpResponse>;

function json(status: number, payload: unknown): HttpResponse {
  return {
    status,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload)
  };
}

function staticFile(file: string, contentType: string): Handler {
  return async (context) => {
    try {
      const content = await readFile(path.join(context.publicDir, file));
      return { status: 200, headers: { "Content-Type": contentType }, body: content };
    } catch {
      return json(404, { error: "Not found" });
    }
  };
}

const apiInfo: Handler = async () =>
  json(200, {
    message: "Collaborative Text Editor API",
    endpoints: {
      "GET /text": "Get current text content",
      "POST /text": "Update text content",
      "GET /status": "Get server status",
      "GET /editor": "Browser editor",
      "WebSocket /ws": "Real-time updates"
    }
  });

const getText: Handler = async ({ hub }) => {
  const snapshot = hub.read();
  return json(200, {
    content: snapshot.content,
    last_updated: snapshot.lastModified.toISOString(),
    user_count: hub.sessionCount
  });
};

const postText: Handler = async ({ hub, logger }, request) => {
  try {
    let body: unknown;
    try {
      body = JSON.parse(request.body);
    } catch {
      throw new MalformedMessageError("Body is not valid JSON");
    }
    const edit = parseEditBody(body);
    const snapshot = await hub.onEdit({
      content: edit.content,
      userId: edit.userId,
      timestamp: edit.timestamp ?? new Date()
    });
    return json(200, {
      message: "Text updated successfully",
      timestamp: snapshot.lastModified.toISOString()
    });
  } catch (error) {
    if (error instanceof MalformedMessageError) {
      logger.warn("Rejected POST /text:", error.message);
      return json(400, { error: error.message, code: error.code });
    }
    if (error instanceof OversizedContentError) {
      logger.warn("Rejected POST /text:", error.message);
      return json(413, { error: error.message, code: error.code });
    }
    throw error;
  }
};

const getStatus: Handler = async ({ hub }) => {
  const status = hub.status();
  return json(200, {
    connected_sessions: status.connectedSessions,
    text_length: status.textLength,
    last_updated: status.lastModified.toISOString(),
    last_editor: status.lastEditor,
    file_path: hub.storeLocation
  });
};

const routes: Record<string, Partial<Record<string, Handler>>> = {
  "/": { GET: apiInfo },
  "/text": { GET: getText, POST: postText },
  "/status": { GET: getStatus },
  "/editor": { GET: staticFile("index.html", "text/html") },
  "/client.js": { GET: staticFile("client.js", "application/javascript") }
};

export async function handleHttpRequest(
  context: RouteContext,
  request: HttpRequest
): Promise<HttpResponse> {
  const methods = routes[request.pathname];
  if (!methods) {
    return json(404, { error: "Not found" });
  }
  const handler = methods[request.method.toUpperCase()];
  if (!handler) {
    const response = json(405, { error: "Method not allowed" });
    response.headers["Allow"] = Object.keys(methods).join(", ");
    return response;
  }
  return handler(context, request);
}
