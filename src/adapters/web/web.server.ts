import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { URL } from "node:url";
import { asMessage } from "../../_shared/utils/error_message";
import { encodeSseEvent, SSE_HEARTBEAT_FRAME } from "./web.sse";
import type {
  ChatStreamRequest,
  IChatSessionService,
  WebErrorDTO,
  WebSessionCloseResultDTO,
  WebSessionListDTO,
  WebSessionResponseDTO,
} from "./web.types";

export interface StartWebServerOptions {
  readonly host?: string;
  readonly port?: number;
  readonly service: IChatSessionService;
  readonly heartbeatMs?: number;
  readonly toErrorBody?: (error: unknown) => WebErrorResponse;
}

export interface WebErrorResponse {
  readonly status: number;
  readonly body: WebErrorDTO;
}

export interface JsonObject {
  readonly [key: string]: unknown;
}

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 8000;
const DEFAULT_HEARTBEAT_MS = 15000;
const SESSION_PATH_PATTERN = /^\/api\/session\/([^/]+)$/;

export class WebRequestError extends Error {
  readonly statusCode: number;
  readonly errorCode: "BAD_REQUEST" | "SESSION_NOT_FOUND";

  constructor(statusCode: number, errorCode: "BAD_REQUEST" | "SESSION_NOT_FOUND", detail?: string) {
    super(detail ? `${errorCode} ${detail}` : errorCode);
    this.name = "WebRequestError";
    this.statusCode = statusCode;
    this.errorCode = errorCode;
  }
}

export function toPort(raw: string | undefined): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return DEFAULT_PORT;
  }
  return parsed;
}

function sendJson(res: ServerResponse, statusCode: number, payload: object): void {
  const body = `${JSON.stringify(payload)}\n`;
  res.writeHead(statusCode, {
    "content-type": "application/json; charset=utf-8",
    "content-length": String(Buffer.byteLength(body, "utf8")),
    "cache-control": "no-store",
  });
  res.end(body);
}

function sendText(res: ServerResponse, statusCode: number, payload: string): void {
  const body = `${payload}\n`;
  res.writeHead(statusCode, {
    "content-type": "text/plain; charset=utf-8",
    "content-length": String(Buffer.byteLength(body, "utf8")),
    "cache-control": "no-store",
  });
  res.end(body);
}

async function readJsonBody(req: IncomingMessage): Promise<JsonObject> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  const raw = Buffer.concat(chunks).toString("utf8");
  if (raw.trim() === "") {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new WebRequestError(400, "BAD_REQUEST", `body is not valid JSON: ${asMessage(error)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new WebRequestError(400, "BAD_REQUEST", "body must be a JSON object");
  }
  return parsed as JsonObject;
}

export function parseChatStreamRequest(body: JsonObject): ChatStreamRequest {
  const sessionId = body.sessionId ?? body.thread_id;
  if (typeof sessionId !== "string") {
    throw new WebRequestError(400, "BAD_REQUEST", "sessionId must be a string");
  }
  if (typeof body.message !== "string") {
    throw new WebRequestError(400, "BAD_REQUEST", "message must be a string");
  }
  return { sessionId, message: body.message };
}

function decodeSessionId(pathname: string): string | null {
  const matched = SESSION_PATH_PATTERN.exec(pathname);
  if (!matched || !matched[1]) {
    return null;
  }
  const decoded = decodeURIComponent(matched[1]);
  return decoded.trim() === "" ? null : decoded;
}

async function streamChatToResponse(
  service: IChatSessionService,
  request: ChatStreamRequest,
  res: ServerResponse,
  heartbeatMs: number
): Promise<void> {
  res.writeHead(200, {
    "content-type": "text/event-stream; charset=utf-8",
    "cache-control": "no-cache, no-transform",
    connection: "keep-alive",
  });

  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  };
  res.on("close", onClose);
  const heartbeat = setInterval(() => {
    res.write(SSE_HEARTBEAT_FRAME);
  }, heartbeatMs);

  try {
    for await (const event of service.streamChat(request.sessionId, request.message, {
      signal: controller.signal,
    })) {
      if (res.destroyed) {
        continue;
      }
      res.write(encodeSseEvent(event));
    }
  } finally {
    clearInterval(heartbeat);
    res.off("close", onClose);
    if (!res.writableEnded) {
      res.end();
    }
  }
}

function defaultErrorBody(error: unknown): WebErrorResponse {
  return {
    status: 500,
    body: {
      errorCode: "RUNTIME_FAILED",
      guideMessage: "abort_with_error(runtime_failed)",
      message: asMessage(error),
    },
  };
}

export function createRequestHandler(
  options: Omit<StartWebServerOptions, "host" | "port">
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const service = options.service;
  const heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  const toErrorBody = options.toErrorBody ?? defaultErrorBody;

  return async (req, res) => {
    try {
      const method = req.method ?? "GET";
      const origin = `http://${req.headers.host ?? "localhost"}`;
      const pathname = new URL(req.url ?? "/", origin).pathname;

      if (method === "GET" && pathname === "/") {
        sendJson(res, 200, { message: "Multi-session chat agent API" });
        return;
      }

      if (method === "GET" && pathname === "/health") {
        sendJson(res, 200, { status: "ok", sessions: service.sessionCount });
        return;
      }

      if (method === "POST" && pathname === "/api/chat/stream") {
        const request = parseChatStreamRequest(await readJsonBody(req));
        await streamChatToResponse(service, request, res, heartbeatMs);
        return;
      }

      if (method === "GET" && pathname === "/api/sessions") {
        const payload: WebSessionListDTO = { sessions: await service.listSessions() };
        sendJson(res, 200, payload);
        return;
      }

      const sessionId = decodeSessionId(pathname);
      if (sessionId !== null && method === "GET") {
        const session = service.getSessionInfo(sessionId);
        if (!session) {
          throw new WebRequestError(404, "SESSION_NOT_FOUND");
        }
        const payload: WebSessionResponseDTO = { session };
        sendJson(res, 200, payload);
        return;
      }

      if (sessionId !== null && method === "DELETE") {
        const payload: WebSessionCloseResultDTO = {
          sessionId,
          closed: await service.closeSession(sessionId),
        };
        sendJson(res, 200, payload);
        return;
      }

      sendText(res, 404, "Not Found");
    } catch (error) {
      if (res.headersSent) {
        res.end();
        return;
      }
      if (error instanceof WebRequestError) {
        sendJson(res, error.statusCode, { error: error.errorCode, message: error.message });
        return;
      }
      const mapped = toErrorBody(error);
      sendJson(res, mapped.status, mapped.body);
    }
  };
}

export function startWebServer(options: StartWebServerOptions): http.Server {
  const host = options.host ?? process.env.HOST ?? DEFAULT_HOST;
  const port = options.port ?? toPort(process.env.PORT);
  if (host === "0.0.0.0") {
    console.warn("[web] warning: HOST=0.0.0.0 exposes the chat API beyond localhost.");
  }

  const handler = createRequestHandler(options);
  const server = http.createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      console.warn(`[web] WEB_REQUEST_ERROR ${asMessage(error)}`);
    });
  });

  server.listen(port, host, () => {
    console.log(`[web] chat API listening on http://${host}:${String(port)}`);
  });
  return server;
}
