import http from "node:http";
import type { AddressInfo } from "node:net";
import { URL } from "node:url";
import { ZodError, z } from "zod";
import { PpeItemSchema } from "../shared/detection/result-schema";
import { InvalidFrameError, isSiteWatchError } from "../shared/errors";
import { type Logger, getLogger, toErrorPayload } from "../shared/logger";
import type { DetectorHealth } from "../shared/types/detector";
import type { ViolationFilters, ViolationStore } from "../shared/types/violation";
import type { SessionManager } from "./session/sessionManager";

export type HttpServerOptions = {
  sessions: SessionManager;
  detector: { health: () => DetectorHealth };
  violations: ViolationStore;
  maxFrameBytes: number;
  logger?: Logger;
};

export type HttpServerHandle = {
  origin: string;
  port: number;
  close: () => Promise<void>;
};

type JsonResponder = (status: number, body: unknown) => void;

class HttpError extends Error {
  readonly status: number;

  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
  }
}

const CreateSessionSchema = z
  .object({
    cameraId: z.string().trim().min(1).max(128).optional(),
    location: z.string().trim().min(1).max(256).optional(),
    requiredPpe: z.array(PpeItemSchema).min(1).optional(),
    confidenceFloor: z.number().min(0).max(1).optional(),
  })
  .strict();

const UpdateSessionSchema = z
  .object({
    requiredPpe: z.array(PpeItemSchema).min(1).optional(),
    confidenceFloor: z.number().min(0).max(1).optional(),
  })
  .strict()
  .refine((body) => body.requiredPpe !== undefined || body.confidenceFloor !== undefined, {
    message: "Nothing to update",
  });

const ViolationQuerySchema = z.object({
  workerId: z.string().min(1).optional(),
  sessionId: z.string().min(1).optional(),
  type: PpeItemSchema.optional(),
  open: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  since: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const SESSION_FRAMES_ROUTE = /^\/api\/sessions\/([^/]+)\/frames$/;
const SESSION_ROUTE = /^\/api\/sessions\/([^/]+)$/;

const buildHeaders = (): Record<string, string> => ({
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET,POST,PATCH,DELETE,OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type,X-Frame-Id,X-Frame-Timestamp",
});

const statusForError = (error: unknown): number => {
  if (error instanceof HttpError) {
    return error.status;
  }
  if (error instanceof ZodError) {
    return 400;
  }
  if (!isSiteWatchError(error)) {
    return 500;
  }
  switch (error.code) {
    case "SESSION_NOT_FOUND":
      return 404;
    case "SESSION_NOT_ACTIVE":
      return 409;
    case "SESSION_BUSY":
      return 429;
    case "DETECTION_UNAVAILABLE":
      return 503;
    case "INVALID_FRAME":
      return 400;
    default:
      return 500;
  }
};

const errorBody = (error: unknown, status: number) => {
  if (error instanceof HttpError || isSiteWatchError(error)) {
    return { error: { code: error.code, message: error.message } };
  }
  if (error instanceof ZodError) {
    return {
      error: {
        code: "BAD_REQUEST",
        message: error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; "),
      },
    };
  }
  return { error: { code: status === 500 ? "INTERNAL" : "ERROR", message: "Request failed" } };
};

const headerValue = (req: http.IncomingMessage, name: string): string | null => {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
};

/** Epoch milliseconds or an ISO-8601 string. */
const parseFrameTimestamp = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return numeric;
  }
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidFrameError(`Unreadable frame timestamp ${value}`, {
      reason: "timestamp",
    });
  }
  return parsed;
};

const readBody = (req: http.IncomingMessage, limit: number): Promise<Buffer> => {
  const declared = Number(req.headers["content-length"] ?? Number.NaN);
  if (Number.isFinite(declared) && declared > limit) {
    req.resume();
    return Promise.reject(
      new HttpError(413, "PAYLOAD_TOO_LARGE", `Body exceeds ${limit} bytes`),
    );
  }

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let rejected = false;

    req.on("data", (chunk: Buffer) => {
      if (rejected) {
        return;
      }
      received += chunk.length;
      if (received > limit) {
        rejected = true;
        reject(new HttpError(413, "PAYLOAD_TOO_LARGE", `Body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!rejected) {
        resolve(Buffer.concat(chunks));
      }
    });
    req.on("error", (error) => {
      if (!rejected) {
        rejected = true;
        reject(error);
      }
    });
  });
};

const readJson = async (req: http.IncomingMessage, limit: number): Promise<unknown> => {
  const body = await readBody(req, limit);
  if (body.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(body.toString("utf8"));
    return parsed;
  } catch {
    throw new HttpError(400, "BAD_REQUEST", "Body is not valid JSON");
  }
};

const JSON_BODY_LIMIT = 64 * 1024;

export const createRequestHandler = (options: HttpServerOptions) => {
  const logger = options.logger ?? getLogger("http-server", "server");

  const route = async (
    req: http.IncomingMessage,
    method: string,
    url: URL,
    respond: JsonResponder,
  ): Promise<void> => {
    const { pathname } = url;

    if (pathname === "/api/health") {
      if (method !== "GET") {
        throw new HttpError(405, "METHOD_NOT_ALLOWED", "Method not allowed");
      }
      const detector = options.detector.health();
      const ready = detector.state === "ready";
      respond(ready ? 200 : 503, {
        status: ready ? "ok" : "unavailable",
        detector,
        sessions: options.sessions.size,
      });
      return;
    }

    if (pathname === "/api/sessions") {
      if (method === "GET") {
        respond(200, { sessions: options.sessions.listSessions() });
        return;
      }
      if (method === "POST") {
        const body = CreateSessionSchema.parse(await readJson(req, JSON_BODY_LIMIT));
        respond(201, options.sessions.createSession(body));
        return;
      }
      throw new HttpError(405, "METHOD_NOT_ALLOWED", "Method not allowed");
    }

    const framesMatch = SESSION_FRAMES_ROUTE.exec(pathname);
    if (framesMatch) {
      if (method !== "POST") {
        throw new HttpError(405, "METHOD_NOT_ALLOWED", "Method not allowed");
      }
      const sessionId = decodeURIComponent(framesMatch[1] ?? "");
      const frameId = headerValue(req, "x-frame-id");
      const image = await readBody(req, options.maxFrameBytes);
      const timestamp = parseFrameTimestamp(headerValue(req, "x-frame-timestamp"));
      const result = await options.sessions.submitFrame(sessionId, frameId, image, timestamp);
      respond(200, result);
      return;
    }

    const sessionMatch = SESSION_ROUTE.exec(pathname);
    if (sessionMatch) {
      const sessionId = decodeURIComponent(sessionMatch[1] ?? "");
      if (method === "GET") {
        respond(200, options.sessions.getSession(sessionId));
        return;
      }
      if (method === "PATCH") {
        const body = UpdateSessionSchema.parse(await readJson(req, JSON_BODY_LIMIT));
        respond(200, await options.sessions.configureSession(sessionId, body));
        return;
      }
      if (method === "DELETE") {
        respond(200, await options.sessions.stopSession(sessionId));
        return;
      }
      throw new HttpError(405, "METHOD_NOT_ALLOWED", "Method not allowed");
    }

    if (pathname === "/api/violations") {
      if (method !== "GET") {
        throw new HttpError(405, "METHOD_NOT_ALLOWED", "Method not allowed");
      }
      const query = ViolationQuerySchema.parse(Object.fromEntries(url.searchParams));
      const filters: ViolationFilters = {
        workerId: query.workerId,
        sessionId: query.sessionId,
        violationTypes: query.type ? [query.type] : undefined,
        open: query.open,
        since: query.since,
      };
      respond(200, {
        total: options.violations.countViolations(filters),
        violations: options.violations.listViolations({ ...filters, limit: query.limit }),
      });
      return;
    }

    throw new HttpError(404, "NOT_FOUND", "Not found");
  };

  return (req: http.IncomingMessage, res: http.ServerResponse): void => {
    const respond: JsonResponder = (status, body) => {
      res.writeHead(status, buildHeaders());
      res.end(JSON.stringify(body));
    };

    const method = req.method ?? "GET";
    if (method === "OPTIONS") {
      res.writeHead(204, buildHeaders());
      res.end();
      return;
    }

    let url: URL;
    try {
      url = new URL(req.url ?? "/", "http://localhost");
    } catch (error) {
      logger.warn("Invalid request URL received", {
        url: req.url,
        error: toErrorPayload(error),
      });
      respond(400, { error: { code: "BAD_REQUEST", message: "Invalid request URL" } });
      return;
    }

    route(req, method, url, respond).catch((error: unknown) => {
      const status = statusForError(error);
      if (status >= 500 && status !== 503) {
        logger.error("Request failed", {
          method,
          path: url.pathname,
          error: toErrorPayload(error),
        });
      } else {
        logger.debug("Request rejected", {
          method,
          path: url.pathname,
          status,
          error: toErrorPayload(error),
        });
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      respond(status, errorBody(error, status));
    });
  };
};

const isAddrInUseError = (error: unknown): boolean =>
  error instanceof Error && Reflect.get(error, "code") === "EADDRINUSE";

export const startHttpServer = (
  options: HttpServerOptions,
  address: { host: string; port: number },
): Promise<HttpServerHandle> => {
  const logger = options.logger ?? getLogger("http-server", "server");
  const server = http.createServer(createRequestHandler(options));

  return new Promise<HttpServerHandle>((resolve, reject) => {
    const onStartupError = (error: unknown) => {
      if (isAddrInUseError(error)) {
        logger.error("HTTP server port already in use", { ...address });
      }
      reject(error);
    };
    server.once("error", onStartupError);

    server.listen(address.port, address.host, () => {
      server.off("error", onStartupError);
      server.on("error", (error: unknown) => {
        logger.error("HTTP server encountered an error", toErrorPayload(error));
      });

      const bound: AddressInfo | string | null = server.address();
      const port = typeof bound === "object" && bound !== null ? bound.port : address.port;
      const origin = `http://${address.host}:${port}`;
      logger.info("HTTP server listening", { host: address.host, port });

      resolve({
        origin,
        port,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => {
              if (error) {
                logger.warn("Failed to close HTTP server cleanly", toErrorPayload(error));
                rejectClose(error);
                return;
              }
              logger.info("HTTP server stopped");
              resolveClose();
            });
            server.closeIdleConnections();
          }),
      });
    });
  });
};
