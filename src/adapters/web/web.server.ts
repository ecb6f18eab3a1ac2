import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import { URL } from "node:url";
import { ERROR_CODES } from "../../core/errors/canonical_error_codes";
import { invalidInput, toCoreError, unauthorized } from "../../core/errors/core.errors";
import { createOperationMeta } from "../../core/store/operation.types";
import { mapCoreErrorToExternal } from "../../adapter/_shared/response_policy";
import { ROUTES, matchRoute } from "./web.routes";
import type { GatewayDeps, JsonObject, RouteContext, RouteDefinition } from "./web.types";

export interface StartWebServerOptions {
  readonly host?: string;
  readonly port?: number;
  readonly deps: GatewayDeps;
  readonly routes?: readonly RouteDefinition[];
  readonly onListening?: (address: string) => void;
}

export const SECRET_HEADER = "x-ankiplace-secret";
export const REQUEST_ID_HEADER = "x-request-id";

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 4201;
const MAX_BODY_BYTES = 256 * 1024;
const RETRY_AFTER_SECONDS = "1";
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function sendJson(
  res: ServerResponse,
  statusCode: number,
  payload: JsonObject,
  extraHeaders: Record<string, string> = {}
): void {
  const body = `${JSON.stringify(payload)}\n`;
  res.writeHead(statusCode, {
    "content-type": "application/json; charset=utf-8",
    "content-length": String(Buffer.byteLength(body, "utf8")),
    "cache-control": "no-store",
    ...extraHeaders,
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

function sendError(res: ServerResponse, error: unknown, requestId: string): void {
  const external = mapCoreErrorToExternal(toCoreError(error));
  const headers: Record<string, string> = { [REQUEST_ID_HEADER]: requestId };
  if (external.retryable) {
    headers["retry-after"] = RETRY_AFTER_SECONDS;
  }
  sendJson(res, external.httpStatus, external.body, headers);
}

async function readJsonBody(req: IncomingMessage): Promise<JsonObject> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total > MAX_BODY_BYTES) {
      throw invalidInput(`VALIDATION_ERROR body exceeds ${String(MAX_BODY_BYTES)} bytes`);
    }
    chunks.push(buffer);
  }
  const raw = Buffer.concat(chunks).toString("utf8");
  if (raw.trim() === "") {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw invalidInput(
      `VALIDATION_ERROR body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw invalidInput("VALIDATION_ERROR body must be a JSON object");
  }
  return parsed as JsonObject;
}

function readHeader(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

function resolveRequestId(req: IncomingMessage, newId: () => string): string {
  const supplied = readHeader(req, REQUEST_ID_HEADER);
  if (typeof supplied === "string" && REQUEST_ID_PATTERN.test(supplied)) {
    return supplied;
  }
  return newId();
}

async function dispatch(
  route: RouteDefinition,
  ctx: RouteContext,
  requestId: string
): Promise<JsonObject> {
  const meta = createOperationMeta({
    id: requestId,
    timeoutMs: ctx.deps.requestDeadlineMs,
    now: ctx.nowMs,
  });

  switch (route.kind) {
    case "read": {
      const run = route.prepare(ctx);
      const result = await ctx.deps.reader.query({ kind: "read", ...meta, run });
      return result.value;
    }
    case "write": {
      const run = route.prepare(ctx);
      const result = await ctx.deps.writer.submit({ kind: "write", ...meta, run });
      return result.value;
    }
  }
}

/**
 * Request gateway. Every route is statically read or write; privileged
 * routes are checked against the session secret before the body is read or
 * any store is touched.
 */
export function createGatewayServer(
  deps: GatewayDeps,
  routes: readonly RouteDefinition[] = ROUTES
): http.Server {
  const now = deps.now ?? Date.now;
  const newId = deps.newId ?? randomUUID;

  return http.createServer(async (req, res) => {
    const requestId = resolveRequestId(req, newId);
    try {
      const method = req.method ?? "GET";
      const origin = `http://${req.headers.host ?? "localhost"}`;
      const requestUrl = new URL(req.url ?? "/", origin);

      const matched = matchRoute(method, requestUrl.pathname, routes);
      if (!matched) {
        sendText(res, 404, "Not Found");
        return;
      }

      const { route, params } = matched;
      if (route.privileged && !deps.secret.matches(readHeader(req, SECRET_HEADER))) {
        throw unauthorized();
      }

      const body = method === "POST" ? await readJsonBody(req) : {};
      const value = await dispatch(route, { params, body, nowMs: now(), deps }, requestId);
      sendJson(res, 200, value, { [REQUEST_ID_HEADER]: requestId });
    } catch (error) {
      const coreError = toCoreError(error);
      if (coreError.code === ERROR_CODES.INTERNAL_ERROR || coreError.code === ERROR_CODES.STORE_ERROR) {
        console.error(`[web] request=${requestId} ${coreError.code}: ${coreError.message}`);
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      sendError(res, coreError, requestId);
    }
  });
}

export function startWebServer(options: StartWebServerOptions): http.Server {
  const host = options.host ?? DEFAULT_HOST;
  const port = options.port ?? DEFAULT_PORT;
  if (host === "0.0.0.0") {
    console.warn("[web] warning: HOST=0.0.0.0 exposes the service beyond localhost.");
  }

  const server = createGatewayServer(options.deps, options.routes);
  server.listen(port, host, () => {
    const address = `http://${host}:${String(port)}`;
    console.log(`[web] ankiplace listening on ${address}`);
    options.onListening?.(address);
  });
  return server;
}
