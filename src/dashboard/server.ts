import fs from "node:fs/promises";
import http from "node:http";
import path from "node:path";

import { backendUnavailable, isPushDashboardError } from "../pushes/errors";
import { parseNewPushForm } from "../pushes/newPush";
import { PushItemLoader, parsePushId } from "../pushes/pushItemLoader";
import { PushQuery, parseListQuery } from "../pushes/pushQuery";
import type { PushStore } from "../pushes/store";
import type { PushItemsResponse, PushListResponse } from "../pushes/types";
import type { DashboardError, DashboardHealth } from "./types";

export interface StartDashboardServerOptions {
  host: "127.0.0.1" | "0.0.0.0";
  port: number;
  store: PushStore;
  defaultRpp: number;
  maxRpp: number;
  pushmaster: string;
  assetRoot: string;
  log?: (line: string) => void;
}

export interface DashboardServerHandle {
  url: string;
  close: () => Promise<void>;
}

const MAX_FORM_BYTES = 64 * 1024;

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }

  return undefined;
}

function toDashboardError(error: unknown): { statusCode: number; body: DashboardError } {
  if (isPushDashboardError(error)) {
    return {
      statusCode: error.httpStatus,
      body: {
        code: error.code,
        message: error.message.replace(/^[A-Z0-9_]+:\s*/, ""),
        details: Object.keys(error.details).length > 0 ? error.details : undefined
      }
    };
  }

  const raw = error instanceof Error ? error.message : String(error);
  const match = raw.match(/^([A-Z0-9_]+):\s*(.*)$/);
  if (!match) {
    return {
      statusCode: 500,
      body: {
        code: "E_DASHBOARD_UNKNOWN",
        message: raw.slice(0, 220)
      }
    };
  }

  const code = match[1] ?? "E_DASHBOARD_UNKNOWN";
  return {
    statusCode: code === "E_DASHBOARD_FORM_TOO_LARGE" ? 413 : code === "E_DASHBOARD_FORM_UNSUPPORTED" ? 415 : 500,
    body: {
      code,
      message: (match[2] ?? "unknown error").slice(0, 220)
    }
  };
}

function sendJson(response: http.ServerResponse, statusCode: number, payload: unknown): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json; charset=utf-8");
  response.end(`${JSON.stringify(payload, null, 2)}\n`);
}

function contentTypeForPath(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === ".html") {
    return "text/html; charset=utf-8";
  }

  if (extension === ".js") {
    return "application/javascript; charset=utf-8";
  }

  if (extension === ".css") {
    return "text/css; charset=utf-8";
  }

  if (extension === ".json" || extension === ".map") {
    return "application/json; charset=utf-8";
  }

  if (extension === ".svg") {
    return "image/svg+xml";
  }

  if (extension === ".ico") {
    return "image/x-icon";
  }

  return "application/octet-stream";
}

function wantsJson(request: http.IncomingMessage): boolean {
  const accept = request.headers.accept ?? "";
  return accept.toLowerCase().includes("application/json");
}

async function readForm(request: http.IncomingMessage): Promise<URLSearchParams> {
  const contentType = (request.headers["content-type"] ?? "application/x-www-form-urlencoded").toLowerCase();
  if (!contentType.startsWith("application/x-www-form-urlencoded")) {
    throw makeError("E_DASHBOARD_FORM_UNSUPPORTED", "expected application/x-www-form-urlencoded");
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_FORM_BYTES) {
      throw makeError("E_DASHBOARD_FORM_TOO_LARGE", `form body exceeds ${MAX_FORM_BYTES} bytes`);
    }
    chunks.push(buffer);
  }

  return new URLSearchParams(Buffer.concat(chunks).toString("utf8"));
}

async function readStaticAsset(assetRoot: string, pathname: string): Promise<{ path: string; body: Buffer }> {
  const sanitized = pathname === "/" || pathname === "/pushes" ? "/index.html" : pathname;
  const normalized = path.normalize(decodeURIComponent(sanitized)).replace(/^([.][.][/\\])+/, "");
  const candidatePath = path.resolve(assetRoot, `.${normalized}`);

  if (!candidatePath.startsWith(path.resolve(assetRoot))) {
    throw makeError("E_DASHBOARD_ASSET_FORBIDDEN", "asset path escapes dashboard root");
  }

  try {
    const body = await fs.readFile(candidatePath);
    return {
      path: candidatePath,
      body
    };
  } catch (error) {
    const code = errnoCode(error);
    if (code !== "ENOENT" && code !== "EISDIR") {
      throw error;
    }

    const fallbackPath = path.join(assetRoot, "index.html");
    const fallbackBody = await fs.readFile(fallbackPath);
    return {
      path: fallbackPath,
      body: fallbackBody
    };
  }
}

export async function startDashboardServer(options: StartDashboardServerOptions): Promise<DashboardServerHandle> {
  const assetRoot = path.resolve(options.assetRoot);
  const log = options.log ?? ((line: string) => process.stdout.write(`${line}\n`));

  try {
    const stat = await fs.stat(path.join(assetRoot, "index.html"));
    if (!stat.isFile()) {
      throw new Error("index.html is not a file");
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_DASHBOARD_ASSETS_MISSING", `${assetRoot} (${message.slice(0, 220)})`);
  }

  const query = new PushQuery({ store: options.store, maxRpp: options.maxRpp });
  const loader = new PushItemLoader(options.store);

  async function route(request: http.IncomingMessage, response: http.ServerResponse): Promise<void> {
    const method = request.method ?? "GET";
    const parsed = new URL(request.url ?? "/", `http://${options.host}:${options.port}`);
    const pathname = parsed.pathname;

    if (method === "GET" && pathname === "/healthz") {
      const health: DashboardHealth = { ok: true };
      sendJson(response, 200, health);
      return;
    }

    if (method === "GET" && pathname === "/pushes" && wantsJson(request)) {
      const { filter, window } = parseListQuery(parsed.searchParams, { rpp: options.defaultRpp });
      const page = await query.list(filter, window);
      const payload: PushListResponse = { ...page, window, filter };
      sendJson(response, 200, payload);
      return;
    }

    if (method === "POST" && pathname === "/pushitems") {
      const form = await readForm(request);
      const pushId = parsePushId(form.get("push"));
      const payload: PushItemsResponse = {
        pushId,
        items: await loader.loadItems(pushId)
      };
      sendJson(response, 200, payload);
      return;
    }

    if (method === "POST" && pathname === "/newpush") {
      const form = await readForm(request);
      const fields = parseNewPushForm(form);
      const push = await options.store.createPush({ ...fields, user: options.pushmaster }).catch((error: unknown) => {
        throw backendUnavailable(error);
      });
      log(`pushdash created push ${push.id} '${push.title}' on ${push.branch}`);
      sendJson(response, 201, { push });
      return;
    }

    if (method !== "GET") {
      sendJson(response, 405, {
        code: "E_DASHBOARD_METHOD_NOT_ALLOWED",
        message: "only GET, and POST to /pushitems and /newpush, are supported"
      });
      return;
    }

    const asset = await readStaticAsset(assetRoot, pathname);
    response.statusCode = 200;
    response.setHeader("Content-Type", contentTypeForPath(asset.path));
    response.end(asset.body);
  }

  const server = http.createServer((request, response) => {
    const startedAt = Date.now();

    void route(request, response)
      .catch((error: unknown) => {
        const failure = toDashboardError(error);
        if (failure.statusCode >= 500) {
          log(`pushdash error ${failure.body.code}: ${failure.body.message}`);
        }
        sendJson(response, failure.statusCode, failure.body);
      })
      .finally(() => {
        log(`pushdash ${request.method ?? "GET"} ${request.url ?? "/"} ${response.statusCode} ${Date.now() - startedAt}ms`);
      });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", (error) => {
      if (errnoCode(error) === "EADDRINUSE") {
        reject(makeError("E_DASHBOARD_PORT_IN_USE", `port ${options.port} is already in use`));
        return;
      }

      const message = error instanceof Error ? error.message : String(error);
      reject(makeError("E_DASHBOARD_SERVER_START", message.slice(0, 220)));
    });

    server.listen(options.port, options.host, () => {
      resolve();
    });
  });

  const urlHost = options.host === "0.0.0.0" ? "127.0.0.1" : options.host;

  return {
    url: `http://${urlHost}:${options.port}`,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }

          resolve();
        });
      });
    }
  };
}
