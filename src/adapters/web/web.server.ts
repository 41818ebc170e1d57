import http, { type IncomingMessage, type ServerResponse } from "node:http";
import fs from "node:fs/promises";
import path from "node:path";
import { URL } from "node:url";
import { createBadRequestError, toRuntimeError } from "../../../runtime/error";
import {
  mapCommentsToDTO,
  mapCommentToDTO,
  mapDocumentToDTO,
} from "../../../runtime/web/mapper";
import { CommentNotFoundError } from "../../review/review.errors";
import type {
  CreateCommentRequestDTO,
  FinishResultDTO,
  IReviewSessionApi,
  StaleNoticeDTO,
  StatusDTO,
  UpdateCommentRequestDTO,
  WebErrorDTO,
} from "./web.types";

export interface ReviewServerOptions {
  readonly session: IReviewSessionApi;
  readonly uiDistDir?: string;
  readonly onFinish?: () => void;
  readonly logger?: Pick<Console, "log" | "warn">;
}

export interface StartWebServerOptions extends ReviewServerOptions {
  readonly host?: string;
  readonly port?: number;
}

export interface StartedWebServer {
  readonly server: http.Server;
  readonly url: string;
  readonly port: number;
}

interface JsonObject {
  readonly [key: string]: unknown;
}

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_UI_DIST_REL_PATH = path.join("dist", "ui");
const COMMENTS_PATH = "/api/comments";
const COMMENT_BY_ID_PREFIX = "/api/comments/";

export function resolveUiDistPath(override?: string): string {
  if (typeof override === "string" && override.trim() !== "") {
    return path.resolve(override);
  }
  return path.resolve(process.cwd(), DEFAULT_UI_DIST_REL_PATH);
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  const body = `${JSON.stringify(payload)}\n`;
  res.writeHead(statusCode, {
    "content-type": "application/json; charset=utf-8",
    "content-length": String(Buffer.byteLength(body, "utf8")),
    "cache-control": "no-store",
  });
  res.end(body);
}

function statusPayload(status: string): StatusDTO {
  return { status };
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

function sendHtml(res: ServerResponse, payload: string): void {
  res.writeHead(200, {
    "content-type": "text/html; charset=utf-8",
    "content-length": String(Buffer.byteLength(payload, "utf8")),
    "cache-control": "no-store",
  });
  res.end(payload);
}

function sendMethodNotAllowed(res: ServerResponse, allowed: readonly string[]): void {
  res.setHeader("allow", allowed.join(", "));
  sendText(res, 405, "Method Not Allowed");
}

function contentTypeByPath(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".html") return "text/html; charset=utf-8";
  if (ext === ".js") return "application/javascript; charset=utf-8";
  if (ext === ".css") return "text/css; charset=utf-8";
  if (ext === ".json") return "application/json; charset=utf-8";
  if (ext === ".svg") return "image/svg+xml";
  if (ext === ".png") return "image/png";
  if (ext === ".ico") return "image/x-icon";
  return "application/octet-stream";
}

async function sendStaticFile(
  res: ServerResponse,
  filePath: string,
  options: { readonly cacheControl?: string } = {}
): Promise<boolean> {
  try {
    const data = await fs.readFile(filePath);
    res.writeHead(200, {
      "content-type": contentTypeByPath(filePath),
      "content-length": String(data.length),
      "cache-control": options.cacheControl ?? "public, max-age=60",
    });
    res.end(data);
    return true;
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError?.code === "ENOENT" || nodeError?.code === "EISDIR") {
      return false;
    }
    throw error;
  }
}

async function tryServeUiAsset(
  res: ServerResponse,
  pathname: string,
  uiDistRoot: string
): Promise<boolean> {
  const relative = pathname.replace(/^\/+/, "");
  const candidate = relative === "" ? "index.html" : relative;
  const normalized = path.normalize(candidate).replace(/^(\.\.(\/|\\|$))+/, "");
  const candidatePath = path.resolve(uiDistRoot, normalized);
  if (!candidatePath.startsWith(`${uiDistRoot}${path.sep}`)) {
    return false;
  }

  if (await sendStaticFile(res, candidatePath)) {
    return true;
  }
  if (pathname === "/" || pathname === "/index.html") {
    return sendStaticFile(res, path.resolve(uiDistRoot, "index.html"), {
      cacheControl: "no-store",
    });
  }
  return false;
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
    parsed = JSON.parse(raw) as unknown;
  } catch {
    throw createBadRequestError("body is not valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw createBadRequestError("body must be a JSON object");
  }
  return parsed as JsonObject;
}

function requireNumber(body: JsonObject, key: string): number {
  const value = body[key];
  if (typeof value !== "number") {
    throw createBadRequestError(`${key} must be a number`);
  }
  return value;
}

function requireString(body: JsonObject, key: string): string {
  const value = body[key];
  if (typeof value !== "string") {
    throw createBadRequestError(`${key} must be a string`);
  }
  return value;
}

function decodeCommentId(raw: string): string {
  let commentId: string;
  try {
    commentId = decodeURIComponent(raw);
  } catch {
    throw createBadRequestError("comment id is not valid");
  }
  if (commentId.trim() === "" || commentId.includes("/")) {
    throw createBadRequestError("comment id is required");
  }
  return commentId;
}

function parseCreateRequest(body: JsonObject): CreateCommentRequestDTO {
  return {
    start_line: requireNumber(body, "start_line"),
    end_line: requireNumber(body, "end_line"),
    body: requireString(body, "body"),
  };
}

function parseUpdateRequest(body: JsonObject): UpdateCommentRequestDTO {
  return { body: requireString(body, "body") };
}

export function fallbackPage(): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Line Review</title>
  <style>
    body { margin: 0; font-family: ui-sans-serif, -apple-system, Segoe UI, sans-serif; background: #f5f7fb; color: #0f172a; }
    .wrap { max-width: 960px; margin: 24px auto; padding: 0 16px; }
    .panel { background: #fff; border-radius: 12px; padding: 16px; margin-bottom: 12px; box-shadow: 0 6px 30px rgba(15,23,42,.08); }
    .stale { background: #fef3c7; }
    pre { white-space: pre-wrap; margin: 0; }
    input, textarea { font: inherit; box-sizing: border-box; }
    textarea { width: 100%; min-height: 72px; }
    button { border: 0; border-radius: 8px; padding: 8px 12px; cursor: pointer; background: #0f766e; color: #fff; }
  </style>
</head>
<body>
  <div class="wrap">
    <div id="stale" class="panel stale" hidden></div>
    <div class="panel"><h1 id="title">Line Review</h1><pre id="doc"></pre></div>
    <div class="panel">
      <label>Lines <input id="start" type="number" min="1" value="1" /> - <input id="end" type="number" min="1" value="1" /></label>
      <textarea id="body" placeholder="Comment"></textarea>
      <button id="add">Add comment</button>
      <button id="finish">Finish review</button>
      <div id="error"></div>
    </div>
    <div class="panel"><ul id="comments"></ul></div>
  </div>
  <script>
    async function jsonFetch(url, init) {
      const res = await fetch(url, init);
      const data = await res.json().catch(() => ({}));
      if (!res.ok) throw new Error(data.message || ("HTTP " + res.status));
      return data;
    }
    async function refresh() {
      const doc = await jsonFetch("/api/document");
      document.getElementById("title").textContent = doc.filename;
      document.getElementById("doc").textContent = doc.content.split("\\n").map((l, i) => String(i + 1).padStart(4) + "  " + l).join("\\n");
      const stale = await jsonFetch("/api/stale");
      const staleBox = document.getElementById("stale");
      staleBox.hidden = !stale.notice;
      staleBox.textContent = stale.notice;
      const comments = await jsonFetch("/api/comments");
      const list = document.getElementById("comments");
      list.innerHTML = "";
      for (const c of comments) {
        const li = document.createElement("li");
        li.textContent = "L" + c.start_line + "-" + c.end_line + ": " + c.body + " ";
        const del = document.createElement("button");
        del.textContent = "Delete";
        del.onclick = async () => { await jsonFetch("/api/comments/" + encodeURIComponent(c.id), { method: "DELETE" }); await refresh(); };
        li.appendChild(del);
        list.appendChild(li);
      }
    }
    document.getElementById("add").onclick = async () => {
      document.getElementById("error").textContent = "";
      try {
        await jsonFetch("/api/comments", {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({
            start_line: Number(document.getElementById("start").value),
            end_line: Number(document.getElementById("end").value),
            body: document.getElementById("body").value,
          }),
        });
        document.getElementById("body").value = "";
        await refresh();
      } catch (error) {
        document.getElementById("error").textContent = error.message;
      }
    };
    document.getElementById("finish").onclick = async () => {
      const data = await jsonFetch("/api/finish", { method: "POST" });
      document.getElementById("error").textContent = "Review written to " + data.review_file;
    };
    refresh();
  </script>
</body>
</html>
`;
}

export function createReviewServer(options: ReviewServerOptions): http.Server {
  const { session } = options;
  const logger = options.logger ?? console;
  const uiDistRoot = resolveUiDistPath(options.uiDistDir);

  return http.createServer(async (req, res) => {
    const method = req.method ?? "GET";
    const requestUrl = new URL(req.url ?? "/", "http://127.0.0.1");
    const pathname = requestUrl.pathname;

    try {
      if (pathname === "/api/document") {
        if (method !== "GET") {
          sendMethodNotAllowed(res, ["GET"]);
          return;
        }
        sendJson(res, 200, mapDocumentToDTO(session.getDocument()));
        return;
      }

      if (pathname === "/api/stale") {
        if (method === "GET") {
          const notice: StaleNoticeDTO = { notice: session.getStaleNotice() };
          sendJson(res, 200, notice);
          return;
        }
        if (method === "DELETE") {
          session.clearStaleNotice();
          sendJson(res, 200, statusPayload("ok"));
          return;
        }
        sendMethodNotAllowed(res, ["GET", "DELETE"]);
        return;
      }

      if (pathname === COMMENTS_PATH) {
        if (method === "GET") {
          sendJson(res, 200, mapCommentsToDTO(session.getComments()));
          return;
        }
        if (method === "POST") {
          const request = parseCreateRequest(await readJsonBody(req));
          const created = session.addComment(request.start_line, request.end_line, request.body);
          sendJson(res, 201, mapCommentToDTO(created));
          return;
        }
        sendMethodNotAllowed(res, ["GET", "POST"]);
        return;
      }

      if (pathname.startsWith(COMMENT_BY_ID_PREFIX)) {
        const commentId = decodeCommentId(pathname.slice(COMMENT_BY_ID_PREFIX.length));
        if (method === "PUT") {
          const request = parseUpdateRequest(await readJsonBody(req));
          const updated = session.updateComment(commentId, request.body);
          sendJson(res, 200, mapCommentToDTO(updated));
          return;
        }
        if (method === "DELETE") {
          if (!session.deleteComment(commentId)) {
            throw new CommentNotFoundError(commentId);
          }
          sendJson(res, 200, statusPayload("deleted"));
          return;
        }
        sendMethodNotAllowed(res, ["PUT", "DELETE"]);
        return;
      }

      if (pathname === "/api/finish") {
        if (method !== "POST") {
          sendMethodNotAllowed(res, ["POST"]);
          return;
        }
        const result = await session.finish();
        const payload: FinishResultDTO = {
          status: "finished",
          review_file: result.reviewFilePath,
        };
        res.once("finish", () => {
          logger.log("[web] finish requested; shutting down");
          options.onFinish?.();
        });
        sendJson(res, 200, payload);
        return;
      }

      if (method === "GET" && !pathname.startsWith("/api/")) {
        if (await tryServeUiAsset(res, pathname, uiDistRoot)) {
          return;
        }
        if (pathname === "/" || pathname === "/index.html") {
          sendHtml(res, fallbackPage());
          return;
        }
      }

      sendText(res, 404, "Not Found");
    } catch (error) {
      const runtimeError = toRuntimeError(error);
      if (runtimeError.httpStatus >= 500) {
        logger.warn(`[web] ${method} ${pathname} failed: ${runtimeError.message}`);
      }
      const payload: WebErrorDTO = runtimeError.toPayload();
      sendJson(res, runtimeError.httpStatus, payload);
    }
  });
}

export function startWebServer(options: StartWebServerOptions): Promise<StartedWebServer> {
  const host = options.host ?? DEFAULT_HOST;
  const logger = options.logger ?? console;
  const server = createReviewServer(options);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 0, host, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      const url = `http://${host === DEFAULT_HOST ? "localhost" : host}:${String(port)}`;
      logger.log(`[web] review listening on ${url}`);
      resolve({ server, url, port });
    });
  });
}
