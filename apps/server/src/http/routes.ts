import type http from "node:http";
import type { DispatcherStats } from "../recognition/dispatcher.js";
import type { TranscriptSink } from "../persistence/transcriptSink.js";
import type { SessionRegistry } from "../session/sessionRegistry.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("http");

export type RouteResponse = { status: number; body: unknown };

const HISTORY_PREFIX = "/api/transcription-history/";

/**
 * Pure routing over method + path, kept apart from `node:http` so it can be
 * exercised without a listening server.
 */
export function createRouter(args: {
  registry: Pick<SessionRegistry, "size" | "stats">;
  dispatcherStats: () => DispatcherStats;
  sink: TranscriptSink;
  now?: () => number;
}) {
  const now = args.now ?? Date.now;

  return async function route(method: string, rawUrl: string): Promise<RouteResponse> {
    const { pathname } = new URL(rawUrl, "http://localhost");

    if (method !== "GET") return { status: 404, body: { error: "Not found" } };

    if (pathname === "/api/health") {
      return {
        status: 200,
        body: {
          status: "healthy",
          active_sessions: args.registry.size(),
          sessions: args.registry.stats(),
          dispatcher: args.dispatcherStats(),
          timestamp: now(),
        },
      };
    }

    if (pathname.startsWith(HISTORY_PREFIX)) {
      const sessionId = decodeURIComponent(pathname.slice(HISTORY_PREFIX.length));
      if (!sessionId || !args.sink.readSession) {
        return { status: 404, body: { error: "Transcription history is not available." } };
      }
      const records = await args.sink.readSession(sessionId);
      return { status: 200, body: { session_id: sessionId, transcriptions: records } };
    }

    return { status: 404, body: { error: "Not found" } };
  };
}

function json(res: http.ServerResponse, status: number, body: unknown) {
  const payload = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(payload));
  res.end(payload);
}

function withCors(res: http.ServerResponse) {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET,OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}

export function createRequestListener(route: ReturnType<typeof createRouter>): http.RequestListener {
  return (req, res) => {
    withCors(res);

    if (req.method === "OPTIONS") {
      res.statusCode = 204;
      res.end();
      return;
    }

    route(req.method ?? "GET", req.url ?? "/")
      .then(({ status, body }) => json(res, status, body))
      .catch((err: unknown) => {
        log.error("request failed", { url: req.url, error: errorMessage(err) });
        json(res, 500, { error: errorMessage(err) });
      });
  };
}
