import type http from "node:http";
import WebSocket, { WebSocketServer } from "ws";
import {
  ConnectionParamsSchema,
  parseLanguagePreference,
  safeParseClientMessage,
  safeParseServerMessage,
  type ErrorKind,
  type LanguagePreference,
  type ServerToClientMessage,
} from "@streamscribe/shared";
import { StreamscribeError, errorMessage } from "../errors.js";
import type { SessionCoordinator } from "../session/sessionCoordinator.js";
import type { SessionRegistry } from "../session/sessionRegistry.js";
import { base64ToUint8Array } from "../util/base64.js";
import { createLogger, type Logger } from "../util/logger.js";

const log = createLogger("ws");

/** What the connection handler needs from a socket; `ws` in production, a fake in tests. */
export type ClientSocket = {
  send: (data: string) => void;
  close: (code: number, reason?: string) => void;
  isOpen: () => boolean;
};

export type ConnectionHandler = {
  session: SessionCoordinator;
  onMessage: (data: WebSocket.RawData | string, isBinary: boolean) => void;
  onClose: () => void;
};

function safeJsonParse(input: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(input) as unknown };
  } catch {
    return { ok: false };
  }
}

function toText(data: WebSocket.RawData | string): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return "";
}

function toBytes(data: WebSocket.RawData | string): Uint8Array {
  if (typeof data === "string") return new Uint8Array(Buffer.from(data, "utf8"));
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function sendTo(socket: ClientSocket, msg: ServerToClientMessage): boolean {
  const parsed = safeParseServerMessage(msg);
  if (!parsed.success) {
    log.error("refusing to send message that fails the protocol schema", {
      type: msg.type,
      issues: parsed.error.issues.map((i) => i.message),
    });
    return false;
  }
  if (!socket.isOpen()) return false;
  try {
    socket.send(JSON.stringify(parsed.data));
    return true;
  } catch (err) {
    log.warn("socket send failed", { type: msg.type, error: errorMessage(err) });
    return false;
  }
}

function sendError(socket: ClientSocket, kind: ErrorKind, message: string) {
  sendTo(socket, { type: "error", kind, message });
}

function closeSocket(socket: ClientSocket, code: number, reason: string) {
  try {
    socket.close(code, reason);
  } catch (err) {
    log.debug("socket close failed", { error: errorMessage(err) });
  }
}

/**
 * Bind one socket to a fresh session. Returns null (after telling the client
 * why and closing) when the connection parameters are unusable.
 */
export function handleConnection(args: {
  socket: ClientSocket;
  query: URLSearchParams;
  registry: SessionRegistry;
  supportedLanguages: readonly LanguagePreference[];
  logger?: Logger;
}): ConnectionHandler | null {
  const { socket, registry } = args;
  const logger = args.logger ?? log;

  const params = ConnectionParamsSchema.safeParse(Object.fromEntries(args.query));
  if (!params.success) {
    sendError(socket, "invalid_message", `Invalid connection parameters: ${params.error.issues[0]?.message ?? "unknown"}`);
    closeSocket(socket, 1008, "invalid_parameters");
    return null;
  }

  const language = parseLanguagePreference(params.data.language);
  if (!language || !args.supportedLanguages.includes(language)) {
    sendError(
      socket,
      "unsupported_language",
      `Unsupported language "${params.data.language}". Expected one of: ${args.supportedLanguages.join(", ")}.`,
    );
    closeSocket(socket, 1008, "unsupported_language");
    return null;
  }

  let fatal = false;
  const session = registry.create({
    language,
    inputFormat: {
      encoding: params.data.encoding,
      sampleRateHz: params.data.sample_rate,
      channels: params.data.channels,
    },
    emit: (msg) => {
      sendTo(socket, msg);
      if (msg.type === "error" && msg.kind === "session_fatal") fatal = true;
      // Whatever ended the session, the connection goes with it.
      if (msg.type === "stopped" && socket.isOpen()) closeSocket(socket, fatal ? 1011 : 1000, msg.reason);
    },
  });

  sendTo(socket, {
    type: "connected",
    session_id: session.id,
    message: "Connected. Send audio as binary frames or audio_chunk messages.",
    supported_languages: [...args.supportedLanguages],
  });

  function stopSession(reason: string) {
    session.stop(reason).catch((err: unknown) => {
      logger.error("session stop failed", { sessionId: session.id, error: errorMessage(err) });
      closeSocket(socket, 1011, "stop_failed");
    });
  }

  function ingest(bytes: Uint8Array) {
    const outcome = session.ingest(bytes);
    if (!outcome.accepted && outcome.reason === "draining") {
      logger.debug("audio after stop ignored", { sessionId: session.id });
    }
  }

  function onMessage(data: WebSocket.RawData | string, isBinary: boolean) {
    try {
      if (isBinary) {
        ingest(toBytes(data));
        return;
      }

      const parsedJson = safeJsonParse(toText(data));
      if (!parsedJson.ok) {
        sendError(socket, "invalid_message", "Message must be valid JSON.");
        return;
      }

      const parsedMsg = safeParseClientMessage(parsedJson.value);
      if (!parsedMsg.success) {
        sendError(socket, "invalid_message", "Message does not match protocol schema.");
        return;
      }

      const msg = parsedMsg.data;
      switch (msg.type) {
        case "audio_chunk":
          ingest(base64ToUint8Array(msg.data));
          return;
        case "change_language":
          session.changeLanguage(msg.language);
          return;
        case "ping":
          session.touch();
          sendTo(socket, { type: "pong", timestamp: Date.now() });
          return;
        case "stop":
          stopSession(msg.reason ?? "client_stop");
          return;
      }
    } catch (err) {
      if (err instanceof StreamscribeError) {
        sendError(socket, err.code, err.message);
        return;
      }
      logger.error("unexpected error handling message", { sessionId: session.id, error: errorMessage(err) });
      sendError(socket, "invalid_message", "Message could not be processed.");
    }
  }

  function onClose() {
    if (session.status !== "active") return;
    session.stop("connection_closed").catch((err: unknown) => {
      logger.error("session stop failed", { sessionId: session.id, error: errorMessage(err) });
    });
  }

  return { session, onMessage, onClose };
}

export type WsServerApi = {
  wss: WebSocketServer;
  close: () => Promise<void>;
};

export function createWsServer(args: {
  server: http.Server;
  path: string;
  registry: SessionRegistry;
  supportedLanguages: readonly LanguagePreference[];
}): WsServerApi {
  const wss = new WebSocketServer({ server: args.server, path: args.path });

  wss.on("connection", (ws, req) => {
    const query = new URL(req.url ?? "/", "http://localhost").searchParams;
    const socket: ClientSocket = {
      send: (data) => ws.send(data),
      close: (code, reason) => ws.close(code, reason),
      isOpen: () => ws.readyState === WebSocket.OPEN,
    };

    const handler = handleConnection({
      socket,
      query,
      registry: args.registry,
      supportedLanguages: args.supportedLanguages,
    });
    if (!handler) return;

    log.info("client connected", { sessionId: handler.session.id, remote: req.socket.remoteAddress });
    ws.on("message", (data, isBinary) => handler.onMessage(data, isBinary));
    ws.on("close", () => handler.onClose());
    ws.on("error", (err) => {
      log.warn("socket error", { sessionId: handler.session.id, error: err.message });
      handler.onClose();
    });
  });

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
