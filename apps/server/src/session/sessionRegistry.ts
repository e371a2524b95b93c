import { AUTO_LANGUAGE, type LanguagePreference } from "@streamscribe/shared";
import type { InputFormat } from "../audio/decode.js";
import type { AudioConfig, RegistryConfig, SessionConfig } from "../config.js";
import { SessionNotFoundError, errorMessage } from "../errors.js";
import type { TranscriptSink } from "../persistence/transcriptSink.js";
import { newSessionId } from "../util/id.js";
import { createLogger, type Logger } from "../util/logger.js";
import { SessionCoordinator, type Emit, type SessionStatus, type WindowSubmitter } from "./sessionCoordinator.js";

export type RegistryStats = Record<SessionStatus, number> & { total: number };

export type SessionRegistry = {
  create: (args: { emit: Emit; language?: LanguagePreference; inputFormat?: Partial<InputFormat> }) => SessionCoordinator;
  get: (sessionId: string) => SessionCoordinator;
  find: (sessionId: string) => SessionCoordinator | undefined;
  has: (sessionId: string) => boolean;
  remove: (sessionId: string) => boolean;
  sweep: () => Promise<string[]>;
  startSweeper: () => void;
  close: (reason?: string) => Promise<void>;
  size: () => number;
  stats: () => RegistryStats;
};

/**
 * Owns every live `SessionCoordinator`, keyed by session id. Sessions remove
 * themselves when they close; idle ones are stopped by the periodic sweep.
 */
export function createSessionRegistry(args: {
  audio: AudioConfig;
  session: SessionConfig;
  registry: RegistryConfig;
  dispatcher: WindowSubmitter;
  sink?: TranscriptSink;
  now?: () => number;
  logger?: Logger;
}): SessionRegistry {
  const now = args.now ?? Date.now;
  const logger = args.logger ?? createLogger("SessionRegistry");
  const sessions = new Map<string, SessionCoordinator>();
  const sweeping = new Set<string>();
  let sweepTimer: NodeJS.Timeout | null = null;

  function create(opts: {
    emit: Emit;
    language?: LanguagePreference;
    inputFormat?: Partial<InputFormat>;
  }): SessionCoordinator {
    const session = new SessionCoordinator({
      id: newSessionId(),
      language: opts.language ?? AUTO_LANGUAGE,
      audio: args.audio,
      session: args.session,
      input: {
        encoding: opts.inputFormat?.encoding ?? "pcm_s16le",
        sampleRateHz: opts.inputFormat?.sampleRateHz ?? args.audio.sampleRateHz,
        channels: opts.inputFormat?.channels ?? 1,
      },
      dispatcher: args.dispatcher,
      emit: opts.emit,
      sink: args.sink,
      now,
      onClosed: (closed) => {
        sessions.delete(closed.id);
        sweeping.delete(closed.id);
      },
    });
    sessions.set(session.id, session);
    logger.info("session created", { sessionId: session.id, language: session.language, active: sessions.size });
    return session;
  }

  function find(sessionId: string) {
    return sessions.get(sessionId);
  }

  function get(sessionId: string) {
    const session = sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  function has(sessionId: string) {
    return sessions.has(sessionId);
  }

  function remove(sessionId: string) {
    const session = sessions.get(sessionId);
    if (!session || session.status !== "closed") return false;
    sessions.delete(sessionId);
    return true;
  }

  async function sweep(): Promise<string[]> {
    const cutoff = now() - args.registry.idleSessionTimeoutMs;
    const idle = [...sessions.values()].filter(
      (s) => s.status === "active" && s.lastActivityAt <= cutoff && !sweeping.has(s.id),
    );
    if (idle.length === 0) return [];

    logger.info("sweeping idle sessions", { count: idle.length });
    await Promise.all(
      idle.map(async (session) => {
        sweeping.add(session.id);
        try {
          await session.stop("idle_timeout");
        } finally {
          sweeping.delete(session.id);
          remove(session.id);
        }
      }),
    );
    return idle.map((s) => s.id);
  }

  function startSweeper() {
    if (sweepTimer) return;
    sweepTimer = setInterval(() => {
      sweep().catch((err: unknown) => {
        logger.error("sweep failed", { error: errorMessage(err) });
      });
    }, args.registry.sweepIntervalMs);
  }

  async function close(reason = "server_shutdown") {
    if (sweepTimer) {
      clearInterval(sweepTimer);
      sweepTimer = null;
    }
    const all = [...sessions.values()];
    await Promise.allSettled(all.map((s) => s.stop(reason)));
    sessions.clear();
    logger.info("registry closed", { stopped: all.length });
  }

  function stats(): RegistryStats {
    const out: RegistryStats = { active: 0, draining: 0, closed: 0, total: sessions.size };
    for (const session of sessions.values()) out[session.status] += 1;
    return out;
  }

  return {
    create,
    get,
    find,
    has,
    remove,
    sweep,
    startSweeper,
    close,
    size: () => sessions.size,
    stats,
  };
}
