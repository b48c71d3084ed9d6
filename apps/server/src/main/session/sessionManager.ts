import { randomUUID } from "node:crypto";
import { SessionNotFoundError } from "../../shared/errors";
import type { DetectionResult } from "../../shared/detection/result-schema";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import type { WorkerResolver } from "../../shared/types/identity";
import type {
  SessionOptions,
  SessionStore,
  SessionSettingsUpdate,
  SessionSummary,
} from "../../shared/types/session";
import type { PipelineConfig } from "../../worker/config/pipeline-config";
import { type TrackIdGenerator, createTrackIdGenerator } from "../../worker/tracking/track-ids";
import type { AlertDispatcher } from "../alerts/dispatcher";
import type { ViolationRecorder } from "../violations/recorder";
import {
  type FrameDetector,
  type StopOptions,
  StreamSession,
} from "./streamSession";

export type SessionManagerOptions = {
  config: PipelineConfig;
  detector: FrameDetector;
  recorder: ViolationRecorder;
  sessions: SessionStore;
  dispatcher?: AlertDispatcher | null;
  resolver?: WorkerResolver;
  ids?: TrackIdGenerator;
  logger?: Logger;
  createId?: () => string;
};

const FINISHED_SESSION_LIMIT = 100;

/** Owns the live sessions of this process and their persisted rows. */
export class SessionManager {
  private readonly options: SessionManagerOptions;

  private readonly ids: TrackIdGenerator;

  private readonly logger: Logger;

  private readonly createId: () => string;

  private readonly live = new Map<string, StreamSession>();

  /** Recently closed sessions, kept so late frames get a clear answer. */
  private readonly finished = new Map<string, StreamSession>();

  constructor(options: SessionManagerOptions) {
    this.options = options;
    this.ids = options.ids ?? createTrackIdGenerator();
    this.logger = options.logger ?? getLogger("session-manager", "server");
    this.createId = options.createId ?? randomUUID;
  }

  get size(): number {
    return this.live.size;
  }

  createSession(sessionOptions: SessionOptions = {}): SessionSummary {
    const sessionId = this.createId();
    const session = new StreamSession({
      sessionId,
      options: sessionOptions,
      config: this.options.config,
      detector: this.options.detector,
      recorder: this.options.recorder,
      dispatcher: this.options.dispatcher,
      resolver: this.options.resolver,
      ids: this.ids,
      onClosed: (summary, failure) => this.handleClosed(summary, failure),
    });

    // The row goes in first: a session the store rejected never goes live.
    const startedAt = Date.now();
    this.options.sessions.createSession({
      sessionId,
      status: "active",
      cameraId: sessionOptions.cameraId ?? null,
      location: sessionOptions.location ?? null,
      startedAt,
      endedAt: null,
      frameCount: 0,
      skippedFrames: 0,
      violationCount: 0,
    });
    const summary = session.start(startedAt);
    this.live.set(sessionId, session);
    return summary;
  }

  async configureSession(
    sessionId: string,
    update: SessionSettingsUpdate,
  ): Promise<SessionSummary> {
    return this.require(sessionId).updateSettings(update);
  }

  getSession(sessionId: string): SessionSummary {
    return this.require(sessionId).summary();
  }

  listSessions(): SessionSummary[] {
    return [...this.live.values()].map((session) => session.summary());
  }

  async submitFrame(
    sessionId: string,
    frameId: string | null,
    image: Buffer,
    timestamp?: number | null,
  ): Promise<DetectionResult> {
    return this.require(sessionId).submitFrame({ frameId, image, timestamp });
  }

  async stopSession(sessionId: string, options: StopOptions = {}): Promise<SessionSummary> {
    return this.require(sessionId).stop(options);
  }

  async shutdown(options: StopOptions = {}): Promise<SessionSummary[]> {
    const sessions = [...this.live.values()];
    this.logger.info("Stopping sessions", { count: sessions.length });
    const results = await Promise.allSettled(sessions.map((session) => session.stop(options)));
    const summaries: SessionSummary[] = [];
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        summaries.push(result.value);
        return;
      }
      this.logger.error("Session did not stop cleanly", {
        sessionId: sessions[index]?.sessionId,
        error: toErrorPayload(result.reason),
      });
    });
    return summaries;
  }

  private require(sessionId: string): StreamSession {
    const session = this.live.get(sessionId) ?? this.finished.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private handleClosed(summary: SessionSummary, failure: Error | null): void {
    const session = this.live.get(summary.sessionId);
    this.live.delete(summary.sessionId);
    if (session) {
      this.finished.set(summary.sessionId, session);
      while (this.finished.size > FINISHED_SESSION_LIMIT) {
        const oldest = this.finished.keys().next();
        if (oldest.done) {
          break;
        }
        this.finished.delete(oldest.value);
      }
    }
    try {
      this.options.sessions.updateSession(summary.sessionId, {
        status: failure ? "error" : "completed",
        endedAt: summary.endedAt,
        frameCount: summary.frameCount,
        skippedFrames: summary.skippedFrames,
        violationCount: summary.violationCount,
      });
    } catch (error) {
      this.logger.error("Session row could not be updated", {
        sessionId: summary.sessionId,
        error: toErrorPayload(error),
      });
    }
  }
}
