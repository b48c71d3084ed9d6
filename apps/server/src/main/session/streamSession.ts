import { settlesWithin } from "../../shared/concurrency/timeout";
import {
  type DetectionResult,
  emptyDetectionResult,
} from "../../shared/detection/result-schema";
import {
  InvalidFrameError,
  PersistenceFailureError,
  SessionBusyError,
  SessionNotActiveError,
  isSiteWatchError,
} from "../../shared/errors";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import { resolveTimestamp } from "../../shared/time";
import type { DetectOptions, Frame, RawDetection } from "../../shared/types/detector";
import type { WorkerResolver } from "../../shared/types/identity";
import type {
  SessionOptions,
  SessionSettingsUpdate,
  SessionState,
  SessionSummary,
} from "../../shared/types/session";
import type { PipelineConfig } from "../../worker/config/pipeline-config";
import { ComplianceEngine, type FrameOutcome } from "../../worker/engine";
import type { TrackIdGenerator } from "../../worker/tracking/track-ids";
import type { AlertDispatcher } from "../alerts/dispatcher";
import type { RecorderFrame, ViolationRecorder } from "../violations/recorder";

const RECENT_FRAME_LIMIT = 256;

export type FrameDetector = {
  detect: (frame: Frame, options?: DetectOptions) => Promise<RawDetection[]>;
};

export type FrameSubmission = {
  /** Assigned as `<sessionId>-<seq>` when absent. */
  frameId?: string | null;
  image: Buffer;
  timestamp?: number | null;
};

export type StopOptions = {
  signal?: AbortSignal;
  drainTimeoutMs?: number;
};

export type StreamSessionOptions = {
  sessionId: string;
  options?: SessionOptions;
  config: PipelineConfig;
  detector: FrameDetector;
  recorder: ViolationRecorder;
  dispatcher?: AlertDispatcher | null;
  resolver?: WorkerResolver;
  ids?: TrackIdGenerator;
  logger?: Logger;
  onClosed?: (summary: SessionSummary, failure: Error | null) => void;
};

/**
 * One camera stream. Frames run one at a time in arrival order; a bounded
 * number may wait behind the one being processed.
 */
export class StreamSession {
  readonly sessionId: string;

  private readonly options: SessionOptions;

  private readonly config: PipelineConfig;

  private readonly detector: FrameDetector;

  private readonly recorder: ViolationRecorder;

  private readonly dispatcher: AlertDispatcher | null;

  private readonly engine: ComplianceEngine;

  private readonly logger: Logger;

  private readonly onClosed?: (summary: SessionSummary, failure: Error | null) => void;

  private state: SessionState = "idle";

  private tail: Promise<void> = Promise.resolve();

  private inFlight = 0;

  private cancelled = false;

  private closing: Promise<SessionSummary> | null = null;

  private failure: Error | null = null;

  private readonly recentFrameIds = new Set<string>();

  private readonly recentFrameOrder: string[] = [];

  private lastTimestamp: number | null = null;

  private frameSequence = 0;

  private startedAt: number | null = null;

  private endedAt: number | null = null;

  private frameCount = 0;

  private skippedFrames = 0;

  private violationCount = 0;

  private idleTimer: NodeJS.Timeout | null = null;

  constructor(options: StreamSessionOptions) {
    this.sessionId = options.sessionId;
    this.options = { ...(options.options ?? {}) };
    this.config = options.config;
    this.detector = options.detector;
    this.recorder = options.recorder;
    this.dispatcher = options.dispatcher ?? null;
    this.logger = options.logger ?? getLogger("stream-session", "server");
    this.onClosed = options.onClosed;
    this.engine = new ComplianceEngine({
      sessionId: options.sessionId,
      cameraId: this.options.cameraId ?? null,
      config: options.config,
      requiredPpe: this.options.requiredPpe,
      resolver: options.resolver,
      ids: options.ids,
      logger: this.logger,
    });
  }

  getState(): SessionState {
    return this.state;
  }

  get pendingFrames(): number {
    return this.inFlight;
  }

  start(startedAt = Date.now()): SessionSummary {
    if (this.state !== "idle") {
      throw new SessionNotActiveError(this.sessionId, this.state);
    }
    this.state = "active";
    this.startedAt = startedAt;
    this.armIdleTimer();
    this.logger.info("Session started", {
      sessionId: this.sessionId,
      cameraId: this.options.cameraId ?? null,
      location: this.options.location ?? null,
    });
    return this.summary();
  }

  /**
   * Changes the required items or confidence floor. Queued behind the frames
   * already submitted, so it takes effect from the next frame on.
   */
  updateSettings(update: SessionSettingsUpdate): Promise<SessionSummary> {
    if (this.state !== "active") {
      return Promise.reject(new SessionNotActiveError(this.sessionId, this.state));
    }
    const run = this.tail.then(() => {
      this.throwIfCancelled();
      this.applySettings(update);
      return this.summary();
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async submitFrame(submission: FrameSubmission): Promise<DetectionResult> {
    if (this.state !== "active") {
      throw new SessionNotActiveError(this.sessionId, this.state);
    }
    const providedId = submission.frameId?.trim() ?? "";
    if (submission.image.length === 0) {
      throw new InvalidFrameError("Frame image is empty", {
        sessionId: this.sessionId,
        frameId: providedId || null,
      });
    }
    if (providedId && this.recentFrameIds.has(providedId)) {
      throw new InvalidFrameError(`Duplicate frame ${providedId}`, {
        sessionId: this.sessionId,
        frameId: providedId,
        reason: "duplicate",
      });
    }
    if (this.inFlight >= this.config.session.maxInFlightFrames) {
      throw new SessionBusyError(this.sessionId, this.inFlight);
    }

    this.armIdleTimer();
    this.frameSequence += 1;
    const frameId = providedId || `${this.sessionId}-${this.frameSequence}`;
    this.rememberFrameId(frameId);
    const frame: Frame = {
      sessionId: this.sessionId,
      frameId,
      image: submission.image,
      capturedAt: this.clampTimestamp(submission.timestamp),
    };

    const run = this.tail.then(() => this.processFrame(frame));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.inFlight += 1;
    try {
      return await run;
    } finally {
      this.inFlight -= 1;
    }
  }

  /**
   * Waits for queued frames up to the drain timeout (or until `signal`
   * aborts), cancels whatever is left, then force-closes tracks and
   * violations. Safe to call more than once.
   */
  stop(options: StopOptions = {}): Promise<SessionSummary> {
    if (this.state === "closed") {
      return Promise.resolve(this.summary());
    }
    if (this.closing) {
      return this.closing;
    }
    this.state = "closing";
    this.closing = this.shutdown(options);
    return this.closing;
  }

  summary(): SessionSummary {
    return {
      sessionId: this.sessionId,
      state: this.state,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      frameCount: this.frameCount,
      skippedFrames: this.skippedFrames,
      violationCount: this.violationCount,
      activeTracks: this.engine.activeTrackCount,
      cameraId: this.options.cameraId ?? null,
      location: this.options.location ?? null,
      requiredPpe: this.options.requiredPpe ? [...this.options.requiredPpe] : null,
      confidenceFloor: this.options.confidenceFloor ?? null,
    };
  }

  getFailure(): Error | null {
    return this.failure;
  }

  private rememberFrameId(frameId: string): void {
    this.recentFrameIds.add(frameId);
    this.recentFrameOrder.push(frameId);
    while (this.recentFrameOrder.length > RECENT_FRAME_LIMIT) {
      const oldest = this.recentFrameOrder.shift();
      if (oldest !== undefined) {
        this.recentFrameIds.delete(oldest);
      }
    }
  }

  private applySettings(update: SessionSettingsUpdate): void {
    if (update.confidenceFloor !== undefined) {
      this.options.confidenceFloor = update.confidenceFloor;
    }
    if (update.requiredPpe !== undefined) {
      this.options.requiredPpe = [...update.requiredPpe];
      this.engine.setRequiredPpe(update.requiredPpe, this.lastTimestamp ?? Date.now());
    }
    this.logger.info("Session settings updated", {
      sessionId: this.sessionId,
      requiredPpe: this.options.requiredPpe ?? null,
      confidenceFloor: this.options.confidenceFloor ?? null,
    });
  }

  /** Closes the session when no frame arrives for `idleTimeoutMs`. */
  private armIdleTimer(): void {
    this.clearIdleTimer();
    const timeoutMs = this.config.session.idleTimeoutMs;
    if (timeoutMs <= 0 || this.state !== "active") {
      return;
    }
    this.idleTimer = setTimeout(() => this.handleIdle(timeoutMs), timeoutMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private handleIdle(timeoutMs: number): void {
    this.idleTimer = null;
    if (this.state !== "active") {
      return;
    }
    if (this.inFlight > 0) {
      this.armIdleTimer();
      return;
    }
    this.logger.info("Session idle, closing", {
      sessionId: this.sessionId,
      idleTimeoutMs: timeoutMs,
    });
    this.stop().catch((error: unknown) => {
      this.logger.error("Idle session teardown failed", {
        sessionId: this.sessionId,
        error: toErrorPayload(error),
      });
    });
  }

  private clampTimestamp(value: number | null | undefined): number {
    let timestamp = resolveTimestamp(value);
    if (this.lastTimestamp !== null && timestamp < this.lastTimestamp) {
      timestamp = this.lastTimestamp;
    }
    this.lastTimestamp = timestamp;
    return timestamp;
  }

  private throwIfCancelled(): void {
    if (this.cancelled) {
      throw new SessionNotActiveError(this.sessionId, this.state);
    }
  }

  private async processFrame(frame: Frame): Promise<DetectionResult> {
    this.throwIfCancelled();

    let detections: RawDetection[];
    try {
      detections = await this.detector.detect(frame, {
        confidenceFloor: this.options.confidenceFloor,
      });
    } catch (error) {
      if (isSiteWatchError(error, "DETECTION_UNAVAILABLE")) {
        throw error;
      }
      this.frameCount += 1;
      this.skippedFrames += 1;
      this.logger.warn("Frame skipped", {
        sessionId: this.sessionId,
        frameId: frame.frameId,
        error: toErrorPayload(error),
      });
      return emptyDetectionResult(frame.frameId);
    }

    this.throwIfCancelled();
    const outcome = await this.engine.process({
      sessionId: this.sessionId,
      frameId: frame.frameId,
      timestamp: frame.capturedAt,
      image: frame.image,
      detections,
    });
    this.throwIfCancelled();

    outcome.events.forEach((event) => {
      this.logger.info("Compliance changed", {
        sessionId: event.sessionId,
        trackId: event.trackId,
        workerId: event.workerId,
        from: event.from,
        to: event.to,
        frameId: event.frameId,
        nonCompliantItems: event.nonCompliantItems,
      });
    });

    try {
      await this.recordOutcome(outcome, frame);
    } catch (error) {
      if (error instanceof PersistenceFailureError) {
        this.fail(error);
      }
      throw error;
    }
    this.throwIfCancelled();

    this.frameCount += 1;
    return outcome.result;
  }

  private async recordOutcome(outcome: FrameOutcome, frame: Frame): Promise<void> {
    const recorderFrame: RecorderFrame = {
      sessionId: this.sessionId,
      frameId: frame.frameId,
      timestamp: outcome.timestamp,
      image: frame.image,
    };

    for (const track of outcome.seen) {
      const changes = await this.recorder.recordTrack(track, recorderFrame);
      this.violationCount += changes.opened.length;
      [...changes.opened, ...changes.updated].forEach((record) => {
        this.dispatcher?.schedule(record, outcome.timestamp);
      });
    }

    for (const expired of outcome.expired) {
      await this.recorder.closeTrack(
        this.sessionId,
        expired.trackId,
        outcome.timestamp,
        "track-expired",
      );
    }
  }

  private fail(error: PersistenceFailureError): void {
    if (this.state !== "active") {
      return;
    }
    this.failure = error;
    this.cancelled = true;
    this.logger.fatal("Session failed", {
      sessionId: this.sessionId,
      error: toErrorPayload(error),
    });
    this.state = "closing";
    this.closing = this.shutdown({});
    this.closing.catch((shutdownError: unknown) => {
      this.logger.error("Session teardown failed", {
        sessionId: this.sessionId,
        error: toErrorPayload(shutdownError),
      });
    });
  }

  private async shutdown(options: StopOptions): Promise<SessionSummary> {
    this.clearIdleTimer();
    const drainTimeoutMs = options.drainTimeoutMs ?? this.config.session.drainTimeoutMs;
    const drained = await settlesWithin(this.tail, drainTimeoutMs, options.signal);
    if (!drained) {
      this.cancelled = true;
      this.logger.warn("Session drain cut short", {
        sessionId: this.sessionId,
        pendingFrames: this.inFlight,
        aborted: options.signal?.aborted ?? false,
      });
    }

    const endedAt = this.lastTimestamp ?? Date.now();
    const tracks = this.engine.clear();
    try {
      const closed = await this.recorder.closeSession(this.sessionId, endedAt);
      this.logger.info("Session violations closed", {
        sessionId: this.sessionId,
        tracks: tracks.length,
        violations: closed.length,
      });
    } catch (error) {
      this.failure = this.failure ?? (error instanceof Error ? error : new Error(String(error)));
      this.logger.error("Open violations could not be closed", {
        sessionId: this.sessionId,
        error: toErrorPayload(error),
      });
    }

    if (this.dispatcher && !options.signal?.aborted) {
      await settlesWithin(this.dispatcher.drain(), drainTimeoutMs, options.signal);
    }

    this.state = "closed";
    this.endedAt = Date.now();
    const summary = this.summary();
    this.logger.info("Session closed", { ...summary, failed: this.failure !== null });
    this.onClosed?.(summary, this.failure);
    return summary;
  }
}
