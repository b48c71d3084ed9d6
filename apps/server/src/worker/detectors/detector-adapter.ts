import { BoundedPool } from "../../shared/concurrency/bounded-pool";
import { withTimeout } from "../../shared/concurrency/timeout";
import {
  DetectionUnavailableError,
  DetectorSaturatedError,
  InferenceTimeoutError,
  isSiteWatchError,
} from "../../shared/errors";
import { normalisePixelBox } from "../../shared/geometry/box";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import { getMonotonicTime } from "../../shared/time";
import type {
  DetectOptions,
  DetectorHealth,
  DetectorHealthState,
  DetectorStats,
  Frame,
  ModelOutput,
  ModelRuntime,
  RawDetection,
} from "../../shared/types/detector";
import type { DetectorConfig } from "../config/pipeline-config";
import { ConfidenceGate } from "../processing/confidence-gate";
import { labelForClass } from "./class-map";

export type DetectorAdapterOptions = {
  runtime: ModelRuntime;
  config: DetectorConfig;
  logger?: Logger;
};

/** Maps raw model output to canonical detections without any filtering. */
export const normaliseModelOutput = (output: ModelOutput): RawDetection[] => {
  const detections: RawDetection[] = [];
  output.boxes.forEach((raw) => {
    const label = labelForClass(raw.classId);
    if (!label) {
      return;
    }
    const box = normalisePixelBox(
      raw.x1,
      raw.y1,
      raw.x2,
      raw.y2,
      output.width,
      output.height,
    );
    if (!box) {
      return;
    }
    detections.push({
      label,
      confidence: Number.isFinite(raw.confidence)
        ? Math.min(1, Math.max(0, raw.confidence))
        : 0,
      box,
    });
  });
  return detections;
};

/**
 * Process-wide handle on the detection capability. One instance is created at
 * startup and passed into every session; inference calls from different
 * sessions share a bounded pool.
 */
export class DetectorAdapter {
  private readonly runtime: ModelRuntime;

  private readonly config: DetectorConfig;

  private readonly logger: Logger;

  private readonly gate: ConfidenceGate;

  private readonly pool: BoundedPool;

  private state: DetectorHealthState = "unloaded";

  private lastError: string | null = null;

  private pendingLoad: Promise<void> | null = null;

  private readonly stats: DetectorStats = {
    inferences: 0,
    failures: 0,
    timeouts: 0,
    rejected: 0,
    lastDurationMs: null,
    meanDurationMs: null,
  };

  constructor(options: DetectorAdapterOptions) {
    this.runtime = options.runtime;
    this.config = { ...options.config };
    this.logger = options.logger ?? getLogger("detector-adapter", "pipeline");
    this.gate = new ConfidenceGate(this.config.confidenceFloor);
    this.pool = new BoundedPool({
      concurrency: this.config.maxConcurrentInferences,
      maxQueued: this.config.maxQueuedInferences,
      onSaturated: (queued) => new DetectorSaturatedError(queued),
    });
  }

  initialize(): Promise<void> {
    if (this.state === "ready") {
      return Promise.resolve();
    }

    if (!this.pendingLoad) {
      this.state = "loading";
      this.pendingLoad = this.runtime
        .load()
        .then(() => {
          this.state = "ready";
          this.lastError = null;
          this.logger.info("Detection runtime loaded", {
            runtime: this.runtime.name,
          });
        })
        .catch((error: unknown) => {
          this.state = "failed";
          this.lastError = toErrorPayload(error).message;
          this.logger.error("Detection runtime failed to load", {
            runtime: this.runtime.name,
            error: toErrorPayload(error),
          });
          throw new DetectionUnavailableError(this.lastError, { cause: error });
        })
        .finally(() => {
          this.pendingLoad = null;
        });
    }

    return this.pendingLoad;
  }

  isReady(): boolean {
    return this.state === "ready";
  }

  health(): DetectorHealth {
    return {
      runtime: this.runtime.name,
      state: this.state,
      lastError: this.lastError,
      inFlight: this.pool.inFlight,
      queued: this.pool.queued,
      stats: { ...this.stats },
    };
  }

  async detect(frame: Frame, options: DetectOptions = {}): Promise<RawDetection[]> {
    if (this.state !== "ready") {
      throw new DetectionUnavailableError(
        this.lastError ?? `runtime ${this.runtime.name} is ${this.state}`,
      );
    }

    const floor = options.confidenceFloor ?? this.config.confidenceFloor;

    let output: ModelOutput;
    try {
      output = await withTimeout(
        (signal) => this.pool.run(() => this.infer(frame, signal), signal),
        this.config.inferenceTimeoutMs,
        () => new InferenceTimeoutError(this.config.inferenceTimeoutMs),
      );
    } catch (error) {
      this.recordFailure(frame, error);
      throw error;
    }

    return this.gate.filter(normaliseModelOutput(output), floor);
  }

  async dispose(): Promise<void> {
    this.state = "unloaded";
    await this.runtime.dispose();
  }

  private async infer(frame: Frame, signal: AbortSignal): Promise<ModelOutput> {
    const start = getMonotonicTime();
    const output = await this.runtime.infer(frame.image, signal);
    const durationMs = getMonotonicTime() - start;

    this.stats.inferences += 1;
    this.stats.lastDurationMs = durationMs;
    this.stats.meanDurationMs =
      this.stats.meanDurationMs === null
        ? durationMs
        : this.stats.meanDurationMs +
          (durationMs - this.stats.meanDurationMs) / this.stats.inferences;

    return output;
  }

  private recordFailure(frame: Frame, error: unknown): void {
    if (isSiteWatchError(error, "INFERENCE_TIMEOUT")) {
      this.stats.timeouts += 1;
      this.logger.warn("Inference timed out", {
        sessionId: frame.sessionId,
        frameId: frame.frameId,
        timeoutMs: this.config.inferenceTimeoutMs,
      });
      return;
    }
    if (isSiteWatchError(error, "DETECTOR_SATURATED")) {
      this.stats.rejected += 1;
      this.logger.warn("Inference queue saturated", {
        sessionId: frame.sessionId,
        frameId: frame.frameId,
        queued: this.pool.queued,
      });
      return;
    }
    this.stats.failures += 1;
    this.logger.error("Inference failed", {
      sessionId: frame.sessionId,
      frameId: frame.frameId,
      error: toErrorPayload(error),
    });
  }
}
