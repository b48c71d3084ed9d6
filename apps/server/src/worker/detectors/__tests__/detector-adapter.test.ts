import { describe, expect, it, vi } from "vitest";
import {
  DetectionUnavailableError,
  DetectorSaturatedError,
  InferenceTimeoutError,
} from "../../../shared/errors";
import type { Logger } from "../../../shared/logger";
import type { Frame, ModelOutput, ModelRuntime } from "../../../shared/types/detector";
import {
  DEFAULT_PIPELINE_CONFIG,
  type DetectorConfig,
} from "../../config/pipeline-config";
import { DetectorAdapter, normaliseModelOutput } from "../detector-adapter";
import { ReplayModelRuntime } from "../replayRuntime";

const FRAME: Frame = {
  sessionId: "session-1",
  frameId: "f-1",
  image: Buffer.from([0xff, 0xd8]),
  capturedAt: 1_000,
};

const OUTPUT: ModelOutput = {
  width: 1000,
  height: 500,
  boxes: [
    { classId: 2, confidence: 0.9, x1: 100, y1: 50, x2: 300, y2: 450 },
    { classId: 4, confidence: 0.4, x1: 120, y1: 150, x2: 280, y2: 250 },
    { classId: 9, confidence: 0.99, x1: 0, y1: 0, x2: 10, y2: 10 },
  ],
};

const createLoggerStub = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  flush: vi.fn(async () => undefined),
});

const detectorConfig = (overrides: Partial<DetectorConfig> = {}): DetectorConfig => ({
  ...DEFAULT_PIPELINE_CONFIG.detector,
  ...overrides,
});

const stubRuntime = (infer: ModelRuntime["infer"]): ModelRuntime => ({
  name: "StubRuntime",
  load: async () => undefined,
  infer,
  dispose: async () => undefined,
});

describe("normaliseModelOutput", () => {
  it("maps class ids to labels and pixels to normalised boxes", () => {
    const detections = normaliseModelOutput(OUTPUT);

    expect(detections.map((detection) => detection.label)).toEqual(["person", "vest"]);
    expect(detections[0]?.box.x).toBe(0.1);
    expect(detections[0]?.box.y).toBe(0.1);
    expect(detections[0]?.box.width).toBeCloseTo(0.2, 10);
    expect(detections[0]?.box.height).toBeCloseTo(0.8, 10);
    expect(detections[1]?.confidence).toBe(0.4);
  });

  it("drops degenerate boxes and clamps confidence", () => {
    const detections = normaliseModelOutput({
      width: 100,
      height: 100,
      boxes: [
        { classId: 1, confidence: 1.7, x1: 60, y1: 10, x2: 20, y2: 40 },
        { classId: 1, confidence: 0.8, x1: 30, y1: 30, x2: 30, y2: 60 },
      ],
    });

    expect(detections).toHaveLength(1);
    expect(detections[0]?.confidence).toBe(1);
    expect(detections[0]?.box.x).toBeCloseTo(0.2, 10);
    expect(detections[0]?.box.width).toBeCloseTo(0.4, 10);
  });
});

describe("DetectorAdapter", () => {
  it("is unavailable until the runtime has loaded", async () => {
    const adapter = new DetectorAdapter({
      runtime: new ReplayModelRuntime({
        recording: { width: OUTPUT.width, height: OUTPUT.height, frames: [{ boxes: OUTPUT.boxes }] },
      }),
      config: detectorConfig(),
      logger: createLoggerStub(),
    });

    await expect(adapter.detect(FRAME)).rejects.toBeInstanceOf(DetectionUnavailableError);
    expect(adapter.health().state).toBe("unloaded");

    await adapter.initialize();
    expect(adapter.isReady()).toBe(true);
  });

  it("drops detections under the confidence floor unless the call lowers it", async () => {
    const adapter = new DetectorAdapter({
      runtime: stubRuntime(async () => OUTPUT),
      config: detectorConfig({ confidenceFloor: 0.5 }),
      logger: createLoggerStub(),
    });
    await adapter.initialize();

    const filtered = await adapter.detect(FRAME);
    const lowered = await adapter.detect(FRAME, { confidenceFloor: 0.3 });

    expect(filtered.map((detection) => detection.label)).toEqual(["person"]);
    expect(lowered.map((detection) => detection.label)).toEqual(["person", "vest"]);
    expect(adapter.health().stats.inferences).toBe(2);
  });

  it("reports a load failure as unavailable", async () => {
    const adapter = new DetectorAdapter({
      runtime: {
        ...stubRuntime(async () => OUTPUT),
        load: async () => {
          throw new Error("model file missing");
        },
      },
      config: detectorConfig(),
      logger: createLoggerStub(),
    });

    await expect(adapter.initialize()).rejects.toBeInstanceOf(DetectionUnavailableError);
    expect(adapter.health()).toMatchObject({ state: "failed", lastError: "model file missing" });
    await expect(adapter.detect(FRAME)).rejects.toThrow("Detection unavailable: model file missing");
  });

  it("times out a slow inference and aborts it", async () => {
    const aborted = vi.fn();
    const adapter = new DetectorAdapter({
      runtime: stubRuntime(
        (_image, signal) =>
          new Promise<ModelOutput>((_resolve, reject) => {
            signal?.addEventListener("abort", () => {
              aborted();
              reject(new Error("aborted"));
            });
          }),
      ),
      config: detectorConfig({ inferenceTimeoutMs: 20 }),
      logger: createLoggerStub(),
    });
    await adapter.initialize();

    await expect(adapter.detect(FRAME)).rejects.toBeInstanceOf(InferenceTimeoutError);
    expect(aborted).toHaveBeenCalledTimes(1);
    expect(adapter.health().stats.timeouts).toBe(1);
  });

  it("rejects calls once every slot and queue place is taken", async () => {
    let finish: (output: ModelOutput) => void = () => undefined;
    const adapter = new DetectorAdapter({
      runtime: stubRuntime(
        () =>
          new Promise<ModelOutput>((resolve) => {
            finish = resolve;
          }),
      ),
      config: detectorConfig({
        maxConcurrentInferences: 1,
        maxQueuedInferences: 0,
        inferenceTimeoutMs: 1_000,
      }),
      logger: createLoggerStub(),
    });
    await adapter.initialize();

    const first = adapter.detect(FRAME);
    await expect(adapter.detect({ ...FRAME, frameId: "f-2" })).rejects.toBeInstanceOf(
      DetectorSaturatedError,
    );

    finish(OUTPUT);
    expect((await first).map((detection) => detection.label)).toEqual(["person"]);
    expect(adapter.health().stats.rejected).toBe(1);
  });
});
