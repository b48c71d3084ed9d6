import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../../../shared/logger";
import type { BoundingBox, PpeLabel, RawDetection } from "../../../shared/types/detector";
import type { WorkerResolver } from "../../../shared/types/identity";
import {
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  mergePipelineConfig,
} from "../../config/pipeline-config";
import { createTrackIdGenerator } from "../../tracking/track-ids";
import { ComplianceEngine } from "../index";

const box = (x: number, y: number, width: number, height: number): BoundingBox => ({
  x,
  y,
  width,
  height,
});

const detection = (label: PpeLabel, bounds: BoundingBox, confidence = 0.9): RawDetection => ({
  label,
  confidence,
  box: bounds,
});

const PERSON = detection("person", box(0.2, 0.1, 0.2, 0.6), 0.92);
const HELMET = detection("helmet", box(0.28, 0.1, 0.04, 0.04));
const VEST = detection("vest", box(0.25, 0.3, 0.1, 0.1));
const SHOES = detection("shoes", box(0.25, 0.65, 0.1, 0.04));
const GLOVES = detection("gloves", box(0.22, 0.4, 0.03, 0.03));

const createLoggerStub = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  flush: vi.fn(async () => undefined),
});

const createEngine = (
  overrides: { config?: PipelineConfig; resolver?: WorkerResolver; logger?: Logger } = {},
) =>
  new ComplianceEngine({
    sessionId: "session-1",
    config: overrides.config ?? DEFAULT_PIPELINE_CONFIG,
    resolver: overrides.resolver,
    ids: createTrackIdGenerator(1),
    logger: overrides.logger ?? createLoggerStub(),
  });

const frame = (index: number, detections: RawDetection[]) => ({
  sessionId: "session-1",
  frameId: `frame-${index}`,
  timestamp: 1_000 + index * 100,
  image: Buffer.from([0xff, 0xd8, 0xff]),
  detections,
});

describe("ComplianceEngine", () => {
  it("returns an empty result for a frame without persons", async () => {
    const engine = createEngine();
    const outcome = await engine.process(frame(0, [HELMET]));

    expect(outcome.result).toEqual({
      frameId: "frame-0",
      detected: 0,
      compliant: 0,
      nonCompliant: 0,
      detections: [],
    });
    expect(outcome.events).toEqual([]);
    expect(engine.activeTrackCount).toBe(0);
  });

  it("reports partial while windows fill and compliant once confirmed", async () => {
    const engine = createEngine();
    const all = [PERSON, HELMET, VEST, SHOES, GLOVES];

    const first = await engine.process(frame(0, all));
    expect(first.result.detections[0]?.overallStatus).toBe("partial");
    expect(first.result.nonCompliant).toBe(1);

    let last = first;
    for (let index = 1; index < 5; index += 1) {
      last = await engine.process(frame(index, all));
    }

    expect(last.events).toHaveLength(1);
    expect(last.events[0]).toMatchObject({
      sessionId: "session-1",
      trackId: 1,
      from: "initializing",
      to: "compliant",
      frameId: "frame-4",
      timestamp: 1_400,
      nonCompliantItems: [],
      compliantItems: ["helmet", "vest", "shoes", "gloves"],
    });
    expect(last.result.detected).toBe(1);
    expect(last.result.compliant).toBe(1);
    expect(last.result.nonCompliant).toBe(0);
    expect(last.result.detections[0]?.ppeStatus[0]).toEqual({
      type: "helmet",
      status: "compliant",
      lastDetected: "1970-01-01T00:00:01.400Z",
    });
    expect(last.result.detections[0]?.confidence).toBe(0.92);
  });

  it("emits a nonCompliant event naming the missing items", async () => {
    const engine = createEngine();
    let outcome = await engine.process(frame(0, [PERSON, HELMET, VEST]));
    for (let index = 1; index < 5; index += 1) {
      outcome = await engine.process(frame(index, [PERSON, HELMET, VEST]));
    }

    expect(outcome.events.map((event) => event.to)).toEqual(["nonCompliant"]);
    expect(outcome.events[0]?.nonCompliantItems).toEqual(["shoes", "gloves"]);
    expect(outcome.seen[0]?.nonCompliantItems).toEqual(["shoes", "gloves"]);
    expect(outcome.result.detections[0]?.ppeStatus.find((entry) => entry.type === "shoes"))
      .toEqual({ type: "shoes", status: "nonCompliant", lastDetected: null });
  });

  it("applies role requirements once a worker is resolved", async () => {
    const config = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, {
      compliance: { roleRequirements: { painter: ["vest"] } },
    });
    const resolver: WorkerResolver = {
      resolveWorker: vi.fn(async () => ({ workerId: "W-7", role: "painter" })),
    };
    const engine = createEngine({ config, resolver });

    let outcome = await engine.process(frame(0, [PERSON, VEST]));
    for (let index = 1; index < 5; index += 1) {
      outcome = await engine.process(frame(index, [PERSON, VEST]));
    }

    expect(resolver.resolveWorker).toHaveBeenCalledTimes(1);
    expect(outcome.seen[0]?.requiredItems).toEqual(["vest"]);
    expect(outcome.result.detections[0]?.workerId).toBe("W-7");
    expect(outcome.result.detections[0]?.overallStatus).toBe("compliant");
    expect(outcome.events[0]?.workerId).toBe("W-7");
  });

  it("logs a failing resolver and retries on the configured cadence", async () => {
    const config = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, {
      identity: { retryEveryFrames: 2 },
    });
    const logger = createLoggerStub();
    const resolver: WorkerResolver = {
      resolveWorker: vi.fn(async () => {
        throw new Error("directory offline");
      }),
    };
    const engine = createEngine({ config, resolver, logger });

    for (let index = 0; index < 4; index += 1) {
      await engine.process(frame(index, [PERSON]));
    }

    // attempted on the 1st and 3rd sighting
    expect(resolver.resolveWorker).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(engine.getTracks()[0]?.workerId).toBeNull();
  });

  it("expires a track once it has been missing for too long", async () => {
    const config = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, {
      tracking: { maxMissedFrames: 1 },
    });
    const engine = createEngine({ config });

    await engine.process(frame(0, [PERSON]));
    const missed = await engine.process(frame(1, []));
    expect(missed.expired).toEqual([]);
    expect(engine.activeTrackCount).toBe(1);

    const gone = await engine.process(frame(2, []));
    expect(gone.expired).toEqual([{ trackId: 1, workerId: null, lastSeenAt: 1_000 }]);
    expect(engine.activeTrackCount).toBe(0);
  });

  it("tracks several persons and hands them back on clear", async () => {
    const engine = createEngine();
    const other = detection("person", box(0.6, 0.1, 0.2, 0.6), 0.7);
    const outcome = await engine.process(frame(0, [PERSON, other]));

    expect(outcome.result.detected).toBe(2);
    expect(outcome.seen.map((track) => track.trackId)).toEqual([1, 2]);
    expect(engine.clear().map((track) => track.trackId)).toEqual([1, 2]);
    expect(engine.activeTrackCount).toBe(0);
  });
});
