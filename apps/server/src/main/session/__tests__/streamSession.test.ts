import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DetectionUnavailableError,
  InferenceTimeoutError,
  PersistenceFailureError,
  isSiteWatchError,
} from "../../../shared/errors";
import type { DetectionResult } from "../../../shared/detection/result-schema";
import type { Logger } from "../../../shared/logger";
import type {
  BoundingBox,
  DetectOptions,
  Frame,
  PpeLabel,
  RawDetection,
} from "../../../shared/types/detector";
import type { SessionOptions } from "../../../shared/types/session";
import type { ViolationStore } from "../../../shared/types/violation";
import {
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  mergePipelineConfig,
} from "../../../worker/config/pipeline-config";
import { createTrackIdGenerator } from "../../../worker/tracking/track-ids";
import { createDatabase } from "../../database/client";
import { SqliteViolationStore } from "../../database/violationRepository";
import type { EvidenceStore } from "../../violations/evidenceStore";
import { ViolationRecorder } from "../../violations/recorder";
import { type FrameDetector, StreamSession } from "../streamSession";

type Deferred<T> = { promise: Promise<T>; resolve: (value: T) => void };

const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
};

const box = (x: number, y: number, width: number, height: number): BoundingBox => ({
  x,
  y,
  width,
  height,
});

const detection = (label: PpeLabel, bounds: BoundingBox): RawDetection => ({
  label,
  confidence: 0.9,
  box: bounds,
});

const PERSON = detection("person", box(0.2, 0.1, 0.2, 0.6));
const HELMET = detection("helmet", box(0.28, 0.1, 0.04, 0.04));

const IMAGE = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);

const createLoggerStub = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  flush: vi.fn(async () => undefined),
});

class ScriptedDetector implements FrameDetector {
  readonly calls: Frame[] = [];

  readonly floors: (number | undefined)[] = [];

  constructor(
    private readonly script: (frame: Frame) => RawDetection[] | Promise<RawDetection[]> = () => [],
  ) {}

  async detect(frame: Frame, options?: DetectOptions): Promise<RawDetection[]> {
    this.calls.push(frame);
    this.floors.push(options?.confidenceFloor);
    return this.script(frame);
  }
}

const config = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, {
  session: { maxInFlightFrames: 2, drainTimeoutMs: 200, idleTimeoutMs: 0 },
  violations: { persistenceRetries: 1, retryBaseDelayMs: 1 },
});

describe("StreamSession", () => {
  let handle: ReturnType<typeof createDatabase>;
  let store: SqliteViolationStore;

  beforeEach(() => {
    handle = createDatabase();
    store = new SqliteViolationStore(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  type SessionOverrides = {
    options?: SessionOptions;
    config?: PipelineConfig;
    evidence?: EvidenceStore;
  };

  const createSession = (
    detector: FrameDetector,
    violationStore: ViolationStore = store,
    onClosed = vi.fn(),
    overrides: SessionOverrides = {},
  ) =>
    new StreamSession({
      sessionId: "session-1",
      options: { cameraId: "cam-1", ...overrides.options },
      config: overrides.config ?? config,
      detector,
      recorder: new ViolationRecorder({
        store: violationStore,
        config: config.violations,
        compliance: config.compliance,
        evidence: overrides.evidence,
        logger: createLoggerStub(),
      }),
      ids: createTrackIdGenerator(1),
      logger: createLoggerStub(),
      onClosed,
    });

  it("rejects frames before start without touching the detector", async () => {
    const detector = new ScriptedDetector();
    const session = createSession(detector);

    await expect(session.submitFrame({ frameId: "f-1", image: IMAGE })).rejects.toMatchObject({
      code: "SESSION_NOT_ACTIVE",
    });
    expect(detector.calls).toEqual([]);
    expect(session.summary().frameCount).toBe(0);
  });

  it("processes frames one at a time in arrival order", async () => {
    const gate = createDeferred<RawDetection[]>();
    const detector = new ScriptedDetector((frame) => (frame.frameId === "f-1" ? gate.promise : []));
    const session = createSession(detector);
    session.start();

    const first = session.submitFrame({ frameId: "f-1", image: IMAGE, timestamp: 1_000 });
    const second = session.submitFrame({ frameId: "f-2", image: IMAGE, timestamp: 1_100 });
    await Promise.resolve();
    expect(detector.calls.map((frame) => frame.frameId)).toEqual(["f-1"]);

    gate.resolve([PERSON]);
    const results = await Promise.all([first, second]);

    expect(detector.calls.map((frame) => frame.frameId)).toEqual(["f-1", "f-2"]);
    expect(results.map((result) => result.frameId)).toEqual(["f-1", "f-2"]);
    expect(results[0]?.detected).toBe(1);
    expect(session.summary().frameCount).toBe(2);
  });

  it("refuses frames beyond the in-flight limit", async () => {
    const gate = createDeferred<RawDetection[]>();
    const session = createSession(new ScriptedDetector(() => gate.promise));
    session.start();

    const pending = [
      session.submitFrame({ frameId: "f-1", image: IMAGE }),
      session.submitFrame({ frameId: "f-2", image: IMAGE }),
    ];
    await expect(session.submitFrame({ frameId: "f-3", image: IMAGE })).rejects.toMatchObject({
      code: "SESSION_BUSY",
    });

    gate.resolve([]);
    await Promise.all(pending);
    expect(session.pendingFrames).toBe(0);
  });

  it("rejects a repeated frame id and empty images", async () => {
    const session = createSession(new ScriptedDetector());
    session.start();
    await session.submitFrame({ frameId: "f-1", image: IMAGE });

    await expect(session.submitFrame({ frameId: "f-1", image: IMAGE })).rejects.toMatchObject({
      code: "INVALID_FRAME",
      details: { reason: "duplicate" },
    });
    await expect(session.submitFrame({ frameId: "f-2", image: Buffer.alloc(0) })).rejects.toMatchObject({
      code: "INVALID_FRAME",
    });
  });

  it("numbers frames that arrive without an id", async () => {
    const session = createSession(new ScriptedDetector());
    session.start();

    await session.submitFrame({ frameId: "cam-frame", image: IMAGE });
    const assigned = await session.submitFrame({ image: IMAGE });
    const blank = await session.submitFrame({ frameId: "  ", image: IMAGE });

    expect(assigned.frameId).toBe("session-1-2");
    expect(blank.frameId).toBe("session-1-3");
  });

  it("clamps a timestamp that goes backwards", async () => {
    const detector = new ScriptedDetector();
    const session = createSession(detector);
    session.start();

    await session.submitFrame({ frameId: "f-1", image: IMAGE, timestamp: 2_000 });
    await session.submitFrame({ frameId: "f-2", image: IMAGE, timestamp: 1_500 });

    expect(detector.calls.map((frame) => frame.capturedAt)).toEqual([2_000, 2_000]);
  });

  it("skips a frame whose inference times out", async () => {
    const session = createSession(
      new ScriptedDetector(() => {
        throw new InferenceTimeoutError(2_000);
      }),
    );
    session.start();

    const result = await session.submitFrame({ frameId: "f-1", image: IMAGE });

    expect(result).toEqual({ frameId: "f-1", detected: 0, compliant: 0, nonCompliant: 0, detections: [] });
    expect(session.summary().skippedFrames).toBe(1);
  });

  it("surfaces an unavailable detector to the caller", async () => {
    const session = createSession(
      new ScriptedDetector(() => {
        throw new DetectionUnavailableError("model missing");
      }),
    );
    session.start();

    await expect(session.submitFrame({ frameId: "f-1", image: IMAGE })).rejects.toBeInstanceOf(
      DetectionUnavailableError,
    );
    expect(session.getState()).toBe("active");
  });

  it("opens violations for missing items and closes them when stopped", async () => {
    const onClosed = vi.fn();
    const session = createSession(new ScriptedDetector(() => [PERSON, HELMET]), store, onClosed);
    session.start();

    let last = await session.submitFrame({ frameId: "f-0", image: IMAGE, timestamp: 1_000 });
    for (let index = 1; index < 5; index += 1) {
      last = await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 });
    }

    expect(last.nonCompliant).toBe(1);
    expect(last.detections[0]?.overallStatus).toBe("nonCompliant");
    const open = store.listOpenViolations({ sessionId: "session-1" });
    expect(open.map((row) => row.violationType).sort()).toEqual(["gloves", "shoes", "vest"]);
    expect(open.every((row) => row.severity === "high")).toBe(true);

    const summary = await session.stop();

    expect(summary.state).toBe("closed");
    expect(summary.violationCount).toBe(3);
    expect(summary.activeTracks).toBe(0);
    expect(store.countViolations({ open: true })).toBe(0);
    expect(store.listViolations().every((row) => row.closeReason === "session-ended" && row.endedAt === 1_400))
      .toBe(true);
    expect(onClosed).toHaveBeenCalledWith(summary, null);
    await expect(session.submitFrame({ frameId: "late", image: IMAGE })).rejects.toMatchObject({
      code: "SESSION_NOT_ACTIVE",
    });
  });

  it("cuts the drain short on abort and still force-closes", async () => {
    const gate = createDeferred<RawDetection[]>();
    let blocked = false;
    const session = createSession(
      new ScriptedDetector(() => (blocked ? gate.promise : [PERSON])),
    );
    session.start();
    for (let index = 0; index < 5; index += 1) {
      await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 });
    }
    blocked = true;
    const stuck = session.submitFrame({ frameId: "f-stuck", image: IMAGE, timestamp: 2_000 });
    const queued = session.submitFrame({ frameId: "f-queued", image: IMAGE, timestamp: 2_100 });

    const controller = new AbortController();
    const stopping = session.stop({ signal: controller.signal, drainTimeoutMs: 60_000 });
    controller.abort();
    const summary = await stopping;

    expect(summary.state).toBe("closed");
    expect(summary.activeTracks).toBe(0);
    expect(store.countViolations({ open: true })).toBe(0);

    gate.resolve([PERSON]);
    await expect(stuck).rejects.toMatchObject({ code: "SESSION_NOT_ACTIVE" });
    await expect(queued).rejects.toMatchObject({ code: "SESSION_NOT_ACTIVE" });
  });

  it("treats exhausted persistence retries as fatal", async () => {
    const failing: ViolationStore = {
      openViolation: () => {
        throw new Error("database is locked");
      },
      closeViolation: (id, endedAt, reason) => store.closeViolation(id, endedAt, reason),
      touchViolation: (id, lastSeenAt, missing) => store.touchViolation(id, lastSeenAt, missing),
      findOpenViolation: (key) => store.findOpenViolation(key),
      listOpenViolations: (filters) => store.listOpenViolations(filters),
      listViolations: (filters) => store.listViolations(filters),
      countViolations: (filters) => store.countViolations(filters),
    };
    const onClosed = vi.fn();
    const session = createSession(new ScriptedDetector(() => [PERSON]), failing, onClosed);
    session.start();

    for (let index = 0; index < 4; index += 1) {
      await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: index });
    }
    const fatal = session.submitFrame({ frameId: "f-4", image: IMAGE, timestamp: 4 });

    await expect(fatal).rejects.toBeInstanceOf(PersistenceFailureError);
    const summary = await session.stop();
    expect(summary.state).toBe("closed");
    expect(isSiteWatchError(session.getFailure(), "PERSISTENCE_FAILURE")).toBe(true);
    expect(onClosed).toHaveBeenCalledTimes(1);
  });
  it("creates no track or violation from frames without detections", async () => {
    const session = createSession(new ScriptedDetector(() => []));
    session.start();

    const results: DetectionResult[] = [];
    for (let index = 0; index < 6; index += 1) {
      results.push(await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 }));
    }

    expect(results.every((result) => result.detected === 0 && result.detections.length === 0)).toBe(true);
    expect(session.summary()).toMatchObject({ frameCount: 6, activeTracks: 0, violationCount: 0 });
    expect(store.listViolations()).toEqual([]);
  });

  it("opens one helmet violation and closes it once the helmet is back", async () => {
    let wearing = false;
    const session = createSession(
      new ScriptedDetector(() => (wearing ? [PERSON, HELMET] : [PERSON])),
      store,
      vi.fn(),
      { options: { requiredPpe: ["helmet"] } },
    );
    session.start();

    for (let index = 0; index < 5; index += 1) {
      await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 });
    }
    const opened = store.listViolations();
    expect(opened).toHaveLength(1);
    expect(opened[0]).toMatchObject({ violationType: "helmet", startedAt: 1_400, endedAt: null });

    wearing = true;
    await session.submitFrame({ frameId: "f-5", image: IMAGE, timestamp: 1_500 });
    await session.submitFrame({ frameId: "f-6", image: IMAGE, timestamp: 1_600 });
    expect(store.countViolations({ open: true })).toBe(1);

    const recovered = await session.submitFrame({ frameId: "f-7", image: IMAGE, timestamp: 1_700 });

    expect(recovered.compliant).toBe(1);
    const rows = store.listViolations();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      violationType: "helmet",
      closeReason: "recovered",
      startedAt: 1_400,
      endedAt: 1_700,
    });
    expect(session.summary().violationCount).toBe(1);
  });

  it("closes a vanished worker's violations once the track expires", async () => {
    let present = true;
    const session = createSession(new ScriptedDetector(() => (present ? [PERSON] : [])));
    session.start();
    for (let index = 0; index < 5; index += 1) {
      await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 });
    }
    expect(store.countViolations({ open: true })).toBe(4);

    present = false;
    for (let index = 0; index < 10; index += 1) {
      await session.submitFrame({ frameId: `gone-${index}`, image: IMAGE, timestamp: 1_500 + index * 100 });
    }
    expect(session.summary().activeTracks).toBe(1);
    expect(store.countViolations({ open: true })).toBe(4);

    await session.submitFrame({ frameId: "gone-10", image: IMAGE, timestamp: 2_500 });

    expect(session.summary().activeTracks).toBe(0);
    expect(store.countViolations({ open: true })).toBe(0);
    const rows = store.listViolations();
    expect(rows).toHaveLength(4);
    expect(rows.every((row) => row.closeReason === "track-expired" && row.endedAt === 2_500)).toBe(true);
  });

  it("leaves nothing open when teardown overtakes a violation write", async () => {
    const gate = createDeferred<string>();
    const save = vi.fn(() => gate.promise);
    const session = createSession(new ScriptedDetector(() => [PERSON]), store, vi.fn(), {
      evidence: { save },
    });
    session.start();
    for (let index = 0; index < 4; index += 1) {
      await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 });
    }
    const racing = session.submitFrame({ frameId: "f-4", image: IMAGE, timestamp: 1_400 });
    await vi.waitFor(() => expect(save).toHaveBeenCalledTimes(1));

    const summary = await session.stop({ drainTimeoutMs: 20 });
    expect(summary.state).toBe("closed");

    gate.resolve("violations/W-1_f-4.jpg");
    await expect(racing).rejects.toMatchObject({ code: "SESSION_NOT_ACTIVE" });
    expect(store.countViolations({ open: true })).toBe(0);
    expect(store.listViolations()).toEqual([]);
    expect(session.summary().violationCount).toBe(0);
  });

  it("applies new required items from the next frame on", async () => {
    const detector = new ScriptedDetector(() => [PERSON, HELMET]);
    const session = createSession(detector);
    session.start();
    for (let index = 0; index < 5; index += 1) {
      await session.submitFrame({ frameId: `f-${index}`, image: IMAGE, timestamp: 1_000 + index * 100 });
    }
    expect(store.countViolations({ open: true })).toBe(3);

    const updated = await session.updateSettings({ requiredPpe: ["helmet"], confidenceFloor: 0.7 });
    expect(updated.requiredPpe).toEqual(["helmet"]);
    expect(updated.confidenceFloor).toBe(0.7);

    const result = await session.submitFrame({ frameId: "f-5", image: IMAGE, timestamp: 1_500 });

    expect(detector.floors.slice(-2)).toEqual([undefined, 0.7]);
    expect(result.compliant).toBe(1);
    expect(store.countViolations({ open: true })).toBe(0);
    expect(
      store.listViolations().every((row) => row.closeReason === "recovered" && row.endedAt === 1_500),
    ).toBe(true);
  });

  it("refuses a settings change on a session that is not running", async () => {
    const session = createSession(new ScriptedDetector());

    await expect(session.updateSettings({ confidenceFloor: 0.8 })).rejects.toMatchObject({
      code: "SESSION_NOT_ACTIVE",
    });
  });

  it("closes itself after the idle timeout, but not while a frame is in flight", async () => {
    const gate = createDeferred<RawDetection[]>();
    const onClosed = vi.fn();
    const session = createSession(new ScriptedDetector(() => gate.promise), store, onClosed, {
      config: mergePipelineConfig(config, { session: { idleTimeoutMs: 30 } }),
    });
    session.start();

    const pending = session.submitFrame({ frameId: "f-1", image: IMAGE, timestamp: 1_000 });
    await new Promise((resolve) => setTimeout(resolve, 80));
    expect(session.getState()).toBe("active");

    gate.resolve([]);
    await pending;
    await vi.waitFor(() => expect(session.getState()).toBe("closed"));
    expect(onClosed).toHaveBeenCalledTimes(1);
    expect(session.summary().frameCount).toBe(1);
  });
});
