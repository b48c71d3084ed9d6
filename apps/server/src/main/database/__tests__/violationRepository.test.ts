import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isSiteWatchError } from "../../../shared/errors";
import type { OpenViolationInput } from "../../../shared/types/violation";
import { createDatabase } from "../client";
import { violations } from "../schema";
import { SqliteViolationStore, isUniqueConstraintError } from "../violationRepository";

const baseInput = (overrides: Partial<OpenViolationInput> = {}): OpenViolationInput => ({
  sessionId: "session-1",
  trackId: 1,
  workerId: "W-1",
  violationType: "helmet",
  missingPpe: ["helmet"],
  detectedPpe: ["vest", "shoes", "gloves"],
  severity: "low",
  startedAt: 10_000,
  evidenceRef: "violations/W-1_19700101_000010_f-1.jpg",
  boundingBox: { x: 0.1, y: 0.1, width: 0.2, height: 0.5 },
  frameId: "f-1",
  ...overrides,
});

describe("SqliteViolationStore", () => {
  let handle: ReturnType<typeof createDatabase>;
  let store: SqliteViolationStore;

  beforeEach(() => {
    handle = createDatabase();
    store = new SqliteViolationStore(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  it("opens a violation with zero duration", () => {
    const record = store.openViolation(baseInput());

    expect(record.endedAt).toBeNull();
    expect(record.lastSeenAt).toBe(10_000);
    expect(record.durationMs).toBe(0);
    expect(record.missingPpe).toEqual(["helmet"]);
    expect(record.boundingBox).toEqual({ x: 0.1, y: 0.1, width: 0.2, height: 0.5 });
    expect(store.findOpenViolation({ sessionId: "session-1", trackId: 1, violationType: "helmet" })?.id)
      .toBe(record.id);
  });

  it("rejects a second open violation for the same key", () => {
    store.openViolation(baseInput());

    let caught: unknown = null;
    try {
      store.openViolation(baseInput({ startedAt: 11_000 }));
    } catch (error) {
      caught = error;
    }

    expect(isSiteWatchError(caught, "PERSISTENCE_CONFLICT")).toBe(true);
    expect(store.countViolations()).toBe(1);
  });

  it("enforces the open-key index below the repository", () => {
    store.openViolation(baseInput());
    const input = baseInput();

    let caught: unknown = null;
    try {
      handle.db
        .insert(violations)
        .values({ ...input, id: "duplicate", lastSeenAt: input.startedAt })
        .run();
    } catch (error) {
      caught = error;
    }

    expect(isUniqueConstraintError(caught)).toBe(true);
  });

  it("allows a new violation once the previous one is closed", () => {
    const first = store.openViolation(baseInput());
    store.closeViolation(first.id, 12_500, "recovered");

    const second = store.openViolation(baseInput({ startedAt: 13_000 }));

    expect(second.id).not.toBe(first.id);
    expect(store.countViolations({ open: true })).toBe(1);
    expect(store.countViolations({ open: false })).toBe(1);
  });

  it("closes once and treats a second close as a no-op", () => {
    const record = store.openViolation(baseInput());

    const closed = store.closeViolation(record.id, 12_500, "recovered");
    const again = store.closeViolation(record.id, 20_000, "session-ended");

    expect(closed?.endedAt).toBe(12_500);
    expect(closed?.durationMs).toBe(2_500);
    expect(closed?.closeReason).toBe("recovered");
    expect(again).toEqual(closed);
    expect(store.closeViolation("missing", 1, "recovered")).toBeNull();
  });

  it("touches an open violation and ignores closed ones", () => {
    const record = store.openViolation(baseInput());

    const touched = store.touchViolation(record.id, 14_000, ["helmet", "gloves"]);
    expect(touched?.lastSeenAt).toBe(14_000);
    expect(touched?.durationMs).toBe(4_000);
    expect(touched?.missingPpe).toEqual(["helmet", "gloves"]);

    store.closeViolation(record.id, 15_000, "track-expired");
    expect(store.touchViolation(record.id, 16_000, ["helmet"])).toBeNull();
  });

  it("filters by worker, type, severity, time and open state", () => {
    store.openViolation(baseInput());
    store.openViolation(baseInput({ violationType: "vest", severity: "high", startedAt: 20_000 }));
    store.openViolation(
      baseInput({ trackId: 2, workerId: "W-2", violationType: "gloves", startedAt: 30_000 }),
    );

    expect(store.listViolations({ workerId: "W-2" }).map((row) => row.violationType)).toEqual([
      "gloves",
    ]);
    expect(store.countViolations({ minSeverity: "high" })).toBe(1);
    expect(store.countViolations({ since: 20_000 })).toBe(2);
    expect(store.countViolations({ violationTypes: ["helmet", "vest"] })).toBe(2);
    expect(store.listViolations({ limit: 2 }).map((row) => row.startedAt)).toEqual([
      30_000, 20_000,
    ]);
    expect(store.listOpenViolations({ sessionId: "session-1", trackId: 1 })).toHaveLength(2);
  });
});
