import { RetryExhaustedError, retryWithBackoff } from "../../shared/concurrency/retry";
import {
  PersistenceConflictError,
  PersistenceFailureError,
} from "../../shared/errors";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import type { PpeItem } from "../../shared/types/detector";
import type {
  ViolationCloseReason,
  ViolationKey,
  ViolationRecord,
  ViolationStore,
} from "../../shared/types/violation";
import { assessSeverity } from "../../worker/compliance/severity";
import type {
  ComplianceConfig,
  ViolationConfig,
} from "../../worker/config/pipeline-config";
import type { TrackView } from "../../worker/engine/types";
import type { EvidenceStore } from "./evidenceStore";

export type RecorderFrame = {
  sessionId: string;
  frameId: string;
  timestamp: number;
  image: Buffer;
};

export type RecorderChanges = {
  opened: ViolationRecord[];
  updated: ViolationRecord[];
  closed: ViolationRecord[];
};

export type ViolationRecorderOptions = {
  store: ViolationStore;
  evidence?: EvidenceStore | null;
  config: ViolationConfig;
  compliance: Pick<ComplianceConfig, "highSeverityMissingShare">;
  logger?: Logger;
};

type OpenEntry = {
  record: ViolationRecord;
  lastTouchedAt: number;
};

const emptyChanges = (): RecorderChanges => ({ opened: [], updated: [], closed: [] });

const trackKey = (sessionId: string, trackId: number): string => `${sessionId}:${trackId}`;

const CLOSED_SESSION_LIMIT = 1024;

/**
 * Turns per-track compliance into violation rows. Keeps an in-process view of
 * the open rows it owns; the store's partial unique index is the backstop.
 */
export class ViolationRecorder {
  private readonly store: ViolationStore;

  private readonly evidence: EvidenceStore | null;

  private readonly config: ViolationConfig;

  private readonly highSeverityShare: number;

  private readonly logger: Logger;

  private readonly open = new Map<string, Map<PpeItem, OpenEntry>>();

  /** Sessions whose violations were force-closed; no new opens are accepted. */
  private readonly closedSessions = new Set<string>();

  constructor(options: ViolationRecorderOptions) {
    this.store = options.store;
    this.evidence = options.evidence ?? null;
    this.config = { ...options.config };
    this.highSeverityShare = options.compliance.highSeverityMissingShare;
    this.logger = options.logger ?? getLogger("violation-recorder", "server");
  }

  /** Reconciles a track seen in `frame` with its open violations. */
  async recordTrack(track: TrackView, frame: RecorderFrame): Promise<RecorderChanges> {
    const changes = emptyChanges();
    if (this.isSessionClosed(frame.sessionId)) {
      return changes;
    }
    const entries = this.entriesFor(frame.sessionId, track.trackId);
    const missing = track.state === "nonCompliant" ? track.nonCompliantItems : [];

    for (const [item, entry] of [...entries]) {
      if (missing.includes(item)) {
        continue;
      }
      const closed = await this.close(entry.record, frame.timestamp, "recovered");
      entries.delete(item);
      if (closed) {
        changes.closed.push(closed);
      }
    }

    const toOpen = missing.filter((item) => !entries.has(item));
    if (toOpen.length > 0) {
      const evidenceRef = await this.saveEvidence(track, frame);
      const severity = assessSeverity(
        missing.length,
        track.requiredItems.length,
        this.highSeverityShare,
      );
      for (const item of toOpen) {
        if (this.isSessionClosed(frame.sessionId)) {
          return changes;
        }
        const { record, created } = await this.openOrReuse(track, frame, item, {
          missing,
          severity,
          evidenceRef,
        });
        if (this.isSessionClosed(frame.sessionId)) {
          // The session closed while this row was being written.
          await this.close(record, frame.timestamp, "session-ended");
          return changes;
        }
        entries.set(item, { record, lastTouchedAt: frame.timestamp });
        if (created) {
          changes.opened.push(record);
        }
      }
    }

    if (this.isSessionClosed(frame.sessionId)) {
      return changes;
    }
    for (const [item, entry] of entries) {
      if (toOpen.includes(item)) {
        continue;
      }
      if (frame.timestamp - entry.lastTouchedAt < this.config.updateIntervalMs) {
        continue;
      }
      const touched = await this.persist("touchViolation", () =>
        this.store.touchViolation(entry.record.id, frame.timestamp, missing),
      );
      entry.lastTouchedAt = frame.timestamp;
      if (touched) {
        entry.record = touched;
        changes.updated.push(touched);
      }
    }

    if (entries.size === 0) {
      this.open.delete(trackKey(frame.sessionId, track.trackId));
    }
    return changes;
  }

  /** Force-closes every open violation of one track. */
  async closeTrack(
    sessionId: string,
    trackId: number,
    endedAt: number,
    reason: ViolationCloseReason,
  ): Promise<ViolationRecord[]> {
    this.open.delete(trackKey(sessionId, trackId));
    const rows = await this.persist("listOpenViolations", () =>
      this.store.listOpenViolations({ sessionId, trackId }),
    );
    return this.closeAll(rows, endedAt, reason);
  }

  /** Force-closes every open violation of the session. */
  async closeSession(sessionId: string, endedAt: number): Promise<ViolationRecord[]> {
    this.markSessionClosed(sessionId);
    [...this.open.keys()]
      .filter((key) => key.startsWith(`${sessionId}:`))
      .forEach((key) => this.open.delete(key));
    const rows = await this.persist("listOpenViolations", () =>
      this.store.listOpenViolations({ sessionId }),
    );
    return this.closeAll(rows, endedAt, "session-ended");
  }

  openCount(sessionId: string): number {
    let total = 0;
    this.open.forEach((entries, key) => {
      if (key.startsWith(`${sessionId}:`)) {
        total += entries.size;
      }
    });
    return total;
  }

  isSessionClosed(sessionId: string): boolean {
    return this.closedSessions.has(sessionId);
  }

  private markSessionClosed(sessionId: string): void {
    this.closedSessions.add(sessionId);
    if (this.closedSessions.size > CLOSED_SESSION_LIMIT) {
      const oldest = this.closedSessions.values().next();
      if (!oldest.done) {
        this.closedSessions.delete(oldest.value);
      }
    }
  }

  private entriesFor(sessionId: string, trackId: number): Map<PpeItem, OpenEntry> {
    const key = trackKey(sessionId, trackId);
    let entries = this.open.get(key);
    if (!entries) {
      entries = new Map();
      this.open.set(key, entries);
    }
    return entries;
  }

  private async closeAll(
    rows: readonly ViolationRecord[],
    endedAt: number,
    reason: ViolationCloseReason,
  ): Promise<ViolationRecord[]> {
    const closed: ViolationRecord[] = [];
    for (const row of rows) {
      const record = await this.close(row, endedAt, reason);
      if (record) {
        closed.push(record);
      }
    }
    return closed;
  }

  private async close(
    record: ViolationRecord,
    endedAt: number,
    reason: ViolationCloseReason,
  ): Promise<ViolationRecord | null> {
    const closed = await this.persist("closeViolation", () =>
      this.store.closeViolation(record.id, endedAt, reason),
    );
    if (closed) {
      this.logger.info("Violation closed", {
        violationId: closed.id,
        sessionId: closed.sessionId,
        trackId: closed.trackId,
        violationType: closed.violationType,
        durationMs: closed.durationMs,
        reason,
      });
    }
    return closed;
  }

  private async openOrReuse(
    track: TrackView,
    frame: RecorderFrame,
    item: PpeItem,
    details: { missing: PpeItem[]; severity: ViolationRecord["severity"]; evidenceRef: string | null },
  ): Promise<{ record: ViolationRecord; created: boolean }> {
    const key: ViolationKey = {
      sessionId: frame.sessionId,
      trackId: track.trackId,
      violationType: item,
    };

    const existing = await this.persist("findOpenViolation", () =>
      this.store.findOpenViolation(key),
    );
    if (existing) {
      return { record: existing, created: false };
    }

    try {
      const record = await this.persist("openViolation", () =>
        this.store.openViolation({
          ...key,
          workerId: track.workerId,
          missingPpe: [...details.missing],
          detectedPpe: [...track.compliantItems],
          severity: details.severity,
          startedAt: frame.timestamp,
          evidenceRef: details.evidenceRef,
          boundingBox: { ...track.box },
          frameId: frame.frameId,
        }),
      );
      this.logger.info("Violation opened", {
        violationId: record.id,
        sessionId: record.sessionId,
        trackId: record.trackId,
        workerId: record.workerId,
        violationType: record.violationType,
        severity: record.severity,
      });
      return { record, created: true };
    } catch (error) {
      if (!(error instanceof PersistenceConflictError)) {
        throw error;
      }
      const winner = await this.persist("findOpenViolation", () =>
        this.store.findOpenViolation(key),
      );
      if (!winner) {
        throw error;
      }
      return { record: winner, created: false };
    }
  }

  private async saveEvidence(track: TrackView, frame: RecorderFrame): Promise<string | null> {
    if (!this.evidence) {
      return null;
    }
    try {
      return await this.evidence.save(frame.image, {
        workerId: track.workerId,
        frameId: frame.frameId,
        capturedAt: frame.timestamp,
      });
    } catch (error) {
      this.logger.warn("Evidence could not be saved", {
        sessionId: frame.sessionId,
        frameId: frame.frameId,
        trackId: track.trackId,
        error: toErrorPayload(error),
      });
      return null;
    }
  }

  private async persist<T>(operation: string, task: () => T): Promise<T> {
    try {
      return await retryWithBackoff(task, {
        attempts: this.config.persistenceRetries + 1,
        baseDelayMs: this.config.retryBaseDelayMs,
        shouldRetry: (error) => !(error instanceof PersistenceConflictError),
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("Violation persistence failed, retrying", {
            operation,
            attempt,
            delayMs,
            error: toErrorPayload(error),
          });
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        this.logger.error("Violation persistence gave up", {
          operation,
          attempts: error.attempts,
          error: toErrorPayload(error.cause),
        });
        throw new PersistenceFailureError(operation, error.attempts, {
          cause: error.cause,
        });
      }
      throw error;
    }
  }
}
