import { withTimeout } from "../../shared/concurrency/timeout";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import type {
  ComplianceEvent,
  ComplianceTransition,
} from "../../shared/types/compliance";
import type { BoundingBox, PpeItem } from "../../shared/types/detector";
import type { WorkerIdentity, WorkerResolver } from "../../shared/types/identity";
import { ComplianceStateMachine } from "../compliance/state-machine";
import { type PipelineConfig, clonePipelineConfig } from "../config/pipeline-config";
import type { TrackIdGenerator } from "../tracking/track-ids";
import { TrackMatcher } from "../tracking/track-matcher";
import type { ItemObservation, MatchableTrack } from "../tracking/types";
import { buildDetectionResult } from "./output-builder";
import type { ExpiredTrack, FrameInput, FrameOutcome, TrackView } from "./types";

export type ComplianceEngineOptions = {
  sessionId: string;
  cameraId?: string | null;
  config: PipelineConfig;
  /** Session-level required items; role requirements still take precedence. */
  requiredPpe?: readonly PpeItem[];
  resolver?: WorkerResolver;
  ids?: TrackIdGenerator;
  logger?: Logger;
};

type TrackRecord = {
  trackId: number;
  box: BoundingBox;
  confidence: number;
  missedFrames: number;
  firstSeenAt: number;
  lastSeenAt: number;
  seenFrames: number;
  workerId: string | null;
  role: string | null;
  machine: ComplianceStateMachine;
  pending: ComplianceTransition[];
};

const EMPTY_OBSERVATION: ItemObservation = new Map();

const toView = (record: TrackRecord): TrackView => {
  const snapshot = record.machine.getSnapshot();
  return {
    trackId: record.trackId,
    workerId: record.workerId,
    role: record.role,
    box: { ...record.box },
    confidence: record.confidence,
    state: snapshot.state,
    requiredItems: [...snapshot.requiredItems],
    nonCompliantItems: record.machine.itemsWithStatus("nonCompliant"),
    compliantItems: record.machine.itemsWithStatus("compliant"),
    firstSeenAt: record.firstSeenAt,
    lastSeenAt: record.lastSeenAt,
    seenFrames: record.seenFrames,
    snapshot,
  };
};

/**
 * Per-session coordinator: matches detections to tracks, resolves worker
 * identity, advances each track's compliance state and builds the frame result.
 */
export class ComplianceEngine {
  private readonly sessionId: string;

  private readonly cameraId: string | null;

  private readonly config: PipelineConfig;

  private requiredPpe: PpeItem[] | null;

  private readonly matcher: TrackMatcher;

  private readonly resolver: WorkerResolver | null;

  private readonly logger: Logger;

  private readonly tracks = new Map<number, TrackRecord>();

  constructor(options: ComplianceEngineOptions) {
    this.sessionId = options.sessionId;
    this.cameraId = options.cameraId ?? null;
    this.config = clonePipelineConfig(options.config);
    this.requiredPpe = options.requiredPpe ? [...options.requiredPpe] : null;
    this.matcher = new TrackMatcher({
      config: this.config.tracking,
      ids: options.ids,
    });
    this.resolver = options.resolver ?? null;
    this.logger = options.logger ?? getLogger("compliance-engine", "pipeline");
  }

  /**
   * Replaces the session's required items. Tracks with a role requirement
   * keep it; the rest re-evaluate against the new set.
   */
  setRequiredPpe(items: PpeItem[], timestamp: number): void {
    this.requiredPpe = [...items];
    this.tracks.forEach((record) => {
      record.machine.setRequiredItems(this.requiredItemsFor(record.role), timestamp);
    });
  }

  get activeTrackCount(): number {
    return this.tracks.size;
  }

  getTracks(): TrackView[] {
    return this.sortedRecords([...this.tracks.values()]).map(toView);
  }

  /** Drops every track, returning what was live. */
  clear(): TrackView[] {
    const views = this.getTracks();
    this.tracks.clear();
    return views;
  }

  async process(input: FrameInput): Promise<FrameOutcome> {
    const { timestamp } = input;
    const matchable: MatchableTrack[] = this.sortedRecords([
      ...this.tracks.values(),
    ]).map((record) => ({
      trackId: record.trackId,
      box: record.box,
      missedFrames: record.missedFrames,
    }));
    const match = this.matcher.match(matchable, input.detections, timestamp);

    const expired: ExpiredTrack[] = [];
    match.expiredTrackIds.forEach((trackId) => {
      const record = this.tracks.get(trackId);
      if (!record) {
        return;
      }
      expired.push({
        trackId,
        workerId: record.workerId,
        lastSeenAt: record.lastSeenAt,
      });
      this.tracks.delete(trackId);
    });

    const seen: TrackRecord[] = [];
    match.updated.forEach((update) => {
      const record = this.tracks.get(update.trackId);
      if (!record) {
        return;
      }
      if (!update.detection) {
        record.missedFrames = update.missedFrames;
        return;
      }
      record.box = { ...update.detection.box };
      record.confidence = update.detection.confidence;
      record.missedFrames = 0;
      record.lastSeenAt = timestamp;
      record.seenFrames += 1;
      seen.push(record);
    });

    match.created.forEach(({ trackId, detection }) => {
      const record = this.createRecord(trackId, detection.box, detection.confidence, timestamp);
      this.tracks.set(trackId, record);
      seen.push(record);
    });

    const ordered = this.sortedRecords(seen);
    await this.resolveIdentities(ordered, input);

    const events: ComplianceEvent[] = [];
    ordered.forEach((record) => {
      record.machine.observe(
        match.observations.get(record.trackId) ?? EMPTY_OBSERVATION,
        timestamp,
      );
      events.push(...this.drainTransitions(record, input.frameId));
    });

    const views = ordered.map(toView);

    if (expired.length > 0) {
      this.logger.debug("Tracks expired", {
        sessionId: this.sessionId,
        frameId: input.frameId,
        trackIds: expired.map((track) => track.trackId),
      });
    }

    return {
      frameId: input.frameId,
      timestamp,
      seen: views,
      events,
      expired,
      result: buildDetectionResult(input.frameId, views),
    };
  }

  private createRecord(
    trackId: number,
    box: BoundingBox,
    confidence: number,
    timestamp: number,
  ): TrackRecord {
    const pending: ComplianceTransition[] = [];
    return {
      trackId,
      box: { ...box },
      confidence,
      missedFrames: 0,
      firstSeenAt: timestamp,
      lastSeenAt: timestamp,
      seenFrames: 1,
      workerId: null,
      role: null,
      pending,
      machine: new ComplianceStateMachine({
        config: this.config.compliance,
        requiredItems: this.requiredItemsFor(null),
        onTransition: (transition) => {
          pending.push(transition);
        },
      }),
    };
  }

  private requiredItemsFor(role: string | null): PpeItem[] {
    const byRole = role ? this.config.compliance.roleRequirements[role] : undefined;
    if (byRole) {
      return [...byRole];
    }
    return [...(this.requiredPpe ?? this.config.compliance.requiredPpe)];
  }

  private shouldResolve(record: TrackRecord): boolean {
    if (record.workerId !== null) {
      return false;
    }
    const every = Math.max(1, this.config.identity.retryEveryFrames);
    return (record.seenFrames - 1) % every === 0;
  }

  private async resolveIdentities(
    records: readonly TrackRecord[],
    input: FrameInput,
  ): Promise<void> {
    const { resolver } = this;
    if (!resolver) {
      return;
    }
    const pending = records.filter((record) => this.shouldResolve(record));
    await Promise.all(
      pending.map(async (record) => {
        const identity = await this.lookupWorker(resolver, record, input);
        if (!identity) {
          return;
        }
        record.workerId = identity.workerId;
        record.role = identity.role;
        record.machine.setRequiredItems(
          this.requiredItemsFor(identity.role),
          input.timestamp,
        );
      }),
    );
  }

  private async lookupWorker(
    resolver: WorkerResolver,
    record: TrackRecord,
    input: FrameInput,
  ): Promise<WorkerIdentity | null> {
    const timeoutMs = this.config.identity.resolveTimeoutMs;
    try {
      return await withTimeout(
        (signal) =>
          resolver.resolveWorker(
            {
              sessionId: this.sessionId,
              cameraId: this.cameraId,
              trackId: record.trackId,
              frameId: input.frameId,
              box: { ...record.box },
              image: input.image,
            },
            signal,
          ),
        timeoutMs,
        () => new Error(`worker resolution timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      this.logger.warn("Worker resolution failed", {
        sessionId: this.sessionId,
        trackId: record.trackId,
        frameId: input.frameId,
        error: toErrorPayload(error),
      });
      return null;
    }
  }

  private drainTransitions(record: TrackRecord, frameId: string): ComplianceEvent[] {
    const transitions = record.pending.splice(0, record.pending.length);
    return transitions.map((transition) => ({
      sessionId: this.sessionId,
      trackId: record.trackId,
      workerId: record.workerId,
      from: transition.from,
      to: transition.to,
      frameId,
      timestamp: transition.timestamp,
      nonCompliantItems: transition.snapshot.items
        .filter((item) => item.status === "nonCompliant")
        .map((item) => item.type),
      compliantItems: transition.snapshot.items
        .filter((item) => item.status === "compliant")
        .map((item) => item.type),
      boundingBox: { ...record.box },
    }));
  }

  private sortedRecords(records: TrackRecord[]): TrackRecord[] {
    return [...records].sort((a, b) => a.trackId - b.trackId);
  }
}

export type { ExpiredTrack, FrameInput, FrameOutcome, TrackView } from "./types";
