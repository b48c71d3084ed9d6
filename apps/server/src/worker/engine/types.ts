import type { ComplianceEvent, ComplianceSnapshot, ComplianceState } from "../../shared/types/compliance";
import type { DetectionResult } from "../../shared/detection/result-schema";
import type { BoundingBox, PpeItem, RawDetection } from "../../shared/types/detector";

export type FrameInput = {
  sessionId: string;
  frameId: string;
  timestamp: number;
  image: Buffer;
  detections: RawDetection[];
};

/** Read-only view of a track after the current frame. */
export type TrackView = {
  trackId: number;
  workerId: string | null;
  role: string | null;
  box: BoundingBox;
  confidence: number;
  state: ComplianceState;
  requiredItems: PpeItem[];
  nonCompliantItems: PpeItem[];
  compliantItems: PpeItem[];
  firstSeenAt: number;
  lastSeenAt: number;
  seenFrames: number;
  snapshot: ComplianceSnapshot;
};

export type ExpiredTrack = {
  trackId: number;
  workerId: string | null;
  lastSeenAt: number;
};

export type FrameOutcome = {
  frameId: string;
  timestamp: number;
  /** Tracks seen this frame, ordered by track id. */
  seen: TrackView[];
  events: ComplianceEvent[];
  expired: ExpiredTrack[];
  result: DetectionResult;
};
