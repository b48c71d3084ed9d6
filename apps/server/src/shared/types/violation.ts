import type { BoundingBox, PpeItem } from "./detector";

export const SEVERITIES = ["low", "medium", "high", "critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

export const severityRank = (severity: Severity): number => {
  return SEVERITIES.indexOf(severity);
};

export type ViolationCloseReason = "recovered" | "track-expired" | "session-ended";

export type ViolationRecord = {
  id: string;
  sessionId: string;
  trackId: number;
  workerId: string | null;
  violationType: PpeItem;
  missingPpe: PpeItem[];
  detectedPpe: PpeItem[];
  severity: Severity;
  startedAt: number;
  lastSeenAt: number;
  endedAt: number | null;
  durationMs: number;
  evidenceRef: string | null;
  boundingBox: BoundingBox;
  frameId: string;
  closeReason: ViolationCloseReason | null;
};

export type OpenViolationInput = Omit<
  ViolationRecord,
  "id" | "endedAt" | "durationMs" | "lastSeenAt" | "closeReason"
>;

export type ViolationKey = {
  sessionId: string;
  trackId: number;
  violationType: PpeItem;
};

export type ViolationFilters = {
  sessionId?: string;
  trackId?: number;
  workerId?: string;
  violationTypes?: readonly PpeItem[];
  minSeverity?: Severity;
  open?: boolean;
  since?: number;
  limit?: number;
};

/**
 * Persistence collaborator for violations. `openViolation` throws
 * `PersistenceConflictError` when an open row for the same key already exists.
 */
export interface ViolationStore {
  openViolation: (input: OpenViolationInput) => ViolationRecord;
  closeViolation: (
    id: string,
    endedAt: number,
    reason: ViolationCloseReason,
  ) => ViolationRecord | null;
  touchViolation: (
    id: string,
    lastSeenAt: number,
    missingPpe: readonly PpeItem[],
  ) => ViolationRecord | null;
  findOpenViolation: (key: ViolationKey) => ViolationRecord | null;
  listOpenViolations: (filters: { sessionId: string; trackId?: number }) => ViolationRecord[];
  listViolations: (filters?: ViolationFilters) => ViolationRecord[];
  countViolations: (filters?: ViolationFilters) => number;
}

export const violationKeyToString = (key: ViolationKey): string => {
  return `${key.sessionId}:${key.trackId}:${key.violationType}`;
};
