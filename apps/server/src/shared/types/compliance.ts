import type { BoundingBox, PpeItem } from "./detector";

/** Per-item status; `partial` until the item's window has filled. */
export type ItemStatus = "compliant" | "partial" | "nonCompliant";

/** Overall status as reported on the wire. */
export type OverallStatus = "compliant" | "partial" | "nonCompliant";

export type ComplianceState = "initializing" | OverallStatus;

export type ItemSnapshot = {
  type: PpeItem;
  status: ItemStatus;
  /** Share of `true` observations in the window, null while empty. */
  ratio: number | null;
  samples: number;
  lastDetectedAt: number | null;
};

export type ComplianceSnapshot = {
  state: ComplianceState;
  items: ItemSnapshot[];
  requiredItems: PpeItem[];
  lastUpdatedAt: number;
  lastStateChangeAt: number;
};

export type ComplianceTransition = {
  from: ComplianceState;
  to: ComplianceState;
  timestamp: number;
  snapshot: ComplianceSnapshot;
};

export type ComplianceEvent = {
  sessionId: string;
  trackId: number;
  workerId: string | null;
  from: ComplianceState;
  to: ComplianceState;
  frameId: string;
  timestamp: number;
  nonCompliantItems: PpeItem[];
  compliantItems: PpeItem[];
  boundingBox: BoundingBox;
};

export const toOverallStatus = (state: ComplianceState): OverallStatus => {
  return state === "initializing" ? "partial" : state;
};
