import type { PpeItem } from "./detector";

export type SessionState = "idle" | "active" | "closing" | "closed";

export type SessionOptions = {
  cameraId?: string | null;
  location?: string | null;
  requiredPpe?: PpeItem[];
  confidenceFloor?: number;
};

/** Mid-stream changes a client may send to a live session. */
export type SessionSettingsUpdate = Pick<SessionOptions, "requiredPpe" | "confidenceFloor">;

export type SessionSummary = {
  sessionId: string;
  state: SessionState;
  startedAt: number | null;
  endedAt: number | null;
  frameCount: number;
  skippedFrames: number;
  violationCount: number;
  activeTracks: number;
  cameraId: string | null;
  location: string | null;
  /** Session override of the required items; null means the pipeline default. */
  requiredPpe: PpeItem[] | null;
  confidenceFloor: number | null;
};

export type SessionRecord = Omit<
  SessionSummary,
  "state" | "activeTracks" | "requiredPpe" | "confidenceFloor"
> & {
  status: "active" | "completed" | "error";
};

export interface SessionStore {
  createSession: (record: SessionRecord) => SessionRecord;
  updateSession: (
    sessionId: string,
    patch: Partial<Omit<SessionRecord, "sessionId">>,
  ) => SessionRecord | null;
  getSession: (sessionId: string) => SessionRecord | null;
}
