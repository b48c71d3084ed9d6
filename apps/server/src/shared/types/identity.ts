import type { BoundingBox } from "./detector";

export type WorkerIdentity = {
  workerId: string;
  role: string | null;
};

export type WorkerLookup = {
  sessionId: string;
  cameraId: string | null;
  trackId: number;
  frameId: string;
  box: BoundingBox;
  image: Buffer;
};

export interface WorkerResolver {
  resolveWorker: (
    lookup: WorkerLookup,
    signal: AbortSignal,
  ) => Promise<WorkerIdentity | null>;
}
