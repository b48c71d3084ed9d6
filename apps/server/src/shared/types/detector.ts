export const PPE_LABELS = ["gloves", "helmet", "person", "shoes", "vest"] as const;

export type PpeLabel = (typeof PPE_LABELS)[number];

/** Protective items; every label except `person`. */
export type PpeItem = Exclude<PpeLabel, "person">;

export const PPE_ITEMS: readonly PpeItem[] = ["helmet", "vest", "shoes", "gloves"];

export const isPpeItem = (value: string): value is PpeItem => {
  return PPE_ITEMS.some((item) => item === value);
};

/** Axis-aligned box, every field normalised to [0, 1] of the frame. */
export type BoundingBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type RawDetection = {
  label: PpeLabel;
  confidence: number;
  box: BoundingBox;
};

export type Frame = {
  sessionId: string;
  frameId: string;
  image: Buffer;
  capturedAt: number;
};

/** Pixel-space box exactly as the model reports it. */
export type ModelBox = {
  classId: number;
  confidence: number;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
};

export type ModelOutput = {
  width: number;
  height: number;
  boxes: ModelBox[];
};

export type ModelRuntimeKind = "http" | "replay";

/** The external detection capability; the pipeline treats it as a black box. */
export interface ModelRuntime {
  readonly name: string;
  load: () => Promise<void>;
  infer: (image: Buffer, signal?: AbortSignal) => Promise<ModelOutput>;
  dispose: () => Promise<void>;
}

export type DetectorHealthState = "unloaded" | "loading" | "ready" | "failed";

export type DetectorStats = {
  inferences: number;
  failures: number;
  timeouts: number;
  rejected: number;
  lastDurationMs: number | null;
  meanDurationMs: number | null;
};

export type DetectorHealth = {
  runtime: string;
  state: DetectorHealthState;
  lastError: string | null;
  inFlight: number;
  queued: number;
  stats: DetectorStats;
};

export type DetectOptions = {
  confidenceFloor?: number;
};
