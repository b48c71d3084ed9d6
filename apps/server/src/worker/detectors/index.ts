import type { ModelRuntime, ModelRuntimeKind } from "../../shared/types/detector";
import { createHttpRuntime } from "./httpRuntime";
import { createReplayRuntime } from "./replayRuntime";

export type ModelRuntimeSettings = {
  kind: ModelRuntimeKind;
  detectorUrl: string;
  replayPath: string;
};

const createModelRuntime = (settings: ModelRuntimeSettings): ModelRuntime => {
  switch (settings.kind) {
    case "http":
      return createHttpRuntime({ baseUrl: settings.detectorUrl });
    case "replay":
      return createReplayRuntime({ path: settings.replayPath });
    default: {
      const unknownKind: never = settings.kind;
      throw new Error(`Unknown detector kind: ${String(unknownKind)}`);
    }
  }
};

export default createModelRuntime;

export { DetectorAdapter, normaliseModelOutput } from "./detector-adapter";
export { PPE_CLASS_MAP, labelForClass } from "./class-map";
