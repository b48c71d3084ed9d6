import { readFile } from "node:fs/promises";
import type { ModelOutput, ModelRuntime } from "../../shared/types/detector";
import { type ReplayRecording, ReplayRecordingSchema } from "./model-output-schema";

export type ReplayRuntimeOptions =
  | { path: string; recording?: never }
  | { recording: ReplayRecording; path?: never };

/**
 * Plays back recorded model output, one recorded frame per inference call,
 * looping at the end. Frame bytes are ignored.
 */
export class ReplayModelRuntime implements ModelRuntime {
  readonly name = "ReplayModelRuntime";

  private readonly options: ReplayRuntimeOptions;

  private recording: ReplayRecording | null = null;

  private cursor = 0;

  constructor(options: ReplayRuntimeOptions) {
    this.options = options;
  }

  async load(): Promise<void> {
    const { recording, path } = this.options;
    if (recording) {
      this.recording = ReplayRecordingSchema.parse(recording);
    } else if (path) {
      const raw = await readFile(path, "utf8");
      this.recording = ReplayRecordingSchema.parse(JSON.parse(raw));
    } else {
      throw new Error("ReplayModelRuntime needs a recording or a path");
    }
    this.cursor = 0;
  }

  infer(_image: Buffer): Promise<ModelOutput> {
    const { recording } = this;
    if (!recording) {
      return Promise.reject(new Error("ReplayModelRuntime has not been loaded"));
    }

    const frame = recording.frames[this.cursor % Math.max(1, recording.frames.length)];
    this.cursor += 1;

    return Promise.resolve({
      width: recording.width,
      height: recording.height,
      boxes: frame ? frame.boxes.map((box) => ({ ...box })) : [],
    });
  }

  dispose(): Promise<void> {
    this.recording = null;
    this.cursor = 0;
    return Promise.resolve();
  }
}

export const createReplayRuntime = (options: ReplayRuntimeOptions): ModelRuntime =>
  new ReplayModelRuntime(options);
