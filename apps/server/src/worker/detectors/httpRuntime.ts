import { withTimeout } from "../../shared/concurrency/timeout";
import type { ModelOutput, ModelRuntime } from "../../shared/types/detector";
import { ModelOutputSchema } from "./model-output-schema";

export type HttpRuntimeOptions = {
  /** Base URL of the inference service, e.g. `http://127.0.0.1:8500`. */
  baseUrl: string;
  /** Bound on the `/health` check made by `load()`. Defaults to 5000ms. */
  loadTimeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const DEFAULT_LOAD_TIMEOUT_MS = 5000;

/**
 * Talks to an inference service that exposes `GET /health` and
 * `POST /predict` (raw image body, JSON model output in return).
 */
export class HttpModelRuntime implements ModelRuntime {
  readonly name = "HttpModelRuntime";

  private readonly baseUrl: string;

  private readonly fetchImpl: typeof fetch;

  private readonly loadTimeoutMs: number;

  private loaded = false;

  constructor(options: HttpRuntimeOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.loadTimeoutMs = options.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
  }

  async load(): Promise<void> {
    const response = await withTimeout(
      (signal) => this.fetchImpl(`${this.baseUrl}/health`, { method: "GET", signal }),
      this.loadTimeoutMs,
      () => new Error(`Inference service health check exceeded ${this.loadTimeoutMs}ms`),
    );
    if (!response.ok) {
      throw new Error(`Inference service health check returned ${response.status}`);
    }
    this.loaded = true;
  }

  async infer(image: Buffer, signal?: AbortSignal): Promise<ModelOutput> {
    if (!this.loaded) {
      throw new Error("HttpModelRuntime has not been loaded");
    }

    const response = await this.fetchImpl(`${this.baseUrl}/predict`, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body: image,
      signal,
    });
    if (!response.ok) {
      throw new Error(`Inference service returned ${response.status}`);
    }
    const payload: unknown = await response.json();
    return ModelOutputSchema.parse(payload);
  }

  dispose(): Promise<void> {
    this.loaded = false;
    return Promise.resolve();
  }
}

export const createHttpRuntime = (options: HttpRuntimeOptions): ModelRuntime =>
  new HttpModelRuntime(options);
