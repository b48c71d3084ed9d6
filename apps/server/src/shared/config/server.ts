/**
 * HTTP intake and process wiring configuration.
 *
 * Read once at bootstrap from `SITEWATCH_*` environment variables.
 */
import type { ModelRuntimeKind } from "../types/detector";
import { parseNumericEnv } from "../env";

/**
 * Default port for the HTTP intake server
 */
export const SERVER_HTTP_DEFAULT_PORT = 3212;

/**
 * Default host for the HTTP intake server
 */
export const SERVER_HTTP_DEFAULT_HOST = "127.0.0.1";

/** Largest frame body accepted by `POST /api/sessions/:id/frames`. */
export const SERVER_DEFAULT_MAX_FRAME_BYTES = 8 * 1024 * 1024;

export const SERVER_DEFAULT_DB_PATH = "data/sitewatch.db";

export const SERVER_DEFAULT_ALERTS_CONFIG = "config/alerts.json";

export const SERVER_DEFAULT_DETECTOR_URL = "http://127.0.0.1:8500";

type RuntimeEnv = Record<string, string | undefined>;

export type ServerConfig = {
  host: string;
  port: number;
  maxFrameBytes: number;
  dbPath: string;
  /** Evidence snapshots are skipped when null. */
  evidenceDir: string | null;
  alertsConfigPath: string;
  /** Camera and role directory; identity stays unresolved when null. */
  workersConfigPath: string | null;
  detector: {
    kind: ModelRuntimeKind;
    detectorUrl: string;
    replayPath: string;
  };
  /** Outbound alert webhook headers, e.g. an authorization token. */
  webhookToken: string | null;
};

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
};

const resolveDetectorKind = (value: string | undefined): ModelRuntimeKind => {
  return nonEmpty(value)?.toLowerCase() === "replay" ? "replay" : "http";
};

export const createServerConfig = (runtimeEnv: RuntimeEnv): ServerConfig => {
  return {
    host: nonEmpty(runtimeEnv.SITEWATCH_HTTP_HOST) ?? SERVER_HTTP_DEFAULT_HOST,
    port:
      parseNumericEnv(runtimeEnv.SITEWATCH_HTTP_PORT, {
        min: 0,
        max: 65535,
        integer: true,
      }) ?? SERVER_HTTP_DEFAULT_PORT,
    maxFrameBytes:
      parseNumericEnv(runtimeEnv.SITEWATCH_MAX_FRAME_BYTES, {
        min: 1024,
        max: 64 * 1024 * 1024,
        integer: true,
      }) ?? SERVER_DEFAULT_MAX_FRAME_BYTES,
    dbPath: nonEmpty(runtimeEnv.SITEWATCH_DB_PATH) ?? SERVER_DEFAULT_DB_PATH,
    evidenceDir: nonEmpty(runtimeEnv.SITEWATCH_EVIDENCE_DIR),
    alertsConfigPath:
      nonEmpty(runtimeEnv.SITEWATCH_ALERTS_CONFIG) ?? SERVER_DEFAULT_ALERTS_CONFIG,
    workersConfigPath: nonEmpty(runtimeEnv.SITEWATCH_WORKERS_CONFIG),
    detector: {
      kind: resolveDetectorKind(runtimeEnv.SITEWATCH_DETECTOR),
      detectorUrl:
        nonEmpty(runtimeEnv.SITEWATCH_DETECTOR_URL) ?? SERVER_DEFAULT_DETECTOR_URL,
      replayPath: nonEmpty(runtimeEnv.SITEWATCH_REPLAY_PATH) ?? "",
    },
    webhookToken: nonEmpty(runtimeEnv.SITEWATCH_WEBHOOK_TOKEN),
  };
};
