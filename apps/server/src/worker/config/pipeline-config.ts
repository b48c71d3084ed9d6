import { getEnvVar, parseListEnv, parseNumericEnv } from "../../shared/env";
import { PPE_ITEMS, type PpeItem, isPpeItem } from "../../shared/types/detector";

export type DetectorConfig = {
  /** Detections below this confidence are dropped before matching. */
  confidenceFloor: number;
  inferenceTimeoutMs: number;
  maxConcurrentInferences: number;
  /** Callers allowed to wait for an inference slot before rejection. */
  maxQueuedInferences: number;
};

export type TrackingConfig = {
  /** Minimum IoU for a person detection to continue an existing track. */
  iouThreshold: number;
  /** A track is expired once its silent-frame counter exceeds this. */
  maxMissedFrames: number;
  /** Box growth per side, as a fraction of width/height, when attributing items. */
  itemMargin: number;
};

export type ComplianceConfig = {
  windowSize: number;
  /** Share of positive observations needed for an item to be compliant. */
  confirmationRatio: number;
  requiredPpe: PpeItem[];
  /** Role name to required items, applied once a worker is resolved. */
  roleRequirements: Record<string, PpeItem[]>;
  /** Missing share at or above which a violation is rated `high`. */
  highSeverityMissingShare: number;
};

export type SessionConfig = {
  maxInFlightFrames: number;
  drainTimeoutMs: number;
  /** A session with no frame for this long is closed; 0 keeps it open. */
  idleTimeoutMs: number;
};

export type ViolationConfig = {
  /** Minimum interval between `lastSeenAt` writes for an open violation. */
  updateIntervalMs: number;
  persistenceRetries: number;
  retryBaseDelayMs: number;
};

export type IdentityConfig = {
  resolveTimeoutMs: number;
  /** Unresolved tracks are retried every N frames they are seen. */
  retryEveryFrames: number;
};

export type AlertingConfig = {
  deliveryTimeoutMs: number;
};

export type PipelineConfig = {
  detector: DetectorConfig;
  tracking: TrackingConfig;
  compliance: ComplianceConfig;
  session: SessionConfig;
  violations: ViolationConfig;
  identity: IdentityConfig;
  alerts: AlertingConfig;
};

export type PipelineConfigOverrides = Partial<{
  [K in keyof PipelineConfig]: Partial<PipelineConfig[K]>;
}>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  detector: {
    confidenceFloor: 0.5,
    inferenceTimeoutMs: 2000,
    maxConcurrentInferences: 2,
    maxQueuedInferences: 8,
  },
  tracking: {
    iouThreshold: 0.3,
    maxMissedFrames: 10,
    itemMargin: 0.1,
  },
  compliance: {
    windowSize: 5,
    confirmationRatio: 0.6,
    requiredPpe: [...PPE_ITEMS],
    roleRequirements: {},
    highSeverityMissingShare: 0.5,
  },
  session: {
    maxInFlightFrames: 4,
    drainTimeoutMs: 5000,
    idleTimeoutMs: 300000,
  },
  violations: {
    updateIntervalMs: 1000,
    persistenceRetries: 3,
    retryBaseDelayMs: 50,
  },
  identity: {
    resolveTimeoutMs: 500,
    retryEveryFrames: 15,
  },
  alerts: {
    deliveryTimeoutMs: 5000,
  },
};

const cloneRoleRequirements = (
  roles: Record<string, PpeItem[]>,
): Record<string, PpeItem[]> => {
  return Object.fromEntries(
    Object.entries(roles).map(([role, items]) => [role, [...items]]),
  );
};

export const clonePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  return {
    detector: { ...config.detector },
    tracking: { ...config.tracking },
    compliance: {
      ...config.compliance,
      requiredPpe: [...config.compliance.requiredPpe],
      roleRequirements: cloneRoleRequirements(config.compliance.roleRequirements),
    },
    session: { ...config.session },
    violations: { ...config.violations },
    identity: { ...config.identity },
    alerts: { ...config.alerts },
  };
};

export const mergePipelineConfig = (
  current: PipelineConfig,
  overrides?: PipelineConfigOverrides,
): PipelineConfig => {
  if (!overrides) {
    return clonePipelineConfig(current);
  }

  return clonePipelineConfig({
    detector: { ...current.detector, ...(overrides.detector ?? {}) },
    tracking: { ...current.tracking, ...(overrides.tracking ?? {}) },
    compliance: { ...current.compliance, ...(overrides.compliance ?? {}) },
    session: { ...current.session, ...(overrides.session ?? {}) },
    violations: { ...current.violations, ...(overrides.violations ?? {}) },
    identity: { ...current.identity, ...(overrides.identity ?? {}) },
    alerts: { ...current.alerts, ...(overrides.alerts ?? {}) },
  });
};

const pick = <T extends object>(entries: Partial<T>): Partial<T> | undefined => {
  return Object.keys(entries).length > 0 ? entries : undefined;
};

const setIfPresent = <T extends object, K extends keyof T>(
  target: Partial<T>,
  key: K,
  value: T[K] | null,
): void => {
  if (value !== null) {
    target[key] = value;
  }
};

export const createPipelineEnvOverrides = (): PipelineConfigOverrides => {
  const detector: Partial<DetectorConfig> = {};
  setIfPresent(
    detector,
    "confidenceFloor",
    parseNumericEnv(getEnvVar("SITEWATCH_CONFIDENCE_FLOOR"), { min: 0, max: 1 }),
  );
  setIfPresent(
    detector,
    "inferenceTimeoutMs",
    parseNumericEnv(getEnvVar("SITEWATCH_INFERENCE_TIMEOUT_MS"), {
      min: 10,
      max: 60000,
      integer: true,
    }),
  );
  setIfPresent(
    detector,
    "maxConcurrentInferences",
    parseNumericEnv(getEnvVar("SITEWATCH_MAX_CONCURRENT_INFERENCES"), {
      min: 1,
      max: 64,
      integer: true,
    }),
  );
  setIfPresent(
    detector,
    "maxQueuedInferences",
    parseNumericEnv(getEnvVar("SITEWATCH_MAX_QUEUED_INFERENCES"), {
      min: 0,
      max: 1024,
      integer: true,
    }),
  );

  const tracking: Partial<TrackingConfig> = {};
  setIfPresent(
    tracking,
    "iouThreshold",
    parseNumericEnv(getEnvVar("SITEWATCH_IOU_THRESHOLD"), { min: 0, max: 1 }),
  );
  setIfPresent(
    tracking,
    "maxMissedFrames",
    parseNumericEnv(getEnvVar("SITEWATCH_TRACK_MAX_MISSED_FRAMES"), {
      min: 0,
      max: 10000,
      integer: true,
    }),
  );

  const compliance: Partial<ComplianceConfig> = {};
  setIfPresent(
    compliance,
    "windowSize",
    parseNumericEnv(getEnvVar("SITEWATCH_WINDOW_SIZE"), {
      min: 1,
      max: 300,
      integer: true,
    }),
  );
  setIfPresent(
    compliance,
    "confirmationRatio",
    parseNumericEnv(getEnvVar("SITEWATCH_CONFIRMATION_RATIO"), { min: 0, max: 1 }),
  );
  setIfPresent(
    compliance,
    "requiredPpe",
    parseListEnv(getEnvVar("SITEWATCH_REQUIRED_PPE"), isPpeItem),
  );

  const session: Partial<SessionConfig> = {};
  setIfPresent(
    session,
    "maxInFlightFrames",
    parseNumericEnv(getEnvVar("SITEWATCH_MAX_IN_FLIGHT_FRAMES"), {
      min: 1,
      max: 256,
      integer: true,
    }),
  );
  setIfPresent(
    session,
    "idleTimeoutMs",
    parseNumericEnv(getEnvVar("SITEWATCH_SESSION_IDLE_TIMEOUT_MS"), {
      min: 0,
      max: 86400000,
      integer: true,
    }),
  );

  const alerts: Partial<AlertingConfig> = {};
  setIfPresent(
    alerts,
    "deliveryTimeoutMs",
    parseNumericEnv(getEnvVar("SITEWATCH_ALERT_TIMEOUT_MS"), {
      min: 100,
      max: 60000,
      integer: true,
    }),
  );

  return {
    detector: pick(detector),
    tracking: pick(tracking),
    compliance: pick(compliance),
    session: pick(session),
    alerts: pick(alerts),
  };
};

let activePipelineConfig: PipelineConfig | null = null;

export const getPipelineConfig = (): PipelineConfig => {
  if (!activePipelineConfig) {
    activePipelineConfig = mergePipelineConfig(
      DEFAULT_PIPELINE_CONFIG,
      createPipelineEnvOverrides(),
    );
  }
  return clonePipelineConfig(activePipelineConfig);
};

export const updatePipelineConfig = (
  overrides: PipelineConfigOverrides,
): PipelineConfig => {
  activePipelineConfig = mergePipelineConfig(getPipelineConfig(), overrides);
  return getPipelineConfig();
};

export const resetPipelineConfig = (): PipelineConfig => {
  activePipelineConfig = null;
  return getPipelineConfig();
};
