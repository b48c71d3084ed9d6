export type SiteWatchErrorCode =
  | "DETECTION_UNAVAILABLE"
  | "INFERENCE_TIMEOUT"
  | "DETECTOR_SATURATED"
  | "SESSION_NOT_ACTIVE"
  | "SESSION_BUSY"
  | "SESSION_NOT_FOUND"
  | "INVALID_FRAME"
  | "PERSISTENCE_CONFLICT"
  | "PERSISTENCE_FAILURE"
  | "ALERT_DELIVERY_FAILURE";

export class SiteWatchError extends Error {
  readonly code: SiteWatchErrorCode;

  readonly details: Record<string, unknown>;

  constructor(
    code: SiteWatchErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** The detection capability is not loaded or unhealthy. */
export class DetectionUnavailableError extends SiteWatchError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("DETECTION_UNAVAILABLE", `Detection unavailable: ${reason}`, { reason }, options);
  }
}

export class InferenceTimeoutError extends SiteWatchError {
  constructor(timeoutMs: number) {
    super("INFERENCE_TIMEOUT", `Inference exceeded ${timeoutMs}ms`, { timeoutMs });
  }
}

export class DetectorSaturatedError extends SiteWatchError {
  constructor(queued: number) {
    super("DETECTOR_SATURATED", "Inference queue is full", { queued });
  }
}

export class SessionNotActiveError extends SiteWatchError {
  constructor(sessionId: string, state: string) {
    super(
      "SESSION_NOT_ACTIVE",
      `Session ${sessionId} is ${state}; frames are only accepted while active`,
      { sessionId, state },
    );
  }
}

export class SessionBusyError extends SiteWatchError {
  constructor(sessionId: string, inFlight: number) {
    super("SESSION_BUSY", `Session ${sessionId} has ${inFlight} frames in flight`, {
      sessionId,
      inFlight,
    });
  }
}

export class SessionNotFoundError extends SiteWatchError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `Unknown session ${sessionId}`, { sessionId });
  }
}

export class InvalidFrameError extends SiteWatchError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("INVALID_FRAME", message, details);
  }
}

/** Lost a race to open the same violation; callers treat it as a no-op. */
export class PersistenceConflictError extends SiteWatchError {
  constructor(key: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_CONFLICT", `Open violation already exists for ${key}`, { key }, options);
  }
}

export class PersistenceFailureError extends SiteWatchError {
  constructor(operation: string, attempts: number, options?: { cause?: unknown }) {
    super(
      "PERSISTENCE_FAILURE",
      `${operation} failed after ${attempts} attempts`,
      { operation, attempts },
      options,
    );
  }
}

export class AlertDeliveryError extends SiteWatchError {
  constructor(channel: string, reason: string, options?: { cause?: unknown }) {
    super("ALERT_DELIVERY_FAILURE", `Alert delivery via ${channel} failed: ${reason}`, {
      channel,
      reason,
    }, options);
  }
}

export const isSiteWatchError = (
  error: unknown,
  code?: SiteWatchErrorCode,
): error is SiteWatchError => {
  if (!(error instanceof SiteWatchError)) {
    return false;
  }
  return code === undefined || error.code === code;
};
