import * as Sentry from "@sentry/node";
import type { Breadcrumb } from "@sentry/node";
import {
  monitoringConfig,
  sanitizeSentryEvent,
} from "../shared/config/monitoring";
import { getLogger } from "../shared/logger";

const logger = getLogger("sentry", "server");

let isInitialized = false;

const buildDefaultBreadcrumb = (message: string): Breadcrumb => ({
  timestamp: Date.now() / 1000,
  level: "info",
  category: "application",
  message,
});

export const captureException = (
  error: unknown,
  context?: Record<string, unknown>,
) => {
  if (!isInitialized || !monitoringConfig.sentry.enabled) {
    return;
  }

  Sentry.captureException(error, {
    contexts: context ? { metadata: context } : undefined,
  });
};

export const captureMessage = (message: string) => {
  if (!isInitialized || !monitoringConfig.sentry.enabled) {
    return;
  }

  Sentry.captureMessage(message);
};

const resolveReasonMessage = (reason: unknown): string => {
  if (reason instanceof Error && typeof reason.message === "string") {
    return reason.message;
  }

  if (typeof reason === "string") {
    return reason;
  }

  try {
    return JSON.stringify(reason);
  } catch {
    return "unknown";
  }
};

const registerProcessHandlers = () => {
  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    captureException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error =
      reason instanceof Error
        ? reason
        : new Error(resolveReasonMessage(reason));
    logger.fatal("Unhandled promise rejection", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });
};

/**
 * Starts error reporting once per process. The fatal-level process handlers
 * are installed whether or not Sentry itself is enabled.
 */
export const initSentry = () => {
  if (isInitialized) {
    return;
  }
  isInitialized = true;
  registerProcessHandlers();

  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Skipping Sentry initialisation: disabled by configuration");
    return;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    beforeSend: (event) => sanitizeSentryEvent(event),
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
  });

  Sentry.setTag("process", "server");
  Sentry.addBreadcrumb(buildDefaultBreadcrumb("Sentry initialised for server process"));
};

export const flushSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!monitoringConfig.sentry.enabled) {
    return;
  }
  await Sentry.flush(timeoutMs);
};
