/**
 * Server entry point: loads `.env`, wires the detection runtime, storage,
 * recorder, alerting and session manager, then serves HTTP intake until
 * SIGINT or SIGTERM.
 */
import "./loadEnv";
import { createServerConfig } from "../shared/config/server";
import { getLogger, toErrorPayload } from "../shared/logger";
import type { WorkerResolver } from "../shared/types/identity";
import {
  getPipelineConfig,
  updatePipelineConfig,
} from "../worker/config/pipeline-config";
import createModelRuntime, { DetectorAdapter } from "../worker/detectors";
import { LogAlertChannel, WebhookAlertChannel } from "./alerts/channels";
import { JsonFileAlertConfigProvider } from "./alerts/configProvider";
import { AlertDispatcher } from "./alerts/dispatcher";
import { SqliteAlertEventStore } from "./database/alertRepository";
import { closeDatabase, initializeDatabase } from "./database/client";
import { SqliteSessionStore } from "./database/sessionRepository";
import { SqliteViolationStore } from "./database/violationRepository";
import { startHttpServer } from "./httpServer";
import {
  NullWorkerResolver,
  StaticWorkerDirectory,
  loadWorkerDirectory,
} from "./identity/workerResolver";
import {
  captureException,
  captureMessage,
  flushSentry,
  initSentry,
} from "./sentry";
import { SessionManager } from "./session/sessionManager";
import { FileEvidenceStore } from "./violations/evidenceStore";
import { ViolationRecorder } from "./violations/recorder";

const logger = getLogger("main", "server");

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

const bootstrap = async (): Promise<void> => {
  initSentry();
  const serverConfig = createServerConfig(process.env);

  const directory = serverConfig.workersConfigPath
    ? await loadWorkerDirectory(serverConfig.workersConfigPath)
    : null;
  const pipelineConfig =
    directory && Object.keys(directory.roles).length > 0
      ? updatePipelineConfig({
          compliance: {
            roleRequirements: {
              ...getPipelineConfig().compliance.roleRequirements,
              ...directory.roles,
            },
          },
        })
      : getPipelineConfig();

  const detector = new DetectorAdapter({
    runtime: createModelRuntime(serverConfig.detector),
    config: pipelineConfig.detector,
  });
  // The server stays up without a model; health reports 503 until it loads.
  detector.initialize().catch((error: unknown) => {
    logger.warn("Serving without a detection runtime", {
      error: toErrorPayload(error),
    });
    captureMessage("Detection runtime failed to load");
  });

  const db = initializeDatabase(serverConfig.dbPath);
  const violations = new SqliteViolationStore(db);

  const recorder = new ViolationRecorder({
    store: violations,
    evidence: serverConfig.evidenceDir
      ? new FileEvidenceStore(serverConfig.evidenceDir)
      : null,
    config: pipelineConfig.violations,
    compliance: pipelineConfig.compliance,
  });

  const dispatcher = new AlertDispatcher({
    configs: new JsonFileAlertConfigProvider(serverConfig.alertsConfigPath),
    events: new SqliteAlertEventStore(db),
    violations,
    channels: [
      new LogAlertChannel(),
      new WebhookAlertChannel({
        headers: serverConfig.webhookToken
          ? { Authorization: `Bearer ${serverConfig.webhookToken}` }
          : {},
      }),
    ],
    config: pipelineConfig.alerts,
  });

  const resolver: WorkerResolver = directory
    ? new StaticWorkerDirectory({ directory })
    : new NullWorkerResolver();

  const sessions = new SessionManager({
    config: pipelineConfig,
    detector,
    recorder,
    sessions: new SqliteSessionStore(db),
    dispatcher,
    resolver,
  });

  const http = await startHttpServer(
    {
      sessions,
      detector,
      violations,
      maxFrameBytes: serverConfig.maxFrameBytes,
    },
    { host: serverConfig.host, port: serverConfig.port },
  );

  logger.info("SiteWatch server ready", {
    origin: http.origin,
    detector: serverConfig.detector.kind,
    database: serverConfig.dbPath,
    workers: directory ? Object.keys(directory.workers).length : 0,
  });

  let shuttingDown: Promise<void> | null = null;

  const shutdown = (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return shuttingDown;
    }
    logger.info("Shutting down", { signal });
    shuttingDown = (async () => {
      const closing = http.close();
      await sessions.shutdown({
        drainTimeoutMs: pipelineConfig.session.drainTimeoutMs,
      });
      await closing;
      await detector.dispose();
      closeDatabase();
      await flushSentry();
      await logger.flush();
    })();
    return shuttingDown;
  };

  SHUTDOWN_SIGNALS.forEach((signal) => {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.fatal("Shutdown failed", { error: toErrorPayload(error) });
          process.exit(1);
        },
      );
    });
  });
};

bootstrap().catch((error: unknown) => {
  logger.fatal("Server failed to start", { error: toErrorPayload(error) });
  captureException(error);
  process.exitCode = 1;
});
