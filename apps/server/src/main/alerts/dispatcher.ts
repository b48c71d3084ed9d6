import { randomUUID } from "node:crypto";
import { KeyedMutex } from "../../shared/concurrency/keyed-mutex";
import { withTimeout } from "../../shared/concurrency/timeout";
import { AlertDeliveryError } from "../../shared/errors";
import { type Logger, getLogger, toErrorPayload } from "../../shared/logger";
import type {
  AlertChannel,
  AlertChannelKind,
  AlertConfig,
  AlertConfigProvider,
  AlertDeliveryResult,
  AlertEvent,
  AlertEventStore,
} from "../../shared/types/alert";
import {
  type Severity,
  type ViolationFilters,
  type ViolationRecord,
  type ViolationStore,
  severityRank,
} from "../../shared/types/violation";
import type { AlertingConfig } from "../../worker/config/pipeline-config";
import type { AlertDraft } from "./channels";

const MINUTE_MS = 60_000;
const MAX_LINKED_VIOLATIONS = 50;

export type AlertDispatcherOptions = {
  configs: AlertConfigProvider;
  events: AlertEventStore;
  violations: ViolationStore;
  channels: AlertChannel[];
  config: AlertingConfig;
  logger?: Logger;
};

const highestSeverity = (rows: readonly ViolationRecord[], fallback: Severity): Severity => {
  return rows.reduce<Severity>(
    (highest, row) => (severityRank(row.severity) > severityRank(highest) ? row.severity : highest),
    fallback,
  );
};

const describeTypes = (config: AlertConfig): string => {
  return config.violationTypes && config.violationTypes.length > 0
    ? config.violationTypes.join(", ")
    : "any PPE";
};

export class AlertDispatcher {
  private readonly configs: AlertConfigProvider;

  private readonly events: AlertEventStore;

  private readonly violations: ViolationStore;

  private readonly channels = new Map<AlertChannelKind, AlertChannel>();

  private readonly config: AlertingConfig;

  private readonly logger: Logger;

  private readonly mutex = new KeyedMutex();

  private readonly pending = new Set<Promise<AlertEvent[]>>();

  constructor(options: AlertDispatcherOptions) {
    this.configs = options.configs;
    this.events = options.events;
    this.violations = options.violations;
    this.config = { ...options.config };
    this.logger = options.logger ?? getLogger("alert-dispatcher", "server");
    options.channels.forEach((channel) => {
      this.channels.set(channel.kind, channel);
    });
  }

  /** Evaluates in the background; `drain` waits for everything scheduled. */
  schedule(violation: ViolationRecord, now: number = Date.now()): void {
    const task = this.evaluate(violation, now);
    this.pending.add(task);
    task
      .catch((error: unknown) => {
        this.logger.error("Alert evaluation failed", {
          violationId: violation.id,
          error: toErrorPayload(error),
        });
        return [];
      })
      .finally(() => {
        this.pending.delete(task);
      });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  async evaluate(violation: ViolationRecord, now: number = Date.now()): Promise<AlertEvent[]> {
    let configs: AlertConfig[];
    try {
      configs = await this.configs.loadConfigs();
    } catch (error) {
      this.logger.warn("Alert configs unavailable", { error: toErrorPayload(error) });
      return [];
    }

    const applicable = configs.filter(
      (config) =>
        config.enabled &&
        severityRank(config.minSeverity) <= severityRank(violation.severity) &&
        (config.violationTypes === null ||
          config.violationTypes.includes(violation.violationType)),
    );

    const fired: AlertEvent[] = [];
    for (const config of applicable) {
      const event = await this.mutex.runExclusive(config.id, () =>
        this.evaluateConfig(config, violation, now),
      );
      if (event) {
        fired.push(event);
      }
    }
    return fired;
  }

  private async evaluateConfig(
    config: AlertConfig,
    violation: ViolationRecord,
    now: number,
  ): Promise<AlertEvent | null> {
    const filters: ViolationFilters = {
      since: now - config.timeWindowMinutes * MINUTE_MS,
      minSeverity: config.minSeverity,
      violationTypes: config.violationTypes ?? undefined,
    };
    const total = this.violations.countViolations(filters);
    if (total < config.violationThreshold) {
      return null;
    }

    const latest = this.events.findLatestAlertEvent(config.id);
    if (latest && now - latest.dispatchedAt < config.cooldownMinutes * MINUTE_MS) {
      this.logger.debug("Alert suppressed by cooldown", {
        configId: config.id,
        lastDispatchedAt: latest.dispatchedAt,
      });
      return null;
    }

    const rows = this.violations.listViolations({ ...filters, limit: MAX_LINKED_VIOLATIONS });
    const draft: AlertDraft = {
      id: randomUUID(),
      configId: config.id,
      violationIds: rows.map((row) => row.id),
      channel: config.channel.kind,
      destination: config.channel.destination,
      severity: highestSeverity(rows, violation.severity),
      subject: `PPE alert: ${config.name}`,
      message:
        `${total} violation(s) of ${describeTypes(config)} in the last ` +
        `${config.timeWindowMinutes} min; latest ${violation.violationType} missing ` +
        `on ${violation.workerId ?? `track ${violation.trackId}`} (session ${violation.sessionId})`,
      dispatchedAt: now,
    };

    const result = await this.deliver(draft);
    const event: AlertEvent = {
      ...draft,
      status: result.ok ? "sent" : "failed",
      errorMessage: result.ok ? null : result.error,
    };

    try {
      this.events.recordAlertEvent(event);
    } catch (error) {
      this.logger.error("Alert event could not be stored", {
        alertId: event.id,
        configId: config.id,
        error: toErrorPayload(error),
      });
    }

    if (result.ok) {
      this.logger.info("Alert sent", {
        alertId: event.id,
        configId: config.id,
        channel: event.channel,
        violations: total,
      });
    } else {
      this.logger.warn("Alert delivery failed", {
        alertId: event.id,
        configId: config.id,
        channel: event.channel,
        error: event.errorMessage,
      });
    }
    return event;
  }

  private async deliver(draft: AlertDraft): Promise<AlertDeliveryResult> {
    const channel = this.channels.get(draft.channel);
    if (!channel) {
      return { ok: false, error: `no channel registered for ${draft.channel}` };
    }
    const timeoutMs = this.config.deliveryTimeoutMs;
    try {
      return await withTimeout(
        (signal) => channel.send(draft, signal),
        timeoutMs,
        () => new AlertDeliveryError(draft.channel, `timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      const failure =
        error instanceof AlertDeliveryError
          ? error
          : new AlertDeliveryError(draft.channel, toErrorPayload(error).message, {
              cause: error,
            });
      return { ok: false, error: failure.message };
    }
  }
}
