import { type Logger, getLogger } from "../../shared/logger";
import type {
  AlertChannel,
  AlertChannelKind,
  AlertDeliveryResult,
  AlertEvent,
} from "../../shared/types/alert";

export type AlertDraft = Omit<AlertEvent, "status" | "errorMessage">;

export class LogAlertChannel implements AlertChannel {
  readonly kind: AlertChannelKind = "log";

  constructor(private readonly logger: Logger = getLogger("alert-channel", "server")) {}

  async send(event: AlertDraft): Promise<AlertDeliveryResult> {
    this.logger.warn(event.subject, {
      alertId: event.id,
      configId: event.configId,
      destination: event.destination,
      severity: event.severity,
      violationIds: event.violationIds,
      message: event.message,
    });
    return { ok: true };
  }
}

export type WebhookAlertChannelOptions = {
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
};

/** Posts the alert as JSON to the config's destination URL. */
export class WebhookAlertChannel implements AlertChannel {
  readonly kind: AlertChannelKind = "webhook";

  private readonly fetchImpl: typeof fetch;

  private readonly headers: Record<string, string>;

  constructor(options: WebhookAlertChannelOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.headers = { ...(options.headers ?? {}) };
  }

  async send(event: AlertDraft, signal: AbortSignal): Promise<AlertDeliveryResult> {
    const response = await this.fetchImpl(event.destination, {
      method: "POST",
      headers: { "content-type": "application/json", ...this.headers },
      body: JSON.stringify({
        id: event.id,
        configId: event.configId,
        severity: event.severity,
        subject: event.subject,
        message: event.message,
        violationIds: event.violationIds,
        dispatchedAt: new Date(event.dispatchedAt).toISOString(),
      }),
      signal,
    });
    if (!response.ok) {
      return { ok: false, error: `HTTP ${response.status}` };
    }
    return { ok: true };
  }
}
