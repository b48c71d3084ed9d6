import type { PpeItem } from "./detector";
import type { Severity } from "./violation";

export type AlertChannelKind = "log" | "webhook";

export type AlertConfig = {
  id: string;
  name: string;
  description?: string;
  channel: {
    kind: AlertChannelKind;
    destination: string;
  };
  minSeverity: Severity;
  violationThreshold: number;
  timeWindowMinutes: number;
  cooldownMinutes: number;
  /** Null matches every PPE item. */
  violationTypes: PpeItem[] | null;
  enabled: boolean;
};

export type AlertDeliveryStatus = "sent" | "failed";

export type AlertEvent = {
  id: string;
  configId: string;
  violationIds: string[];
  channel: AlertChannelKind;
  destination: string;
  severity: Severity;
  subject: string;
  message: string;
  status: AlertDeliveryStatus;
  errorMessage: string | null;
  dispatchedAt: number;
};

export type AlertDeliveryResult =
  | { ok: true }
  | { ok: false; error: string };

export interface AlertChannel {
  readonly kind: AlertChannelKind;
  send: (
    event: Omit<AlertEvent, "status" | "errorMessage">,
    signal: AbortSignal,
  ) => Promise<AlertDeliveryResult>;
}

export interface AlertConfigProvider {
  loadConfigs: () => Promise<AlertConfig[]>;
}

export interface AlertEventStore {
  recordAlertEvent: (event: AlertEvent) => AlertEvent;
  findLatestAlertEvent: (configId: string) => AlertEvent | null;
  listAlertEvents: (filters?: { configId?: string; status?: AlertDeliveryStatus; limit?: number }) => AlertEvent[];
}
