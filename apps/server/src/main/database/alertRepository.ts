import { type SQL, and, desc, eq } from "drizzle-orm";
import type {
  AlertDeliveryStatus,
  AlertEvent,
  AlertEventStore,
} from "../../shared/types/alert";
import { type SiteWatchDatabase, getDatabase } from "./client";
import { type AlertEventRow, alertEvents } from "./schema";

const mapRow = (row: AlertEventRow): AlertEvent => ({
  id: row.id,
  configId: row.configId,
  violationIds: [...row.violationIds],
  channel: row.channel,
  destination: row.destination,
  severity: row.severity,
  subject: row.subject,
  message: row.message,
  status: row.status,
  errorMessage: row.errorMessage,
  dispatchedAt: row.dispatchedAt,
});

export class SqliteAlertEventStore implements AlertEventStore {
  constructor(private readonly db: SiteWatchDatabase = getDatabase()) {}

  recordAlertEvent(event: AlertEvent): AlertEvent {
    const row = this.db
      .insert(alertEvents)
      .values({ ...event, violationIds: [...event.violationIds] })
      .returning()
      .get();
    return mapRow(row);
  }

  findLatestAlertEvent(configId: string): AlertEvent | null {
    const row = this.db
      .select()
      .from(alertEvents)
      .where(eq(alertEvents.configId, configId))
      .orderBy(desc(alertEvents.dispatchedAt))
      .limit(1)
      .get();
    return row ? mapRow(row) : null;
  }

  listAlertEvents(
    filters: { configId?: string; status?: AlertDeliveryStatus; limit?: number } = {},
  ): AlertEvent[] {
    const conditions: SQL[] = [];
    if (filters.configId !== undefined) {
      conditions.push(eq(alertEvents.configId, filters.configId));
    }
    if (filters.status !== undefined) {
      conditions.push(eq(alertEvents.status, filters.status));
    }
    const rows = this.db
      .select()
      .from(alertEvents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(alertEvents.dispatchedAt))
      .limit(filters.limit ?? 100)
      .all();
    return rows.map(mapRow);
  }
}
