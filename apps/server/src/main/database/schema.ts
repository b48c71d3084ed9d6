import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import type { BoundingBox, PpeItem } from "../../shared/types/detector";

export const VIOLATIONS_TABLE = "violations" as const;
export const ALERT_EVENTS_TABLE = "alert_events" as const;
export const SESSIONS_TABLE = "sessions" as const;

const PPE_ITEM_VALUES = ["helmet", "vest", "shoes", "gloves"] as const;
const SEVERITY_VALUES = ["low", "medium", "high", "critical"] as const;

export const violations = sqliteTable(
  VIOLATIONS_TABLE,
  {
    id: text("id").primaryKey().notNull(),
    sessionId: text("session_id").notNull(),
    trackId: integer("track_id").notNull(),
    workerId: text("worker_id"),
    violationType: text("violation_type", { enum: PPE_ITEM_VALUES }).notNull(),
    missingPpe: text("missing_ppe", { mode: "json" }).$type<PpeItem[]>().notNull(),
    detectedPpe: text("detected_ppe", { mode: "json" }).$type<PpeItem[]>().notNull(),
    severity: text("severity", { enum: SEVERITY_VALUES }).notNull(),
    startedAt: integer("started_at").notNull(),
    lastSeenAt: integer("last_seen_at").notNull(),
    endedAt: integer("ended_at"),
    durationMs: integer("duration_ms").notNull().default(0),
    evidenceRef: text("evidence_ref"),
    boundingBox: text("bounding_box", { mode: "json" }).$type<BoundingBox>().notNull(),
    frameId: text("frame_id").notNull(),
    closeReason: text("close_reason", {
      enum: ["recovered", "track-expired", "session-ended"],
    }),
  },
  (table) => ({
    startedAtIdx: index("violations_started_at_idx").on(table.startedAt),
    workerIdx: index("violations_worker_idx").on(table.workerId),
  }),
);

export type ViolationRow = typeof violations.$inferSelect;
export type NewViolationRow = typeof violations.$inferInsert;

export const alertEvents = sqliteTable(
  ALERT_EVENTS_TABLE,
  {
    id: text("id").primaryKey().notNull(),
    configId: text("config_id").notNull(),
    violationIds: text("violation_ids", { mode: "json" }).$type<string[]>().notNull(),
    channel: text("channel", { enum: ["log", "webhook"] }).notNull(),
    destination: text("destination").notNull(),
    severity: text("severity", { enum: SEVERITY_VALUES }).notNull(),
    subject: text("subject").notNull(),
    message: text("message").notNull(),
    status: text("status", { enum: ["sent", "failed"] }).notNull(),
    errorMessage: text("error_message"),
    dispatchedAt: integer("dispatched_at").notNull(),
  },
  (table) => ({
    configDispatchedIdx: index("alert_events_config_dispatched_idx").on(
      table.configId,
      table.dispatchedAt,
    ),
  }),
);

export type AlertEventRow = typeof alertEvents.$inferSelect;

export const sessions = sqliteTable(SESSIONS_TABLE, {
  sessionId: text("session_id").primaryKey().notNull(),
  status: text("status", { enum: ["active", "completed", "error"] }).notNull(),
  cameraId: text("camera_id"),
  location: text("location"),
  startedAt: integer("started_at"),
  endedAt: integer("ended_at"),
  frameCount: integer("frame_count").notNull().default(0),
  skippedFrames: integer("skipped_frames").notNull().default(0),
  violationCount: integer("violation_count").notNull().default(0),
});

export type SessionRow = typeof sessions.$inferSelect;

export const schema = {
  violations,
  alertEvents,
  sessions,
};
