import { eq } from "drizzle-orm";
import type { SessionRecord, SessionStore } from "../../shared/types/session";
import { type SiteWatchDatabase, getDatabase } from "./client";
import { type SessionRow, sessions } from "./schema";

const mapRow = (row: SessionRow): SessionRecord => ({
  sessionId: row.sessionId,
  status: row.status,
  cameraId: row.cameraId,
  location: row.location,
  startedAt: row.startedAt,
  endedAt: row.endedAt,
  frameCount: row.frameCount,
  skippedFrames: row.skippedFrames,
  violationCount: row.violationCount,
});

export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: SiteWatchDatabase = getDatabase()) {}

  createSession(record: SessionRecord): SessionRecord {
    const row = this.db.insert(sessions).values({ ...record }).returning().get();
    return mapRow(row);
  }

  updateSession(
    sessionId: string,
    patch: Partial<Omit<SessionRecord, "sessionId">>,
  ): SessionRecord | null {
    if (Object.keys(patch).length === 0) {
      return this.getSession(sessionId);
    }
    const row = this.db
      .update(sessions)
      .set(patch)
      .where(eq(sessions.sessionId, sessionId))
      .returning()
      .get();
    return row ? mapRow(row) : null;
  }

  getSession(sessionId: string): SessionRecord | null {
    const row = this.db
      .select()
      .from(sessions)
      .where(eq(sessions.sessionId, sessionId))
      .get();
    return row ? mapRow(row) : null;
  }
}
