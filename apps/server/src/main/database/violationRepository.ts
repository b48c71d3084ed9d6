import { randomUUID } from "node:crypto";
import {
  type SQL,
  and,
  count,
  desc,
  eq,
  gte,
  inArray,
  isNotNull,
  isNull,
} from "drizzle-orm";
import { PersistenceConflictError } from "../../shared/errors";
import { getLogger } from "../../shared/logger";
import type { PpeItem } from "../../shared/types/detector";
import {
  type OpenViolationInput,
  SEVERITIES,
  type ViolationCloseReason,
  type ViolationFilters,
  type ViolationKey,
  type ViolationRecord,
  type ViolationStore,
  severityRank,
  violationKeyToString,
} from "../../shared/types/violation";
import { type SiteWatchDatabase, getDatabase } from "./client";
import { type ViolationRow, violations } from "./schema";

const logger = getLogger("violation-repository", "server");

const UNIQUE_CONSTRAINT_CODES = new Set([
  "SQLITE_CONSTRAINT_UNIQUE",
  "SQLITE_CONSTRAINT_PRIMARYKEY",
]);

/** Walks the cause chain looking for a SQLite unique-constraint failure. */
export const isUniqueConstraintError = (error: unknown): boolean => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    const code = Reflect.get(current, "code");
    if (typeof code === "string" && UNIQUE_CONSTRAINT_CODES.has(code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
};

const mapRow = (row: ViolationRow): ViolationRecord => ({
  id: row.id,
  sessionId: row.sessionId,
  trackId: row.trackId,
  workerId: row.workerId,
  violationType: row.violationType,
  missingPpe: [...row.missingPpe],
  detectedPpe: [...row.detectedPpe],
  severity: row.severity,
  startedAt: row.startedAt,
  lastSeenAt: row.lastSeenAt,
  endedAt: row.endedAt,
  durationMs: row.durationMs,
  evidenceRef: row.evidenceRef,
  boundingBox: { ...row.boundingBox },
  frameId: row.frameId,
  closeReason: row.closeReason,
});

const buildConditions = (filters: ViolationFilters): SQL | undefined => {
  const conditions: SQL[] = [];
  if (filters.sessionId !== undefined) {
    conditions.push(eq(violations.sessionId, filters.sessionId));
  }
  if (filters.trackId !== undefined) {
    conditions.push(eq(violations.trackId, filters.trackId));
  }
  if (filters.workerId !== undefined) {
    conditions.push(eq(violations.workerId, filters.workerId));
  }
  if (filters.violationTypes && filters.violationTypes.length > 0) {
    conditions.push(inArray(violations.violationType, [...filters.violationTypes]));
  }
  if (filters.minSeverity !== undefined) {
    const floor = severityRank(filters.minSeverity);
    conditions.push(
      inArray(
        violations.severity,
        SEVERITIES.filter((severity) => severityRank(severity) >= floor),
      ),
    );
  }
  if (filters.open === true) {
    conditions.push(isNull(violations.endedAt));
  } else if (filters.open === false) {
    conditions.push(isNotNull(violations.endedAt));
  }
  if (filters.since !== undefined) {
    conditions.push(gte(violations.startedAt, filters.since));
  }
  return conditions.length > 0 ? and(...conditions) : undefined;
};

export class SqliteViolationStore implements ViolationStore {
  constructor(private readonly db: SiteWatchDatabase = getDatabase()) {}

  openViolation(input: OpenViolationInput): ViolationRecord {
    const key: ViolationKey = {
      sessionId: input.sessionId,
      trackId: input.trackId,
      violationType: input.violationType,
    };

    try {
      const row = this.db.transaction((tx) => {
        const existing = tx
          .select({ id: violations.id })
          .from(violations)
          .where(
            and(
              eq(violations.sessionId, key.sessionId),
              eq(violations.trackId, key.trackId),
              eq(violations.violationType, key.violationType),
              isNull(violations.endedAt),
            ),
          )
          .get();
        if (existing) {
          throw new PersistenceConflictError(violationKeyToString(key));
        }

        return tx
          .insert(violations)
          .values({
            id: randomUUID(),
            sessionId: input.sessionId,
            trackId: input.trackId,
            workerId: input.workerId,
            violationType: input.violationType,
            missingPpe: [...input.missingPpe],
            detectedPpe: [...input.detectedPpe],
            severity: input.severity,
            startedAt: input.startedAt,
            lastSeenAt: input.startedAt,
            endedAt: null,
            durationMs: 0,
            evidenceRef: input.evidenceRef,
            boundingBox: { ...input.boundingBox },
            frameId: input.frameId,
            closeReason: null,
          })
          .returning()
          .get();
      });
      return mapRow(row);
    } catch (error) {
      if (error instanceof PersistenceConflictError) {
        throw error;
      }
      if (isUniqueConstraintError(error)) {
        throw new PersistenceConflictError(violationKeyToString(key), {
          cause: error,
        });
      }
      throw error;
    }
  }

  closeViolation(
    id: string,
    endedAt: number,
    reason: ViolationCloseReason,
  ): ViolationRecord | null {
    return this.db.transaction((tx) => {
      const row = tx.select().from(violations).where(eq(violations.id, id)).get();
      if (!row) {
        return null;
      }
      if (row.endedAt !== null) {
        return mapRow(row);
      }
      const closedAt = Math.max(endedAt, row.lastSeenAt);
      const updated = tx
        .update(violations)
        .set({
          endedAt: closedAt,
          lastSeenAt: closedAt,
          durationMs: closedAt - row.startedAt,
          closeReason: reason,
        })
        .where(eq(violations.id, id))
        .returning()
        .get();
      logger.debug("Violation closed", { id, reason, durationMs: updated.durationMs });
      return mapRow(updated);
    });
  }

  touchViolation(
    id: string,
    lastSeenAt: number,
    missingPpe: readonly PpeItem[],
  ): ViolationRecord | null {
    return this.db.transaction((tx) => {
      const row = tx
        .select()
        .from(violations)
        .where(and(eq(violations.id, id), isNull(violations.endedAt)))
        .get();
      if (!row) {
        return null;
      }
      const seenAt = Math.max(lastSeenAt, row.lastSeenAt);
      const updated = tx
        .update(violations)
        .set({
          lastSeenAt: seenAt,
          durationMs: seenAt - row.startedAt,
          missingPpe: [...missingPpe],
        })
        .where(eq(violations.id, id))
        .returning()
        .get();
      return mapRow(updated);
    });
  }

  findOpenViolation(key: ViolationKey): ViolationRecord | null {
    const row = this.db
      .select()
      .from(violations)
      .where(
        and(
          eq(violations.sessionId, key.sessionId),
          eq(violations.trackId, key.trackId),
          eq(violations.violationType, key.violationType),
          isNull(violations.endedAt),
        ),
      )
      .get();
    return row ? mapRow(row) : null;
  }

  listOpenViolations(filters: { sessionId: string; trackId?: number }): ViolationRecord[] {
    return this.listViolations({ ...filters, open: true });
  }

  listViolations(filters: ViolationFilters = {}): ViolationRecord[] {
    const query = this.db
      .select()
      .from(violations)
      .where(buildConditions(filters))
      .orderBy(desc(violations.startedAt), violations.id);
    const rows =
      filters.limit !== undefined ? query.limit(filters.limit).all() : query.all();
    return rows.map(mapRow);
  }

  countViolations(filters: ViolationFilters = {}): number {
    const row = this.db
      .select({ total: count() })
      .from(violations)
      .where(buildConditions(filters))
      .get();
    return row?.total ?? 0;
  }
}
