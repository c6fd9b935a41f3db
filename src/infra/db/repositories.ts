import { and, asc, eq, inArray, lt, sql } from "drizzle-orm";
import {
  emptyStatusCounts,
  type FilingRecord,
  type FilingStatus,
} from "../../core/entities/filing";
import type {
  EligibleRecordsQuery,
  FilingRecordRepositoryPort,
  IssuerRepositoryPort,
  IssuerUpsert,
  StaleRecordsQuery,
  TransitionCommand,
  UpsertRecordResult,
} from "../../core/ports/outboundPorts";
import type { Database } from "./client";
import { filingRecordsTable, issuersTable } from "./schema";

/**
 * Persists issuer attributes keyed on the regulator code so repeated ingestion runs stay idempotent.
 */
export class PostgresIssuerRepositoryService implements IssuerRepositoryPort {
  constructor(private readonly db: Database) {}

  /**
   * Refreshes descriptive attributes while keeping the first-seen timestamp of the original insert.
   */
  async upsert(issuer: IssuerUpsert, at: Date): Promise<void> {
    await this.db
      .insert(issuersTable)
      .values({ ...issuer, firstSeenAt: at, updatedAt: at })
      .onConflictDoUpdate({
        target: issuersTable.issuerCode,
        set: {
          taxId: issuer.taxId,
          name: issuer.name,
          sector: issuer.sector,
          registrationStatus: issuer.registrationStatus,
          active: issuer.active,
          updatedAt: at,
        },
      });
  }
}

/**
 * Stores filing records and applies state-machine writes as single conditional statements.
 */
export class PostgresFilingRecordRepositoryService
  implements FilingRecordRepositoryPort
{
  constructor(private readonly db: Database) {}

  /**
   * Inserts a record or fully replaces the stored one only when the incoming version is higher.
   */
  async upsertLatestVersion(record: FilingRecord): Promise<UpsertRecordResult> {
    const [written] = await this.db
      .insert(filingRecordsTable)
      .values(record)
      .onConflictDoUpdate({
        target: [filingRecordsTable.issuerCode, filingRecordsTable.referenceYear],
        set: {
          referenceDate: sql`excluded.reference_date`,
          receivedAt: sql`excluded.received_at`,
          version: sql`excluded.version`,
          sourceId: sql`excluded.source_id`,
          category: sql`excluded.category`,
          url: sql`excluded.url`,
          status: sql`excluded.status`,
          retryCount: sql`excluded.retry_count`,
          lastError: sql`excluded.last_error`,
          metadata: sql`excluded.metadata`,
          createdAt: sql`excluded.created_at`,
          updatedAt: sql`excluded.updated_at`,
        },
        setWhere: sql`${filingRecordsTable.version} < excluded.version`,
      })
      .returning();

    if (written) {
      return {
        record: written,
        outcome: written.id === record.id ? "inserted" : "replaced",
      };
    }

    const [existing] = await this.db
      .select()
      .from(filingRecordsTable)
      .where(
        and(
          eq(filingRecordsTable.issuerCode, record.issuerCode),
          eq(filingRecordsTable.referenceYear, record.referenceYear),
        ),
      )
      .limit(1);

    if (!existing) {
      throw new Error(
        `Filing record for issuer ${record.issuerCode} year ${record.referenceYear} vanished during upsert.`,
      );
    }

    return { record: existing, outcome: "unchanged" };
  }

  async findById(id: string): Promise<FilingRecord | null> {
    const [row] = await this.db
      .select()
      .from(filingRecordsTable)
      .where(eq(filingRecordsTable.id, id))
      .limit(1);

    return row ?? null;
  }

  /**
   * Serves FIFO work selection gated by the retry ceiling.
   */
  async listEligible(query: EligibleRecordsQuery): Promise<FilingRecord[]> {
    if (query.statuses.length === 0 || query.limit <= 0) {
      return [];
    }

    return this.db
      .select()
      .from(filingRecordsTable)
      .where(
        and(
          inArray(filingRecordsTable.status, [...query.statuses]),
          lt(filingRecordsTable.retryCount, query.maxRetries),
        ),
      )
      .orderBy(asc(filingRecordsTable.createdAt))
      .limit(query.limit);
  }

  /**
   * Oldest untouched first, so a recovery sweep releases the longest-stuck records.
   */
  async listStale(query: StaleRecordsQuery): Promise<FilingRecord[]> {
    if (query.statuses.length === 0 || query.limit <= 0) {
      return [];
    }

    return this.db
      .select()
      .from(filingRecordsTable)
      .where(
        and(
          inArray(filingRecordsTable.status, [...query.statuses]),
          lt(filingRecordsTable.updatedAt, query.updatedBefore),
        ),
      )
      .orderBy(asc(filingRecordsTable.updatedAt))
      .limit(query.limit);
  }

  /**
   * Sets status, bumps the attempt counter and merges metadata keys in one UPDATE guarded by the current status and, when given, the version.
   */
  async applyTransition(command: TransitionCommand): Promise<FilingRecord | null> {
    if (command.fromStatuses.length === 0) {
      return null;
    }

    const patch = JSON.stringify(command.metadataPatch ?? {});
    const [row] = await this.db
      .update(filingRecordsTable)
      .set({
        status: command.status,
        updatedAt: command.at,
        retryCount: sql`${filingRecordsTable.retryCount} + 1`,
        metadata: sql`${filingRecordsTable.metadata} || ${patch}::jsonb`,
        ...(command.error === undefined ? {} : { lastError: command.error }),
      })
      .where(
        and(
          eq(filingRecordsTable.id, command.id),
          inArray(filingRecordsTable.status, [...command.fromStatuses]),
          command.expectedVersion === undefined
            ? undefined
            : eq(filingRecordsTable.version, command.expectedVersion),
        ),
      )
      .returning();

    return row ?? null;
  }

  async countByStatus(): Promise<Record<FilingStatus, number>> {
    const rows = await this.db
      .select({
        status: filingRecordsTable.status,
        count: sql<number>`count(*)::int`,
      })
      .from(filingRecordsTable)
      .groupBy(filingRecordsTable.status);

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row.status] = row.count;
    }

    return counts;
  }
}
