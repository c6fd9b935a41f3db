import {
  emptyStatusCounts,
  type FilingRecord,
  type FilingStatus,
} from "../../core/entities/filing";
import type { Issuer } from "../../core/entities/issuer";
import type {
  EligibleRecordsQuery,
  FilingRecordRepositoryPort,
  IssuerRepositoryPort,
  IssuerUpsert,
  StaleRecordsQuery,
  TransitionCommand,
  UpsertRecordResult,
} from "../../core/ports/outboundPorts";

const yearKey = (issuerCode: number, referenceYear: number): string =>
  `${issuerCode}|${referenceYear}`;

/**
 * Process-local issuer store used for dry runs and tests; mirrors the upsert-by-code contract of the SQL store.
 */
export class InMemoryIssuerRepository implements IssuerRepositoryPort {
  private readonly issuers = new Map<number, Issuer>();

  async upsert(issuer: IssuerUpsert, at: Date): Promise<void> {
    const existing = this.issuers.get(issuer.issuerCode);
    this.issuers.set(issuer.issuerCode, {
      ...issuer,
      firstSeenAt: existing?.firstSeenAt ?? at,
      updatedAt: at,
    });
  }

  list(): Issuer[] {
    return Array.from(this.issuers.values(), (issuer) => ({ ...issuer }));
  }
}

/**
 * Process-local filing store with the same conditional-update semantics as the SQL store.
 * Records are copied on every read and write so callers never share mutable state with the store.
 */
export class InMemoryFilingRecordRepository
  implements FilingRecordRepositoryPort
{
  private readonly byId = new Map<string, FilingRecord>();
  private readonly idByYear = new Map<string, string>();

  async upsertLatestVersion(record: FilingRecord): Promise<UpsertRecordResult> {
    const key = yearKey(record.issuerCode, record.referenceYear);
    const existingId = this.idByYear.get(key);
    const existing = existingId ? this.byId.get(existingId) : undefined;

    if (!existing) {
      this.byId.set(record.id, structuredClone(record));
      this.idByYear.set(key, record.id);
      return { record: structuredClone(record), outcome: "inserted" };
    }

    if (existing.version >= record.version) {
      return { record: structuredClone(existing), outcome: "unchanged" };
    }

    const replaced: FilingRecord = { ...structuredClone(record), id: existing.id };
    this.byId.set(existing.id, replaced);
    return { record: structuredClone(replaced), outcome: "replaced" };
  }

  async findById(id: string): Promise<FilingRecord | null> {
    const record = this.byId.get(id);
    return record ? structuredClone(record) : null;
  }

  async listEligible(query: EligibleRecordsQuery): Promise<FilingRecord[]> {
    return Array.from(this.byId.values())
      .filter(
        (record) =>
          query.statuses.includes(record.status) &&
          record.retryCount < query.maxRetries,
      )
      .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime())
      .slice(0, query.limit)
      .map((record) => structuredClone(record));
  }

  async listStale(query: StaleRecordsQuery): Promise<FilingRecord[]> {
    const cutoff = query.updatedBefore.getTime();
    return Array.from(this.byId.values())
      .filter(
        (record) =>
          query.statuses.includes(record.status) &&
          record.updatedAt.getTime() < cutoff,
      )
      .sort((left, right) => left.updatedAt.getTime() - right.updatedAt.getTime())
      .slice(0, query.limit)
      .map((record) => structuredClone(record));
  }

  async applyTransition(command: TransitionCommand): Promise<FilingRecord | null> {
    const current = this.byId.get(command.id);
    if (!current || !command.fromStatuses.includes(current.status)) {
      return null;
    }
    if (
      command.expectedVersion !== undefined &&
      current.version !== command.expectedVersion
    ) {
      return null;
    }

    const next: FilingRecord = {
      ...current,
      status: command.status,
      updatedAt: command.at,
      retryCount: current.retryCount + 1,
      lastError: command.error ?? current.lastError,
      metadata: { ...current.metadata, ...structuredClone(command.metadataPatch) },
    };
    this.byId.set(command.id, next);
    return structuredClone(next);
  }

  async countByStatus(): Promise<Record<FilingStatus, number>> {
    const counts = emptyStatusCounts();

    for (const record of this.byId.values()) {
      counts[record.status] += 1;
    }

    return counts;
  }
}
