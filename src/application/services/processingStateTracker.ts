import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import {
  canTransition,
  inFlightStatuses,
  sourceStatusesFor,
  type CreateOrReplaceOutcome,
  type FilingDraft,
  type FilingMetadata,
  type FilingRecord,
  type FilingStatus,
} from "../../core/entities/filing";
import type {
  ClockPort,
  FilingRecordRepositoryPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";

export type TrackerError = {
  code: "not_found" | "invalid_transition" | "claim_conflict" | "superseded";
  recordId: string;
  message: string;
  from?: FilingStatus;
  to: FilingStatus;
};

export type AdvanceOptions = {
  error?: string;
  metadataPatch?: FilingMetadata;
  /**
   * Only apply when the stored status still equals this value; used as the claim step.
   */
  expectedStatus?: FilingStatus;
  /**
   * Only apply while the stored record still carries this filing version.
   */
  expectedVersion?: number;
};

export type ReleaseStaleOptions = {
  olderThan: Date;
  limit: number;
};

export type NextPendingOptions = {
  limit: number;
  statuses?: readonly FilingStatus[];
  maxRetries: number;
};

/**
 * Owns every persisted status change of a filing record so retry and error bookkeeping stays in one place.
 */
export class ProcessingStateTracker {
  constructor(
    private readonly records: FilingRecordRepositoryPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly logger: Logger,
  ) {}

  /**
   * Registers a filing for (issuer, year); a higher version supersedes the stored record and restarts its processing.
   */
  async createOrReplace(
    issuerCode: number,
    referenceYear: number,
    filing: FilingDraft,
  ): Promise<{ record: FilingRecord; outcome: CreateOrReplaceOutcome }> {
    const now = this.clock.now();
    const result = await this.records.upsertLatestVersion({
      ...filing,
      id: this.ids.next(),
      issuerCode,
      referenceYear,
      status: "pending",
      retryCount: 0,
      lastError: null,
      metadata: {},
      createdAt: now,
      updatedAt: now,
    });

    this.logger.info(
      {
        recordId: result.record.id,
        issuerCode,
        referenceYear,
        version: filing.version,
        storedVersion: result.record.version,
        outcome: result.outcome,
      },
      "Filing record registered",
    );

    return result;
  }

  /**
   * Returns the oldest eligible records first; records at or above the retry ceiling never come back.
   */
  async nextPending(options: NextPendingOptions): Promise<FilingRecord[]> {
    if (options.limit <= 0) {
      return [];
    }

    return this.records.listEligible({
      statuses: options.statuses ?? ["pending"],
      maxRetries: options.maxRetries,
      limit: options.limit,
    });
  }

  /**
   * Moves a record along the transition table in one conditional write.
   * Every call counts as an attempt, and metadata patches merge per key.
   */
  async advance(
    recordId: string,
    status: FilingStatus,
    options: AdvanceOptions = {},
  ): Promise<Result<FilingRecord, TrackerError>> {
    const legalSources = sourceStatusesFor(status);
    const fromStatuses =
      options.expectedStatus === undefined
        ? legalSources
        : legalSources.filter((source) => source === options.expectedStatus);

    const updated =
      fromStatuses.length === 0
        ? null
        : await this.records.applyTransition({
            id: recordId,
            fromStatuses,
            expectedVersion: options.expectedVersion,
            status,
            error: options.error,
            metadataPatch: options.metadataPatch,
            at: this.clock.now(),
          });

    if (updated) {
      this.logger.debug(
        {
          recordId,
          status,
          retryCount: updated.retryCount,
          error: options.error,
        },
        "Filing record advanced",
      );
      return ok(updated);
    }

    return err(await this.explainRejection(recordId, status, options));
  }

  async statusCounts(): Promise<Record<FilingStatus, number>> {
    return this.records.countByStatus();
  }

  /**
   * Moves records left in an in-flight status since before `olderThan` to `error`,
   * so a worker that died mid-record does not strand them.
   */
  async releaseStale(options: ReleaseStaleOptions): Promise<FilingRecord[]> {
    if (options.limit <= 0) {
      return [];
    }

    const stale = await this.records.listStale({
      statuses: inFlightStatuses,
      updatedBefore: options.olderThan,
      limit: options.limit,
    });

    const released: FilingRecord[] = [];
    for (const record of stale) {
      const moved = await this.advance(record.id, "error", {
        error: `Stale: no progress since ${record.updatedAt.toISOString()} while ${record.status}.`,
        expectedStatus: record.status,
        expectedVersion: record.version,
      });
      if (moved.isErr()) {
        this.logger.info(
          { recordId: record.id, code: moved.error.code, reason: moved.error.message },
          "Stale filing record moved on before release",
        );
        continue;
      }
      released.push(moved.value);
    }

    this.logger.info(
      { found: stale.length, released: released.length },
      "Stale filing records released",
    );
    return released;
  }

  private async explainRejection(
    recordId: string,
    to: FilingStatus,
    options: AdvanceOptions,
  ): Promise<TrackerError> {
    const current = await this.records.findById(recordId);
    if (!current) {
      return {
        code: "not_found",
        recordId,
        to,
        message: `Filing record ${recordId} does not exist.`,
      };
    }

    if (
      options.expectedVersion !== undefined &&
      options.expectedVersion !== current.version
    ) {
      return {
        code: "superseded",
        recordId,
        from: current.status,
        to,
        message: `Filing record ${recordId} now holds version ${current.version}, expected ${options.expectedVersion}.`,
      };
    }

    const staleClaim =
      options.expectedStatus !== undefined &&
      options.expectedStatus !== current.status;

    if (!staleClaim && !canTransition(current.status, to)) {
      return {
        code: "invalid_transition",
        recordId,
        from: current.status,
        to,
        message: `Transition ${current.status} -> ${to} is not allowed.`,
      };
    }

    return {
      code: "claim_conflict",
      recordId,
      from: current.status,
      to,
      message: `Filing record ${recordId} is ${current.status}, expected ${options.expectedStatus ?? "a legal source status"}.`,
    };
  }
}
