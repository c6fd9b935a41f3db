import type { Result } from "neverthrow";
import type { Logger } from "pino";
import {
  describeStageError,
  toErrorDetails,
  type PipelineStageError,
  type TimeoutError,
} from "../../core/entities/appError";
import type {
  FilingMetadata,
  FilingRecord,
  FilingStatus,
} from "../../core/entities/filing";
import type { ContainerFetcherPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import type { ArchiveResolver } from "./archiveResolver";
import type {
  ProcessingStateTracker,
  TrackerError,
} from "./processingStateTracker";
import type { StructuredExtractor } from "./structuredExtractor";

export type BatchOptions = {
  limit: number;
  maxRetries: number;
  includeErrors?: boolean;
  concurrency?: number;
};

export type BatchSummary = {
  selected: number;
  processed: number;
  failed: number;
  skipped: number;
};

export type OrchestratorSettings = {
  documentTimeoutMs: number;
};

type RecordOutcome = "processed" | "failed" | "skipped";

/**
 * Signals that the current record should stop; carries the text written as its last error.
 */
class RecordAbort {
  constructor(readonly lastError: string) {}
}

/**
 * The stored record moved on without this worker (superseded, released or re-claimed); nothing more may be written to it.
 */
class RecordLost {
  constructor(readonly reason: TrackerError) {}
}

/**
 * One claimed attempt; `status` follows every write this worker made.
 */
type RecordRun = {
  record: FilingRecord;
  status: FilingStatus;
  signal: AbortSignal;
  startedAt: Date;
};

/**
 * Drives filing records through fetch, resolve and extract, one isolated attempt per record.
 */
export class PipelineOrchestrator {
  constructor(
    private readonly tracker: ProcessingStateTracker,
    private readonly fetcher: ContainerFetcherPort,
    private readonly resolver: ArchiveResolver,
    private readonly extractor: StructuredExtractor,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly settings: OrchestratorSettings,
  ) {}

  /**
   * Pulls one batch from the tracker and works it through `concurrency` lanes.
   * A failed record never stops the batch.
   */
  async runBatch(options: BatchOptions): Promise<BatchSummary> {
    const statuses: FilingStatus[] = options.includeErrors
      ? ["pending", "error"]
      : ["pending"];
    const records = await this.tracker.nextPending({
      limit: options.limit,
      statuses,
      maxRetries: options.maxRetries,
    });

    const summary: BatchSummary = {
      selected: records.length,
      processed: 0,
      failed: 0,
      skipped: 0,
    };

    if (records.length === 0) {
      this.logger.info({ statuses }, "No eligible filing records");
      return summary;
    }

    const lanes = Math.max(1, Math.min(options.concurrency ?? 1, records.length));
    let cursor = 0;

    const lane = async (): Promise<void> => {
      for (let record = records[cursor++]; record; record = records[cursor++]) {
        const outcome = await this.processRecord(record);
        summary[outcome] += 1;
      }
    };

    await Promise.all(Array.from({ length: lanes }, () => lane()));

    this.logger.info({ ...summary, lanes }, "Filing batch finished");
    return summary;
  }

  private async processRecord(record: FilingRecord): Promise<RecordOutcome> {
    let claim: Result<FilingRecord, TrackerError>;
    try {
      claim = await this.tracker.advance(record.id, "downloading", {
        expectedStatus: record.status,
        expectedVersion: record.version,
      });
    } catch (error) {
      this.logger.error(
        { recordId: record.id, error: toErrorDetails(error) },
        "Filing record claim failed",
      );
      return "failed";
    }
    if (claim.isErr()) {
      this.logger.info(
        { recordId: record.id, code: claim.error.code, reason: claim.error.message },
        "Filing record not claimed; skipping",
      );
      return "skipped";
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.settings.documentTimeoutMs);
    const run: RecordRun = {
      record,
      status: "downloading",
      signal: controller.signal,
      startedAt: this.clock.now(),
    };

    try {
      await this.runStages(run);
      return "processed";
    } catch (error) {
      if (error instanceof RecordLost) {
        this.logger.info(
          { recordId: record.id, code: error.reason.code, reason: error.reason.message },
          "Filing record changed while in flight; dropping this attempt",
        );
        return "skipped";
      }

      const lastError =
        error instanceof RecordAbort
          ? error.lastError
          : error instanceof Error
            ? error.message
            : String(error);
      await this.markFailed(run, lastError);
      return "failed";
    } finally {
      clearTimeout(timer);
    }
  }

  private async runStages(run: RecordRun): Promise<void> {
    const { record, signal } = run;

    const fetched = await this.untilDeadline(
      this.fetcher.fetchContainer({
        recordId: record.id,
        issuerCode: record.issuerCode,
        url: record.url,
        signal,
      }),
      signal,
    );
    if (fetched.isErr()) {
      throw this.stageAbort(fetched.error, signal);
    }
    const containerPath = fetched.value;
    await this.step(run, "downloaded", { containerPath });

    await this.step(run, "processing");

    const markup = await this.untilDeadline(
      this.resolver.resolve(record, containerPath),
      signal,
    );
    if (markup.isErr()) {
      throw this.stageAbort(markup.error, signal);
    }
    const markupPath = markup.value;
    await this.step(run, "xml_extracted", { markupPath });

    const extraction = await this.untilDeadline(
      this.extractor.extract(record.issuerCode, markupPath),
      signal,
    );
    if (extraction.isErr()) {
      throw this.stageAbort(extraction.error, signal);
    }
    const esg = extraction.value;

    const finishedAt = this.clock.now();
    await this.step(run, "processed", {
      esg,
      stats: {
        processedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - run.startedAt.getTime(),
        attachmentCount: Object.keys(esg.attachments).length,
        warningCount: esg.warnings.length,
      },
    });

    this.logger.info(
      {
        recordId: record.id,
        issuerCode: record.issuerCode,
        attachments: Object.keys(esg.attachments).length,
        warnings: esg.warnings.length,
      },
      "Filing record processed",
    );
  }

  /**
   * Writes the next status only if the record is still the version and status this worker left it in.
   */
  private async step(
    run: RecordRun,
    status: FilingStatus,
    metadataPatch?: FilingMetadata,
  ): Promise<void> {
    this.checkDeadline(run.signal);

    const advanced = await this.tracker.advance(run.record.id, status, {
      metadataPatch,
      expectedStatus: run.status,
      expectedVersion: run.record.version,
    });
    if (advanced.isErr()) {
      throw new RecordLost(advanced.error);
    }
    run.status = status;
  }

  /**
   * Settles with the stage's own result, or rejects with the timeout once the deadline fires.
   * A stage that ignores the signal keeps running detached; its result is dropped.
   */
  private untilDeadline<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(new RecordAbort(describeStageError(this.timeoutError())));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new RecordAbort(describeStageError(this.timeoutError())));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      void work.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  private checkDeadline(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new RecordAbort(describeStageError(this.timeoutError()));
    }
  }

  /**
   * A stage failing after the deadline fired is reported as the timeout, not as the stage's own error.
   */
  private stageAbort(error: PipelineStageError, signal: AbortSignal): RecordAbort {
    const effective = signal.aborted ? this.timeoutError() : error;
    return new RecordAbort(describeStageError(effective));
  }

  private timeoutError(): TimeoutError {
    return {
      kind: "timeout",
      message: `Document processing exceeded ${this.settings.documentTimeoutMs}ms.`,
    };
  }

  private async markFailed(run: RecordRun, lastError: string): Promise<void> {
    const { record } = run;

    let marked: Result<FilingRecord, TrackerError>;
    try {
      marked = await this.tracker.advance(record.id, "error", {
        error: lastError,
        expectedStatus: run.status,
        expectedVersion: record.version,
      });
    } catch (error) {
      this.logger.error(
        { recordId: record.id, lastError, error: toErrorDetails(error) },
        "Failed filing record could not be moved to error",
      );
      return;
    }

    if (marked.isErr()) {
      this.logger.warn(
        { recordId: record.id, lastError, trackerError: marked.error },
        "Failed filing record changed before it could be moved to error",
      );
      return;
    }

    this.logger.warn(
      { recordId: record.id, issuerCode: record.issuerCode, lastError },
      "Filing record failed",
    );
  }
}
