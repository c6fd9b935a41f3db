import type { Logger } from "pino";
import { toErrorDetails } from "../../core/entities/appError";
import type { CreateOrReplaceOutcome } from "../../core/entities/filing";
import type { BulkFilingRow } from "../../core/entities/issuer";
import type { BulkDatasetProviderPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IssuerRepositoryPort,
} from "../../core/ports/outboundPorts";
import { selectLatestFilings } from "./filingSelector";
import type { ProcessingStateTracker } from "./processingStateTracker";

export type IngestionSummary = {
  year: number;
  rows: number;
  selected: number;
  inserted: number;
  replaced: number;
  unchanged: number;
  failed: number;
};

/**
 * Seeds the tracker from the regulator's bulk table so processing batches only ever see one filing per issuer and year.
 */
export class IngestionService {
  constructor(
    private readonly datasets: BulkDatasetProviderPort,
    private readonly issuers: IssuerRepositoryPort,
    private readonly tracker: ProcessingStateTracker,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  /**
   * Fails the whole run only when the dataset cannot be obtained; a bad row is logged and counted.
   */
  async run(year = this.clock.now().getUTCFullYear()): Promise<IngestionSummary> {
    const dataset = await this.datasets.fetchDataset({ year });
    if (dataset.isErr()) {
      throw new Error(
        `Bulk dataset for ${year} could not be loaded: ${dataset.error.message}`,
      );
    }

    const { rows, skippedRows, sourceUrl, member } = dataset.value;
    const selected = selectLatestFilings(rows);
    this.logger.info(
      { year, sourceUrl, member, rows: rows.length, skippedRows, selected: selected.length },
      "Bulk dataset loaded",
    );

    const summary: IngestionSummary = {
      year,
      rows: rows.length,
      selected: selected.length,
      inserted: 0,
      replaced: 0,
      unchanged: 0,
      failed: 0,
    };

    for (const row of selected) {
      try {
        const outcome = await this.register(row);
        summary[outcome] += 1;
      } catch (error) {
        summary.failed += 1;
        this.logger.error(
          { taxId: row.taxId, issuerCode: row.issuerCode, error: toErrorDetails(error) },
          "Filing row could not be registered",
        );
      }
    }

    this.logger.info(summary, "Ingestion finished");
    return summary;
  }

  private async register(row: BulkFilingRow): Promise<CreateOrReplaceOutcome> {
    await this.issuers.upsert(
      {
        issuerCode: row.issuerCode,
        taxId: row.taxId,
        name: row.issuerName,
        sector: row.sector,
        registrationStatus: row.registrationStatus,
        active: true,
      },
      this.clock.now(),
    );

    const { outcome } = await this.tracker.createOrReplace(
      row.issuerCode,
      row.referenceDate.getUTCFullYear(),
      {
        referenceDate: row.referenceDate,
        receivedAt: row.receivedAt,
        version: row.version,
        sourceId: row.sourceId,
        category: row.category,
        url: row.url,
      },
    );

    return outcome;
  }
}
