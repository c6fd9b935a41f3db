import { parse } from "csv-parse";
import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { z } from "zod";
import type { FetchError, ParseError } from "../../../core/entities/appError";
import type { BulkFilingRow } from "../../../core/entities/issuer";
import type {
  BulkDataset,
  BulkDatasetProviderPort,
  BulkDatasetRequest,
} from "../../../core/ports/inboundPorts";
import { openZip } from "../../archive/zipArchiveReader";
import { FILING_MARKUP_ENCODING } from "../../markup/xmlMarkupParser";
import type { HttpClient } from "../../http/httpClient";
import { toFetchError, type HttpSettings } from "./httpSettings";

const isoDay = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}/, "expected YYYY-MM-DD")
  .transform((value) => new Date(`${value.slice(0, 10)}T00:00:00.000Z`))
  .refine((value) => !Number.isNaN(value.getTime()), "invalid calendar date");

/**
 * Column contract of the regulator's FRE bulk table.
 */
const bulkRowSchema = z.object({
  CNPJ_CIA: z.string().min(1),
  DT_REFER: isoDay,
  VERSAO: z.coerce.number().int().nonnegative(),
  DENOM_CIA: z.string().min(1),
  CD_CVM: z.coerce.number().int().positive(),
  CATEG_DOC: z.string().default("FRE"),
  ID_DOC: z.string().min(1),
  DT_RECEB: isoDay,
  LINK_DOC: z.string().url(),
  SETOR_ATIV: z.string().default(""),
  SIT: z.string().default(""),
});

export const datasetFileName = (year: number): string => `fre_cia_aberta_${year}`;

const readCsvRecords = (text: string): Promise<unknown[]> =>
  new Promise((resolve, reject) => {
    parse(
      text,
      {
        delimiter: ";",
        columns: true,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      },
      (error, records: unknown) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(Array.isArray(records) ? records : []);
      },
    );
  });

export type ParsedBulkTable = {
  rows: BulkFilingRow[];
  skipped: Array<{ line: number; issues: string[] }>;
};

/**
 * Validates bulk-table records; a row that breaks the column contract is reported, never fatal.
 */
export const parseBulkTable = async (text: string): Promise<ParsedBulkTable> => {
  const records = await readCsvRecords(text);
  const rows: BulkFilingRow[] = [];
  const skipped: ParsedBulkTable["skipped"] = [];

  records.forEach((record, index) => {
    const parsed = bulkRowSchema.safeParse(record);
    if (!parsed.success) {
      skipped.push({
        // header is line 1
        line: index + 2,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return;
    }

    const row = parsed.data;
    rows.push({
      taxId: row.CNPJ_CIA,
      issuerCode: row.CD_CVM,
      issuerName: row.DENOM_CIA,
      sector: row.SETOR_ATIV,
      registrationStatus: row.SIT,
      referenceDate: row.DT_REFER,
      receivedAt: row.DT_RECEB,
      version: row.VERSAO,
      sourceId: row.ID_DOC,
      category: row.CATEG_DOC,
      url: row.LINK_DOC,
    });
  });

  return { rows, skipped };
};

/**
 * Downloads the yearly FRE bulk archive and reads its filing table.
 */
export class CvmBulkDatasetProvider implements BulkDatasetProviderPort {
  private readonly decoder = new TextDecoder(FILING_MARKUP_ENCODING);

  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string,
    private readonly settings: HttpSettings,
    private readonly logger: Logger,
  ) {}

  async fetchDataset(
    request: BulkDatasetRequest,
  ): Promise<Result<BulkDataset, FetchError | ParseError>> {
    const stem = datasetFileName(request.year);
    const sourceUrl = `${this.baseUrl.replace(/\/+$/, "")}/${stem}.zip`;

    this.logger.info({ sourceUrl }, "Downloading bulk dataset");
    const download = await this.http.requestBytes({ url: sourceUrl, ...this.settings });
    if (download.isErr()) {
      return err(toFetchError(download.error, sourceUrl));
    }

    try {
      const archive = await openZip(download.value);
      const csvMembers = archive.members.filter((member) =>
        member.toLowerCase().endsWith(".csv"),
      );
      const member = csvMembers.find((name) => name === `${stem}.csv`) ?? csvMembers[0];
      if (member === undefined) {
        return err({ kind: "parse", message: `No CSV table inside ${stem}.zip.` });
      }

      const table = await parseBulkTable(this.decoder.decode(await archive.read(member)));
      if (table.skipped.length > 0) {
        this.logger.warn(
          { member, skipped: table.skipped.length, firstIssues: table.skipped.slice(0, 5) },
          "Bulk rows failed validation and were skipped",
        );
      }

      return ok({
        sourceUrl,
        member,
        rows: table.rows,
        skippedRows: table.skipped.length,
      });
    } catch (error) {
      return err({
        kind: "parse",
        message: `Bulk dataset ${stem}.zip could not be read: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }
  }
}
