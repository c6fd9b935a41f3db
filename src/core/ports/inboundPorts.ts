import type { Result } from "neverthrow";
import type {
  FetchError,
  ParseError,
  PipelineStageError,
} from "../entities/appError";
import type { BulkFilingRow } from "../entities/issuer";

export type BulkDatasetRequest = {
  year: number;
};

export type BulkDataset = {
  sourceUrl: string;
  member: string;
  rows: BulkFilingRow[];
  skippedRows: number;
};

export interface BulkDatasetProviderPort {
  fetchDataset(
    request: BulkDatasetRequest,
  ): Promise<Result<BulkDataset, FetchError | ParseError>>;
}

export type ContainerFetchRequest = {
  recordId: string;
  issuerCode: number;
  url: string;
  signal?: AbortSignal;
};

export interface ContainerFetcherPort {
  fetchContainer(
    request: ContainerFetchRequest,
  ): Promise<Result<string, PipelineStageError>>;
}
