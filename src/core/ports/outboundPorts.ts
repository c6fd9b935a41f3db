import type { Result } from "neverthrow";
import type {
  ParseError,
  PipelineStageError,
  StorageError,
} from "../entities/appError";
import type {
  CreateOrReplaceOutcome,
  FilingMetadata,
  FilingRecord,
  FilingStatus,
} from "../entities/filing";
import type { Issuer } from "../entities/issuer";
import type { MarkupElement } from "../entities/markup";

export type IssuerUpsert = Omit<Issuer, "firstSeenAt" | "updatedAt">;

export interface IssuerRepositoryPort {
  upsert(issuer: IssuerUpsert, at: Date): Promise<void>;
}

export type EligibleRecordsQuery = {
  statuses: readonly FilingStatus[];
  maxRetries: number;
  limit: number;
};

export type StaleRecordsQuery = {
  statuses: readonly FilingStatus[];
  updatedBefore: Date;
  limit: number;
};

/**
 * Conditional update applied atomically by the store: it only matches when the
 * record's current status is one of `fromStatuses` and, when given, its version
 * still equals `expectedVersion`.
 */
export type TransitionCommand = {
  id: string;
  fromStatuses: readonly FilingStatus[];
  expectedVersion?: number;
  status: FilingStatus;
  error?: string;
  metadataPatch?: FilingMetadata;
  at: Date;
};

export type UpsertRecordResult = {
  record: FilingRecord;
  outcome: CreateOrReplaceOutcome;
};

export interface FilingRecordRepositoryPort {
  upsertLatestVersion(record: FilingRecord): Promise<UpsertRecordResult>;
  findById(id: string): Promise<FilingRecord | null>;
  listEligible(query: EligibleRecordsQuery): Promise<FilingRecord[]>;
  listStale(query: StaleRecordsQuery): Promise<FilingRecord[]>;
  applyTransition(command: TransitionCommand): Promise<FilingRecord | null>;
  countByStatus(): Promise<Record<FilingStatus, number>>;
}

export type SavedAttachment = {
  storagePath: string;
  created: boolean;
};

/**
 * Per-issuer working storage; directories are private to one issuer.
 */
export interface IssuerWorkspacePort {
  writeFile(
    issuerCode: number,
    name: string,
    bytes: Uint8Array,
  ): Promise<Result<string, StorageError>>;
  saveAttachment(
    issuerCode: number,
    filename: string,
    bytes: Uint8Array,
  ): Promise<Result<SavedAttachment, StorageError>>;
  readFile(path: string): Promise<Result<Uint8Array, StorageError>>;
}

export interface ArchiveHandle {
  readonly members: readonly string[];
  read(member: string): Promise<Uint8Array>;
}

export interface ArchiveReaderPort {
  open(containerPath: string): Promise<Result<ArchiveHandle, PipelineStageError>>;
}

export interface MarkupParserPort {
  parse(bytes: Uint8Array): Result<MarkupElement, ParseError>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
