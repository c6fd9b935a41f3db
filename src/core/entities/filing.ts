import type { ExtractionResult } from "./esg";

export const filingStatuses = [
  "pending",
  "downloading",
  "downloaded",
  "processing",
  "xml_extracted",
  "processed",
  "error",
] as const;

export type FilingStatus = (typeof filingStatuses)[number];

/**
 * Closed transition table for the per-document state machine.
 * `error` may be re-queued through `downloading`; `processed` is terminal.
 */
export const allowedTransitions: Record<FilingStatus, readonly FilingStatus[]> =
  {
    pending: ["downloading", "error"],
    downloading: ["downloaded", "error"],
    downloaded: ["processing", "error"],
    processing: ["xml_extracted", "error"],
    xml_extracted: ["processed", "error"],
    processed: [],
    error: ["downloading"],
  };

export const canTransition = (from: FilingStatus, to: FilingStatus): boolean =>
  allowedTransitions[from].includes(to);

/**
 * Lists every status a record may be in for a move into `to` to be legal.
 */
export const sourceStatusesFor = (to: FilingStatus): FilingStatus[] =>
  filingStatuses.filter((from) => canTransition(from, to));

/**
 * Statuses a record only holds while a worker owns it.
 */
export const inFlightStatuses = [
  "downloading",
  "downloaded",
  "processing",
  "xml_extracted",
] as const satisfies readonly FilingStatus[];

export type ProcessingStats = {
  processedAt: string;
  durationMs: number;
  attachmentCount: number;
  warningCount: number;
};

/**
 * Stage outputs accumulated on a record; each stage only writes its own keys.
 */
export type FilingMetadata = {
  containerPath?: string;
  markupPath?: string;
  esg?: ExtractionResult;
  stats?: ProcessingStats;
};

/**
 * Filing attributes taken from the bulk dataset when a record is created or superseded.
 */
export type FilingDraft = {
  referenceDate: Date;
  receivedAt: Date;
  version: number;
  sourceId: string;
  category: string;
  url: string;
};

export type FilingRecord = FilingDraft & {
  id: string;
  issuerCode: number;
  referenceYear: number;
  status: FilingStatus;
  retryCount: number;
  lastError: string | null;
  metadata: FilingMetadata;
  createdAt: Date;
  updatedAt: Date;
};

export type CreateOrReplaceOutcome = "inserted" | "replaced" | "unchanged";

export const emptyStatusCounts = (): Record<FilingStatus, number> => ({
  pending: 0,
  downloading: 0,
  downloaded: 0,
  processing: 0,
  xml_extracted: 0,
  processed: 0,
  error: 0,
});
