/**
 * Describes stage-level failures that abort the current attempt of a single filing record.
 */
export type FetchError = {
  kind: "fetch";
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

export type ResolutionError = {
  kind: "resolution";
  message: string;
  expectedPattern: string;
};

export type ParseError = {
  kind: "parse";
  message: string;
  line?: number;
  column?: number;
  cause?: unknown;
};

export type StorageError = {
  kind: "storage";
  message: string;
  cause?: unknown;
};

export type TimeoutError = {
  kind: "timeout";
  message: string;
};

export type PipelineStageError =
  | FetchError
  | ResolutionError
  | ParseError
  | StorageError
  | TimeoutError;

/**
 * Non-fatal, per-field problem absorbed into a default value during extraction.
 */
export type FieldExtractionWarning = {
  field: string;
  rawValue: string;
};

const stageErrorNames: Record<PipelineStageError["kind"], string> = {
  fetch: "FetchError",
  resolution: "ResolutionError",
  parse: "ParseError",
  storage: "StorageError",
  timeout: "TimeoutError",
};

/**
 * Renders a stage error as the text stored in a record's last-error field.
 */
export const describeStageError = (error: PipelineStageError): string =>
  `${stageErrorNames[error.kind]}: ${error.message}`;

/**
 * Flattens thrown values into loggable details without leaking non-error payloads.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
