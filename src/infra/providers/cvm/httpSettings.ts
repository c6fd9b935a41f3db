import type { FetchError } from "../../../core/entities/appError";
import type { HttpClientError } from "../../http/httpClient";

export type HttpSettings = {
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export const toFetchError = (error: HttpClientError, url: string): FetchError => ({
  kind: "fetch",
  message: `${error.message} (${url})`,
  retryable: error.retryable,
  httpStatus: error.httpStatus,
  cause: error.cause,
});
