import { err, ok, type Result } from "neverthrow";

export type HttpBytesRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  /**
   * Caller-owned cancellation; when it fires the request stops and is never retried.
   */
  signal?: AbortSignal;
};

export type HttpClientError = {
  code: "timeout" | "aborted" | "transport_error" | "non_success_status";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

/**
 * Centralizes HTTP download IO so adapters share one timeout/retry/status policy.
 */
export class HttpClient {
  /**
   * Downloads a response body with bounded retries on transport failures, timeouts, 429 and 5xx.
   */
  async requestBytes(
    request: HttpBytesRequest,
  ): Promise<Result<Uint8Array, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest(
    request: HttpBytesRequest,
  ): Promise<Result<Uint8Array, HttpClientError>> {
    if (request.signal?.aborted) {
      return err({
        code: "aborted",
        message: "HTTP request was cancelled.",
        retryable: false,
      });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return ok(new Uint8Array(await response.arrayBuffer()));
    } catch (error) {
      if (isAbortError(error) && !timedOut) {
        return err({
          code: "aborted",
          message: "HTTP request was cancelled.",
          retryable: false,
          cause: error,
        });
      }

      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
