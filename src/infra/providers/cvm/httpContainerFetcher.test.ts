import { err, ok } from "neverthrow";
import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { IssuerWorkspacePort } from "../../../core/ports/outboundPorts";
import { HttpClient } from "../../http/httpClient";
import { HttpContainerFetcher } from "./httpContainerFetcher";

const logger = pino({ level: "silent" });
const settings = { timeoutMs: 1_000, retries: 0, retryDelayMs: 1 };

const workspace = () => {
  const writes: Array<{ issuerCode: number; name: string; size: number }> = [];
  const port: IssuerWorkspacePort = {
    writeFile: async (issuerCode, name, bytes) => {
      writes.push({ issuerCode, name, size: bytes.length });
      return ok(`/data/${issuerCode}/${name}`);
    },
    saveAttachment: async () => err({ kind: "storage", message: "unused" }),
    readFile: async () => err({ kind: "storage", message: "unused" }),
  };
  return { port, writes };
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpContainerFetcher", () => {
  it("stores the downloaded container under the record id", async () => {
    vi.stubGlobal("fetch", async () => new Response(new Uint8Array([80, 75, 3, 4]), { status: 200 }));
    const { port, writes } = workspace();
    const fetcher = new HttpContainerFetcher(new HttpClient(), port, settings, logger);

    const result = await fetcher.fetchContainer({
      recordId: "rec-9",
      issuerCode: 14206,
      url: "https://example.test/doc/9",
    });

    expect(result._unsafeUnwrap()).toBe("/data/14206/rec-9.zip");
    expect(writes).toEqual([{ issuerCode: 14206, name: "rec-9.zip", size: 4 }]);
  });

  it("maps HTTP failures to fetch errors and writes nothing", async () => {
    vi.stubGlobal("fetch", async () => new Response("boom", { status: 503 }));
    const { port, writes } = workspace();
    const fetcher = new HttpContainerFetcher(new HttpClient(), port, settings, logger);

    const result = await fetcher.fetchContainer({
      recordId: "rec-9",
      issuerCode: 14206,
      url: "https://example.test/doc/9",
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      kind: "fetch",
      message: "HTTP request failed with status 503. (https://example.test/doc/9)",
      retryable: true,
      httpStatus: 503,
      cause: undefined,
    });
    expect(writes).toEqual([]);
  });
});
