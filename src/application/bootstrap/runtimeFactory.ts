import path from "node:path";
import type { Logger } from "pino";
import type {
  FilingRecordRepositoryPort,
  IssuerRepositoryPort,
} from "../../core/ports/outboundPorts";
import { ZipArchiveReader } from "../../infra/archive/zipArchiveReader";
import { createDb } from "../../infra/db/client";
import {
  InMemoryFilingRecordRepository,
  InMemoryIssuerRepository,
} from "../../infra/db/memoryRepositories";
import {
  PostgresFilingRecordRepositoryService,
  PostgresIssuerRepositoryService,
} from "../../infra/db/repositories";
import { HttpClient } from "../../infra/http/httpClient";
import { XmlMarkupParser } from "../../infra/markup/xmlMarkupParser";
import { CvmBulkDatasetProvider } from "../../infra/providers/cvm/cvmBulkDatasetProvider";
import { HttpContainerFetcher } from "../../infra/providers/cvm/httpContainerFetcher";
import { LocalIssuerWorkspace } from "../../infra/storage/issuerWorkspace";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import type { AppEnv } from "../../shared/config/env";
import { ArchiveResolver } from "../services/archiveResolver";
import { IngestionService } from "../services/ingestionService";
import { PipelineOrchestrator } from "../services/pipelineOrchestrator";
import { ProcessingStateTracker } from "../services/processingStateTracker";
import { StructuredExtractor } from "../services/structuredExtractor";

type Stores = {
  issuers: IssuerRepositoryPort;
  records: FilingRecordRepositoryPort;
  close: () => Promise<void>;
};

/**
 * Resolves the configured store while keeping an in-process fallback for dry runs.
 */
const createStores = (appEnv: AppEnv): Stores => {
  if (appEnv.STORE_DRIVER === "memory") {
    return {
      issuers: new InMemoryIssuerRepository(),
      records: new InMemoryFilingRecordRepository(),
      close: async () => {},
    };
  }

  const { db, sql } = createDb(appEnv.POSTGRES_URL);
  return {
    issuers: new PostgresIssuerRepositoryService(db),
    records: new PostgresFilingRecordRepositoryService(db),
    close: async () => {
      await sql.end();
    },
  };
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = (appEnv: AppEnv, logger: Logger) => {
  const stores = createStores(appEnv);
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const http = new HttpClient();
  const httpSettings = {
    timeoutMs: appEnv.HTTP_TIMEOUT_MS,
    retries: appEnv.HTTP_RETRIES,
    retryDelayMs: appEnv.HTTP_RETRY_DELAY_MS,
  };
  const workspace = new LocalIssuerWorkspace(path.resolve(appEnv.DATA_DIR));

  const tracker = new ProcessingStateTracker(
    stores.records,
    clock,
    ids,
    logger.child({ component: "tracker" }),
  );
  const ingestionService = new IngestionService(
    new CvmBulkDatasetProvider(
      http,
      appEnv.CVM_DATASET_BASE_URL,
      httpSettings,
      logger.child({ component: "dataset" }),
    ),
    stores.issuers,
    tracker,
    clock,
    logger.child({ component: "ingestion" }),
  );
  const orchestrator = new PipelineOrchestrator(
    tracker,
    new HttpContainerFetcher(
      http,
      workspace,
      httpSettings,
      logger.child({ component: "fetcher" }),
    ),
    new ArchiveResolver(
      new ZipArchiveReader(),
      workspace,
      logger.child({ component: "resolver" }),
    ),
    new StructuredExtractor(
      workspace,
      new XmlMarkupParser(),
      clock,
      logger.child({ component: "extractor" }),
    ),
    clock,
    logger.child({ component: "orchestrator" }),
    { documentTimeoutMs: appEnv.DOCUMENT_TIMEOUT_MS },
  );

  return {
    tracker,
    ingestionService,
    orchestrator,
    close: stores.close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
