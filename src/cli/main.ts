import { Command, InvalidArgumentError } from "commander";
import type { Logger } from "pino";
import { createRuntime, type Runtime } from "../application/bootstrap/runtimeFactory";
import { env, logLevel, type AppEnv } from "../shared/config/env";
import { createLogger } from "../shared/logger/logger";

const positiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

type ProcessOptions = {
  limit: number;
  maxRetries: number;
  includeErrors?: boolean;
  concurrency: number;
};

/**
 * Opens the runtime for one command and always releases its connections.
 */
const withRuntime = async (
  appEnv: AppEnv,
  logger: Logger,
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = createRuntime(appEnv, logger);
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

const addProcessOptions = (command: Command, appEnv: AppEnv): Command =>
  command
    .option("--limit <n>", "Records to pull in this batch", positiveInt, appEnv.PIPELINE_BATCH_SIZE)
    .option(
      "--max-retries <n>",
      "Skip records with at least this many attempts",
      positiveInt,
      appEnv.PIPELINE_MAX_RETRIES,
    )
    .option("--include-errors", "Also retry records currently in error")
    .option(
      "--concurrency <n>",
      "Records processed in parallel",
      positiveInt,
      appEnv.PIPELINE_CONCURRENCY,
    );

/**
 * Defines a single command surface so operational tasks share the same wiring and policies.
 */
export const buildCli = (
  appEnv: AppEnv = env,
  logger: Logger = createLogger({ level: logLevel(appEnv) }),
) => {
  const cli = new Command();
  cli.name("filing-esg").description("Regulatory filing ESG ingestion pipeline");

  cli
    .command("ingest")
    .description("Load the yearly bulk dataset and register the latest filing per issuer")
    .option("--year <year>", "Dataset year (defaults to the current year)", positiveInt)
    .action(async (opts: { year?: number }) => {
      await withRuntime(appEnv, logger, async (runtime) => {
        await runtime.ingestionService.run(opts.year);
      });
    });

  addProcessOptions(
    cli.command("process").description("Run one processing batch over eligible filing records"),
    appEnv,
  ).action(async (opts: ProcessOptions) => {
    await withRuntime(appEnv, logger, async (runtime) => {
      await runtime.orchestrator.runBatch(opts);
    });
  });

  addProcessOptions(
    cli.command("run").description("Ingest the current dataset, then run one processing batch"),
    appEnv,
  ).action(async (opts: ProcessOptions) => {
    await withRuntime(appEnv, logger, async (runtime) => {
      await runtime.ingestionService.run();
      await runtime.orchestrator.runBatch(opts);
    });
  });

  cli
    .command("release-stale")
    .description("Move records stuck mid-pipeline to error so a later batch can retry them")
    .option(
      "--older-than-minutes <n>",
      "Only records without progress for this long",
      positiveInt,
      60,
    )
    .option("--limit <n>", "Records to release", positiveInt, appEnv.PIPELINE_BATCH_SIZE)
    .action(async (opts: { olderThanMinutes: number; limit: number }) => {
      await withRuntime(appEnv, logger, async (runtime) => {
        await runtime.tracker.releaseStale({
          olderThan: new Date(Date.now() - opts.olderThanMinutes * 60_000),
          limit: opts.limit,
        });
      });
    });

  cli
    .command("status")
    .description("Report filing records per status and the effective configuration")
    .action(async () => {
      await withRuntime(appEnv, logger, async (runtime) => {
        const counts = await runtime.tracker.statusCounts();
        logger.info(
          {
            counts,
            store: appEnv.STORE_DRIVER,
            dataDir: appEnv.DATA_DIR,
            datasetBaseUrl: appEnv.CVM_DATASET_BASE_URL,
            batchSize: appEnv.PIPELINE_BATCH_SIZE,
            maxRetries: appEnv.PIPELINE_MAX_RETRIES,
            concurrency: appEnv.PIPELINE_CONCURRENCY,
            documentTimeoutMs: appEnv.DOCUMENT_TIMEOUT_MS,
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
