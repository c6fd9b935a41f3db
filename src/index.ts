#!/usr/bin/env node
import { runCli } from "./cli/main";
import { toErrorDetails } from "./core/entities/appError";
import { env, logLevel } from "./shared/config/env";
import { createLogger } from "./shared/logger/logger";

runCli(process.argv).catch((error: unknown) => {
  const logger = createLogger({ level: logLevel(env) });
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
