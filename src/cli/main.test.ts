import pino from "pino";
import { describe, expect, it } from "vitest";
import { parseEnv } from "../shared/config/env";
import { buildCli } from "./main";

describe("buildCli", () => {
  const logger = pino({ level: "silent" });

  it("exposes the pipeline commands", () => {
    const cli = buildCli(parseEnv({ STORE_DRIVER: "memory" }), logger);

    expect(cli.commands.map((command) => command.name())).toEqual([
      "ingest",
      "process",
      "run",
      "release-stale",
      "status",
    ]);
  });

  it("defaults batch options from the environment", () => {
    const cli = buildCli(
      parseEnv({ STORE_DRIVER: "memory", PIPELINE_BATCH_SIZE: "12", PIPELINE_CONCURRENCY: "3" }),
      logger,
    );
    const processCommand = cli.commands.find((command) => command.name() === "process");

    expect(processCommand?.opts()).toEqual({ limit: 12, maxRetries: 3, concurrency: 3 });
  });

  it("runs a process batch against the in-memory store", async () => {
    const cli = buildCli(parseEnv({ STORE_DRIVER: "memory" }), logger);
    cli.exitOverride();

    await expect(
      cli.parseAsync(["process", "--limit", "2", "--include-errors"], { from: "user" }),
    ).resolves.toBe(cli);
  });

  it("releases stale records against the in-memory store", async () => {
    const cli = buildCli(parseEnv({ STORE_DRIVER: "memory" }), logger);
    cli.exitOverride();

    await expect(
      cli.parseAsync(["release-stale", "--older-than-minutes", "30"], { from: "user" }),
    ).resolves.toBe(cli);
  });

  it("rejects a non-numeric limit", async () => {
    const cli = buildCli(parseEnv({ STORE_DRIVER: "memory" }), logger);
    cli.exitOverride();
    for (const command of cli.commands) {
      command.exitOverride().configureOutput({ writeErr: () => {} });
    }

    await expect(cli.parseAsync(["process", "--limit", "ten"], { from: "user" })).rejects.toThrow(
      "Expected a positive integer.",
    );
  });
});
