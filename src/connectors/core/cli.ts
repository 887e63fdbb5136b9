#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import type { ArchiveOutcome } from "../gmail/index.js";
import { createArchiver, createDefaultDeps } from "../gmail/index.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createFileObjectStore } from "./output.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

function printOutcome(outcome: ArchiveOutcome): void {
  console.log("\n═══ Archive Summary ═══\n");
  switch (outcome.status) {
    case "rejected":
      console.log(`✗ rejected: ${outcome.error}`);
      break;
    case "failed":
      console.log(`✗ failed while ${outcome.stage}: ${outcome.error.message}`);
      break;
    case "completed": {
      const status = outcome.failed === 0 ? "✓" : "⚠";
      console.log(
        `${status} ${outcome.processed} archived, ${outcome.failed} failed`,
      );
      break;
    }
  }
}

function exitCode(outcome: ArchiveOutcome): number {
  return outcome.status === "completed" && outcome.failed === 0 ? 0 : 1;
}

const program = new Command()
  .name("gmail-archive")
  .description("Archive Gmail messages matching a query as JSON objects")
  .version("1.0.0");

program
  .command("run")
  .description("Archive every message matching a Gmail search query")
  .requiredOption("--query <q>", "Gmail search query, e.g. 'in:inbox newer_than:7d'")
  .requiredOption("--folder <id>", "Destination folder under the key prefix")
  .option(
    "--output <dir>",
    "Write to a local directory instead of the S3 bucket",
  )
  .action(async (opts: { query: string; folder: string; output?: string }) => {
    const config = loadConfig();
    const logger = createLogger("gmail-archiver");
    const output = opts.output;

    const deps = output
      ? createDefaultDeps(config, logger, () => createFileObjectStore(output))
      : createDefaultDeps(config, logger);

    const outcome = await createArchiver(deps).run({
      query: opts.query,
      folderId: opts.folder,
    });

    printOutcome(outcome);
    process.exit(exitCode(outcome));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
