#!/usr/bin/env node
/**
 * CLI Entry Point
 * Posts the newest episodes of a podcast feed to a chat webhook, then exits.
 */
import "dotenv/config";
import { parseCliArgs, USAGE, type CliCommand } from "./config/runConfig.js";
import { runPipeline } from "./services/business/podcastPipeline.js";
import { ConfigError, describeError } from "./utils/errors.js";

async function main(argv: string[]): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${error.message}\n`);
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return;
  }

  await runPipeline(command.config);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`✗ ${describeError(error)}`);
  process.exitCode = 1;
});
