/**
 * pptmp4 entry point
 */

import { getLogDirectory } from "./config/paths";
import { getErrorMessage } from "./core/app-error";
import { runCli } from "./cli";
import { configureLogger, logger } from "./utils/logger";

function initializeLogging(): void {
  // The terminal belongs to the progress output; logs go to file only
  configureLogger({ console: false });
  try {
    configureLogger({ directory: getLogDirectory() });
  } catch (error) {
    process.stderr.write(`Warning: file logging disabled (${getErrorMessage(error)})\n`);
  }
}

async function main(): Promise<void> {
  initializeLogging();
  logger.info("pptmp4 starting", {
    platform: process.platform,
    arch: process.arch,
    node: process.version,
  });

  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  process.stderr.write(`Fatal: ${getErrorMessage(error)}\n`);
  process.exitCode = 1;
});
