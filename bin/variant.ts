#!/usr/bin/env npx tsx
// bin/variant.ts
// Command-line entry point for the variant state machines
//
// Run:  npx tsx bin/variant.ts <command> [args]

import { parseCliArgs, getHelpText, getVersion, runCommand } from "./variant-cli-lib";
import { loadConfig, validateConfig } from "../src/config/config";
import { createLogger } from "../src/logging/logger";
import { isDone, isFail } from "../src/outcome/outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): number {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  const loaded = loadConfig({ configFile: cliArgs.configFile });
  if (isFail(loaded)) {
    console.error(`Error: ${loaded.failure.message}`);
    return 1;
  }
  const config = loaded.value;
  const validation = validateConfig(config);
  const logger = createLogger({ level: cliArgs.verbose ? "debug" : config.log.level, scope: "variant" });

  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.valid) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    return 1;
  }

  const result = runCommand(cliArgs, config, logger);
  if (isDone(result)) {
    for (const line of result.value) {
      console.log(line);
    }
    return 0;
  }

  console.error(`Error: ${result.failure.message}`);
  return 1;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

try {
  process.exitCode = main();
} catch (error) {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
