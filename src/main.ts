#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { ConfigValidationError } from "./errors.js";
import { logger } from "./logger.js";

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((e: unknown) => {
  if (e instanceof ConfigValidationError) logger.error(e.message, { issues: e.issues });
  else logger.error(e instanceof Error ? e.message : String(e), { error: e });
  process.exit(1);
});
