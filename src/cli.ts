#!/usr/bin/env node

import process from "node:process";
import { buildProgram } from "./commands.js";
import { loadDotEnv } from "./config.js";
import { isPortalError } from "./errors.js";

async function main(): Promise<void> {
  loadDotEnv();
  await buildProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const detail = isPortalError(error)
    ? ` [${error.kind}${error.attempts ? `, attempts=${error.attempts}` : ""}${error.artifactId ? `, artifact=${error.artifactId}` : ""}]`
    : "";
  console.error(`Error: ${message}${detail}`);
  process.exitCode = 1;
});
