#!/usr/bin/env node
import { createProgram } from "./cli/arg-parser.js";
import { runDump } from "./cli/exec.js";
import { DiagnosticError } from "./diagnostics/index.js";

main().catch(errorHandler);

async function main() {
  await createProgram({ dump: runDump }).parseAsync(process.argv);
}

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    console.error(error.message);
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
