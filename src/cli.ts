#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { EXIT_FATAL, ScanCommand } from "./cli/ScanCommand.js";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

/** Runs one docgap invocation and resolves to its exit code. Ctrl+C ends an interactive session. */
export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);
  try {
    return await ScanCommand.run(argv, { signal: controller.signal });
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      // eslint-disable-next-line no-console
      console.error(`docgap: error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = EXIT_FATAL;
    });
}
