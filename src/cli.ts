#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCommand } from "./command.js";

async function main() {
  const status = await runCommand(hideBin(process.argv));
  if (status !== 0) process.exit(status);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
