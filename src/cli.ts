#!/usr/bin/env node
import { runCli } from "./cli-program";

runCli().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
