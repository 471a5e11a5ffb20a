#!/usr/bin/env node
import { main } from "./cli";
import { errorMessage } from "./errors";

main().catch((err: unknown) => {
  process.stderr.write(`${errorMessage(err)}\n`);
  process.exitCode = 2;
});
