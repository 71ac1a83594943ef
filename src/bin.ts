#!/usr/bin/env node
import { createCli } from "./cli.js";

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
