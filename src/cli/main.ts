#!/usr/bin/env node
import { buildProgram } from "./autoheal-cli.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((e) => {
    console.error("[autoheal] Fatal error:", e);
    process.exit(1);
  });
