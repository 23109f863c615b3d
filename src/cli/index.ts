#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "../core/errors.js";
import { buildProgram, exitCodeFor } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`ERROR: ${errorMessage(err)}\n`);
    process.exit(exitCodeFor(err));
  });
