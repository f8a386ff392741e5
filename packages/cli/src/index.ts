#!/usr/bin/env tsx
// packages/cli/src/index.ts

import { createProgram } from "./program";
import { handleCommandError } from "./utils/cli-helpers";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => handleCommandError(err, "cdn-ledger"));
