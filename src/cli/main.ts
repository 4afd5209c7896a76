#!/usr/bin/env node
import { createLogger } from "../../services/shared/src/logger.js";
import { errorMessage } from "../../services/shared/src/errors.js";
import { buildProgram } from "./program.js";

const log = createLogger("cli");

buildProgram()
  .parseAsync(process.argv)
  .catch((e) => {
    log.error("Command failed", { error: errorMessage(e) });
    process.exitCode = 1;
  });
