#!/usr/bin/env node
import { config } from "dotenv";
config();

import { EXIT_CODES } from "./constant.js";
import { runCli } from "./program.js";
import { log } from "./util/logger.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    log.fatal(String(error));
    process.exitCode = EXIT_CODES.FAILURE;
  });
