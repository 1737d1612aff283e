#!/usr/bin/env node
import process from "node:process";
import { runCli } from "./cli.js";
import { errorMeta, logger } from "./logger.js";

void runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error("Fatal error", errorMeta(error));
    process.exitCode = 1;
  }
);
