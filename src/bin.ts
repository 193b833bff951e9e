#!/usr/bin/env node
import { main } from "./index.js";
import { installInterruptHandler } from "./interrupt.js";
import { errorMessage, log } from "./logger.js";

installInterruptHandler((message) => console.log(message));

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log("error", "Unexpected failure", { error: errorMessage(error) });
    process.exitCode = 1;
  }
);
