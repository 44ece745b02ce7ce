#!/usr/bin/env node
/**
 * mrzscan <command> [options]
 */

import { run, processIO } from "./commands.js";
import { errorMessage } from "mrzscan-scanner";

run(process.argv.slice(2), processIO)
  .then(code => { process.exitCode = code; })
  .catch(err => {
    console.error("❌ Error:", errorMessage(err));
    process.exitCode = 1;
  });
