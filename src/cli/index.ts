#!/usr/bin/env node

import "source-map-support/register.js";
import {SyncEtaError} from "../util/index.js";
import {YargsError} from "./util/index.js";
import {getSyncEtaCli, yarg} from "./cli.js";

const syncEta = getSyncEtaCli();

void syncEta
  .fail((msg, err) => {
    if (msg) {
      // Show command help message when no command is provided
      if (msg.includes("Not enough non-option arguments")) {
        yarg.showHelp();
        console.log("\n");
      }
    }

    const errorMessage =
      err !== undefined
        ? err instanceof YargsError || err instanceof SyncEtaError
          ? err.message
          : err.stack
        : msg || "Unknown error";

    console.error(` ✖ ${errorMessage}\n`);
    process.exit(1);
  })

  // Execute CLI
  .parse();
