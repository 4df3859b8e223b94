#!/usr/bin/env node

import {renderCliError} from "../utils/errors.js";
import {getMinimeCli, yarg} from "./cli.js";

const minime = getMinimeCli();

void minime
  .fail((msg, err) => {
    if (msg) {
      // Show command help message when no command is provided
      if (msg.includes("Not enough non-option arguments")) {
        yarg.showHelp();
        console.log("\n");
      }
    }

    console.error(` ✖ ${renderCliError(msg, err)}\n`);
    process.exit(1);
  })

  // Execute CLI
  .parse();
