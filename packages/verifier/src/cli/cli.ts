// Must not use `* as yargs`, see https://github.com/yargs/yargs/issues/1131
import yargs from "yargs";
import type {Argv} from "yargs";
import {hideBin} from "yargs/helpers";
import {registerCommandToYargs} from "@minime-proofs/utils";
import {cmds} from "./cmds/index.js";
import {globalOptions} from "./options.js";

const topBanner = `MiniMe proofs: verify MiniMe token balances at a block against a contract storage root.

All options can also be set with MINIME_ prefixed environment variables, e.g. MINIME_LOG_LEVEL=debug`;

export const yarg = yargs(hideBin(process.argv));

/**
 * Common factory for running the CLI and running integration tests
 * The CLI must actually be executed in a different script
 */
export function getMinimeCli(): Argv {
  const minime = yarg
    .env("MINIME")
    .parserConfiguration({
      // As of yargs v16.1.0 dot-notation breaks strictOptions()
      "dot-notation": false,
    })
    .options(globalOptions)
    // blank scriptName so that help text doesn't display the cli name before each command
    .scriptName("")
    .demandCommand(1)
    // Control show help behaviour below on .fail()
    .showHelpOnFail(false)
    .usage(topBanner)
    .alias("h", "help")
    .recommendCommands();

  for (const cmd of cmds) {
    registerCommandToYargs(minime, cmd);
  }

  // throw an error if we see an unrecognized cmd
  minime.recommendCommands().strict();

  return minime;
}
