// Must not use `* as yargs`, see https://github.com/yargs/yargs/issues/1131
import yargs, {Argv} from "yargs";
import {hideBin} from "yargs/helpers";
import {cmds} from "./cmds/index.js";
import {globalOptions, rcConfigOption} from "./options/index.js";
import {registerCommandToYargs} from "./util/index.js";
import {getVersion} from "./util/version.js";

const topBanner = `sync-eta: estimate when a syncing blockchain node catches up, from its logs.
  * Version: ${getVersion()}`;
const bottomBanner = `Every option can be set as a SYNC_ETA_<OPTION> environment variable or in an --rcConfig file.`;

export const yarg = yargs(hideBin(process.argv));

/**
 * Common factory for running the CLI and running integration tests
 * The CLI must actually be executed in a different script
 */
export function getSyncEtaCli(): Argv {
  const syncEta = yarg
    .env("SYNC_ETA")
    .parserConfiguration({
      // dot-notation breaks strictOptions()
      "dot-notation": false,
    })
    .options(globalOptions)
    // blank scriptName so that help text doesn't display the cli name before each command
    .scriptName("")
    .demandCommand(1)
    // Control show help behaviour below on .fail()
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .version(topBanner)
    .alias("h", "help")
    .alias("v", "version")
    .recommendCommands();

  for (const cmd of cmds) {
    registerCommandToYargs(syncEta, cmd);
  }

  // throw an error if we see an unrecognized cmd
  syncEta.recommendCommands().strict();
  syncEta.config(...rcConfigOption);

  return syncEta;
}
