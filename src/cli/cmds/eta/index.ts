import {CliCommand} from "../../util/index.js";
import {GlobalArgs} from "../../options/index.js";
import {etaOptions, EtaArgs} from "./options.js";
import {etaHandler} from "./handler.js";

export const eta: CliCommand<EtaArgs, GlobalArgs> = {
  command: "eta",
  describe: "Estimate when a syncing node catches up with the chain head, from its logs",
  examples: [
    {
      command: "eta --logPath ./logs",
      description: "Estimate from every .log file of the ./logs directory",
    },
    {
      command: "eta --logPath node.log --output json",
      description: "Estimate from a single file and print the estimate as JSON",
    },
  ],
  options: etaOptions,
  handler: etaHandler,
};
