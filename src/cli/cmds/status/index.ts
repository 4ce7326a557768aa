import {CliCommand} from "../../util/index.js";
import {GlobalArgs} from "../../options/index.js";
import {statusOptions, StatusArgs} from "./options.js";
import {statusHandler} from "./handler.js";

export const status: CliCommand<StatusArgs, GlobalArgs> = {
  command: "status",
  describe: "Query the sync status reported by the consensus and execution nodes themselves",
  examples: [
    {
      command: "status",
      description: "Query the nodes at their default local urls",
    },
    {
      command: "status --beaconUrl http://10.0.0.2:5052 --output json",
      description: "Query another beacon node and print the status as JSON",
    },
  ],
  options: statusOptions,
  handler: statusHandler,
};
