import {DEFAULT_BEACON_URL, DEFAULT_EXECUTION_URL} from "../../../status/index.js";
import {CliCommandOptions} from "../../util/command.js";
import {OutputFormat, outputFormats} from "../eta/options.js";

export type StatusArgs = {
  beaconUrl: string;
  executionUrl: string;
  output: string;
};

export const statusOptions: CliCommandOptions<StatusArgs> = {
  beaconUrl: {
    description: "Beacon node API url of the consensus client",
    default: DEFAULT_BEACON_URL,
    type: "string",
  },

  executionUrl: {
    description: "JSON-RPC url of the execution client",
    default: DEFAULT_EXECUTION_URL,
    type: "string",
  },

  output: {
    description: "Report format",
    choices: outputFormats,
    default: OutputFormat.text,
    type: "string",
  },
};
