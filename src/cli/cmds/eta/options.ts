import {CliCommandOptions} from "../../util/command.js";
import {DEFAULT_LOG_EXTENSION} from "../../util/logFiles.js";

export enum OutputFormat {
  text = "text",
  json = "json",
}

export const outputFormats = Object.values(OutputFormat);

export type EtaArgs = {
  logPath: string;
  logExtension: string;
  now?: string;
  output: string;
};

export const etaOptions: CliCommandOptions<EtaArgs> = {
  logPath: {
    description: "Log file, or directory of log files, of the syncing node",
    type: "string",
    demandOption: true,
  },

  logExtension: {
    description: "Read files of the log directory whose extension starts with this value",
    default: DEFAULT_LOG_EXTENSION,
    type: "string",
  },

  now: {
    description: "Reference time of the estimate as an ISO 8601 date, defaults to the current time",
    type: "string",
  },

  output: {
    description: "Report format",
    choices: outputFormats,
    default: OutputFormat.text,
    type: "string",
  },
};
