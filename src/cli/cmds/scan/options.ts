import {NodeClient, nodeClients} from "../../../health/index.js";
import {CliCommandOptions} from "../../util/command.js";
import {DEFAULT_LOG_EXTENSION} from "../../util/logFiles.js";
import {OutputFormat, outputFormats} from "../eta/options.js";

export type ScanArgs = {
  logPath: string;
  logExtension: string;
  client: string;
  warnKeyword?: string;
  errorKeyword?: string;
  output: string;
};

export const scanOptions: CliCommandOptions<ScanArgs> = {
  logPath: {
    description: "Log file, or directory of log files, to scan",
    type: "string",
    demandOption: true,
  },

  logExtension: {
    description: "Read files of the log directory whose extension starts with this value",
    default: DEFAULT_LOG_EXTENSION,
    type: "string",
  },

  client: {
    description: "Kind of client that wrote the logs, selects the warning and error markers",
    choices: nodeClients,
    default: NodeClient.consensus,
    type: "string",
  },

  warnKeyword: {
    description: "Override the marker of warning lines",
    type: "string",
  },

  errorKeyword: {
    description: "Override the marker of error lines",
    type: "string",
  },

  output: {
    description: "Report format",
    choices: outputFormats,
    default: OutputFormat.text,
    type: "string",
  },
};
