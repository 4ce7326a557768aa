import {Options} from "yargs";
import {LogLevel, logFormats, logLevels} from "../../logger/index.js";
import {CliCommandOptions} from "../util/command.js";

export type LogArgs = {
  logLevel: string;
  logFile?: string;
  logFileLevel: string;
  logFormat?: string;
  logLevelModule?: string[];
};

function levelOption(output: string, defaultLevel: LogLevel): Options {
  return {
    description: `Most verbose level written to ${output}`,
    choices: logLevels,
    default: defaultLevel,
    type: "string",
  };
}

export const logOptions: CliCommandOptions<LogArgs> = {
  logLevel: levelOption("the terminal", LogLevel.info),

  logFile: {
    description: "Also append the logs to this file",
    type: "string",
  },

  logFileLevel: levelOption("--logFile", LogLevel.debug),

  logFormat: {
    description: "Format of the logs, in the terminal and in --logFile",
    choices: logFormats,
    type: "string",
  },

  logLevelModule: {
    description: "Terminal level of a module and its children, as 'eta=debug' or 'eta=debug,scan=warn'",
    type: "array",
    string: true,
    coerce: (values: string[]) => values.flatMap((value) => value.split(",")),
  },
};
