import {
  LogLevelKeywords,
  LogLevelSummary,
  logLevelKeywordsByClient,
  nodeClients,
  summarizeLogLevels,
} from "../../../health/index.js";
import {Logger, getNodeLogger} from "../../../logger/index.js";
import {GlobalArgs} from "../../options/index.js";
import {renderLevelReport} from "../../report/index.js";
import {YargsError} from "../../util/errors.js";
import {findLogFiles, readLogFiles} from "../../util/logFiles.js";
import {parseLoggerArgs} from "../../util/logger.js";
import {OutputFormat} from "../eta/options.js";
import {ScanArgs} from "./options.js";

export type FileLevelSummary = LogLevelSummary & {filepath: string};

/**
 * Count the warnings and errors of each log file and print one line per file
 */
export async function scanHandler(args: ScanArgs & GlobalArgs): Promise<void> {
  const logger = getNodeLogger(parseLoggerArgs(args, {stderr: args.output === OutputFormat.json})).child("scan");
  const keywords = getLevelKeywords(args);

  const summaries = await runScan(args.logPath, args.logExtension, keywords, logger);

  if (args.output === OutputFormat.json) {
    console.log(JSON.stringify(summaries, null, 2));
  } else {
    for (const {filepath, ...summary} of summaries) {
      console.log(renderLevelReport(filepath, summary));
    }
  }
}

export async function runScan(
  logPath: string,
  logExtension: string,
  keywords: LogLevelKeywords,
  logger: Logger
): Promise<FileLevelSummary[]> {
  const filepaths = await findLogFiles(logPath, logExtension);
  if (filepaths.length === 0) {
    throw new YargsError(`No log files with extension ${logExtension} in ${logPath}`);
  }
  logger.verbose("Scanning log files", {count: filepaths.length, ...keywords});

  const logFiles = await readLogFiles(filepaths);
  return logFiles.map(({filepath, lines}) => ({filepath, ...summarizeLogLevels(lines, keywords)}));
}

/**
 * Markers of the client kind, each one replaced by its override when set
 */
export function getLevelKeywords(args: Pick<ScanArgs, "client" | "warnKeyword" | "errorKeyword">): LogLevelKeywords {
  const client = nodeClients.find((c) => c === args.client);
  if (client === undefined) {
    throw new YargsError(`Unknown client '${args.client}'`);
  }
  const defaults = logLevelKeywordsByClient[client];
  return {
    warn: args.warnKeyword ?? defaults.warn,
    error: args.errorKeyword ?? defaults.error,
  };
}
