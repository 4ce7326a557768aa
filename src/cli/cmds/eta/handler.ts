import {estimateSyncEta, SyncEstimate} from "../../../estimator/index.js";
import {Logger, getNodeLogger} from "../../../logger/index.js";
import {mergeSamplesByTime, parseLogLines, Sample} from "../../../parser/index.js";
import {GlobalArgs} from "../../options/index.js";
import {renderEtaReport} from "../../report/index.js";
import {YargsError} from "../../util/errors.js";
import {LogFile, findLogFiles, readLogFiles} from "../../util/logFiles.js";
import {parseLoggerArgs} from "../../util/logger.js";
import {EtaArgs, OutputFormat} from "./options.js";

/**
 * Estimate when the node finishes syncing from its logs and print the report
 */
export async function etaHandler(args: EtaArgs & GlobalArgs): Promise<void> {
  const logger = getNodeLogger(parseLoggerArgs(args, {stderr: args.output === OutputFormat.json})).child("eta");
  const now = parseNow(args.now);

  const estimate = await runEta(args.logPath, args.logExtension, now, logger);

  if (args.output === OutputFormat.json) {
    console.log(JSON.stringify(estimate, null, 2));
  } else {
    console.log(renderEtaReport(estimate).join("\n"));
  }
}

export async function runEta(logPath: string, logExtension: string, now: Date, logger: Logger): Promise<SyncEstimate> {
  const filepaths = await findLogFiles(logPath, logExtension);
  if (filepaths.length === 0) {
    throw new YargsError(`No log files with extension ${logExtension} in ${logPath}`);
  }
  logger.verbose("Reading log files", {count: filepaths.length});

  const samples = parseLogFiles(await readLogFiles(filepaths), logger);
  return estimateSyncEta(samples, now);
}

/**
 * Parse the sync progress samples of every file, merged by timestamp.
 * Lines that look like sync progress but do not parse are skipped and logged.
 */
export function parseLogFiles(logFiles: LogFile[], logger: Logger): Sample[] {
  let skipped = 0;

  const sequences = logFiles.map(({filepath, lines}) => {
    const samples = Array.from(
      parseLogLines(lines, {
        onParseError: (error, lineNumber) => {
          skipped++;
          logger.debug("Skipping sync progress line", {file: filepath, line: lineNumber}, error);
        },
      })
    );
    logger.verbose("Parsed log file", {file: filepath, lines: lines.length, samples: samples.length});
    return samples;
  });

  if (skipped > 0) {
    logger.warn("Skipped invalid sync progress lines", {count: skipped});
  }

  return mergeSamplesByTime(sequences);
}

function parseNow(now: string | undefined): Date {
  if (now === undefined) {
    return new Date();
  }
  const date = new Date(now);
  if (Number.isNaN(date.getTime())) {
    throw new YargsError(`Invalid --now date '${now}'`);
  }
  return date;
}
