import fs from "node:fs";
import path from "node:path";
import {YargsError} from "./errors.js";

export const DEFAULT_LOG_EXTENSION = ".log";

export type LogFile = {
  filepath: string;
  lines: string[];
};

type IoError = {code: string};

function isIoError(e: unknown): e is IoError {
  return typeof e === "object" && e !== null && "code" in e && typeof e.code === "string";
}

/**
 * Resolve the log files to read from a file or directory path.
 *
 * A file is returned as is. In a directory, regular files whose lower-cased extension starts with
 * `extension` (`.log`, `.log1`, `.logs`) are returned, oldest modification time first, then by name.
 */
export async function findLogFiles(logPath: string, extension = DEFAULT_LOG_EXTENSION): Promise<string[]> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(logPath);
  } catch (e) {
    if (isIoError(e) && e.code === "ENOENT") {
      throw new YargsError(`Log path does not exist: ${logPath}`);
    }
    throw e;
  }

  if (!stat.isDirectory()) {
    return [logPath];
  }

  const entries = await fs.promises.readdir(logPath, {withFileTypes: true});
  const filepaths = entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase().startsWith(extension.toLowerCase()))
    .map((entry) => path.join(logPath, entry.name));

  const mtimes = await Promise.all(filepaths.map(async (filepath) => (await fs.promises.stat(filepath)).mtimeMs));
  return filepaths
    .map((filepath, i) => ({filepath, mtimeMs: mtimes[i]}))
    .sort((a, b) => a.mtimeMs - b.mtimeMs || a.filepath.localeCompare(b.filepath))
    .map(({filepath}) => filepath);
}

/**
 * Read all log files concurrently. Resolves once every file is read, in the order of `filepaths`
 */
export async function readLogFiles(filepaths: string[]): Promise<LogFile[]> {
  return Promise.all(
    filepaths.map(async (filepath) => ({filepath, lines: splitLines(await fs.promises.readFile(filepath, "utf8"))}))
  );
}

/**
 * Split file contents into lines, a trailing newline does not produce an empty last line
 */
export function splitLines(contents: string): string[] {
  const lines = contents.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
