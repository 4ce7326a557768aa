import {readFile, FileFormat} from "../util/file.js";
import {LogArgs, logOptions} from "./logOptions.js";

export const rcConfigOption: [string, string, (configPath: string) => Record<string, unknown>] = [
  "rcConfig",
  "RC file to supplement command line args, accepted formats: .yml, .yaml, .json",
  (configPath: string): Record<string, unknown> => readRcConfig(configPath),
];

export type GlobalArgs = LogArgs;

export const globalOptions = {
  ...logOptions,
};

export function readRcConfig(configPath: string): Record<string, unknown> {
  const config = readFile(configPath, [FileFormat.json, FileFormat.yml, FileFormat.yaml]);
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new Error(`RC config must be a map of options: ${configPath}`);
  }
  return Object.fromEntries(Object.entries(config));
}
