import fs from "node:fs";
import path from "node:path";
import {fileURLToPath} from "node:url";
import findUp from "find-up";

type VersionJson = {
  /** "0.1.0" */
  version: string;
};

/**
 * Version of the closest package.json above `cwd`, which defaults to the directory of this module
 */
export function getVersion(cwd = path.dirname(fileURLToPath(import.meta.url))): string {
  const filePath = findUp.sync("package.json", {cwd});
  if (!filePath) return "unknown";

  const packageJson: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return isVersionJson(packageJson) ? packageJson.version : "unknown";
}

function isVersionJson(json: unknown): json is VersionJson {
  return typeof json === "object" && json !== null && "version" in json && typeof json.version === "string";
}
