import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

const {load, FAILSAFE_SCHEMA, Type} = yaml;

export const yamlSchema = FAILSAFE_SCHEMA.extend({
  implicit: [
    new Type("tag:yaml.org,2002:str", {
      kind: "scalar",
      construct: function construct(data: unknown) {
        return data !== null ? data : "";
      },
    }),
  ],
});

export enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

/**
 * Parse file contents as Json.
 */
export function parse(contents: string, fileFormat: FileFormat): unknown {
  switch (fileFormat) {
    case FileFormat.json:
      return JSON.parse(contents);
    case FileFormat.yaml:
    case FileFormat.yml:
      return load(contents, {schema: yamlSchema});
  }
}

/**
 * Read a JSON serializable object from a file
 *
 * Parse either from json or yaml, `acceptedFormats` restricts which extensions are read
 */
export function readFile(filepath: string, acceptedFormats: FileFormat[] = Object.values(FileFormat)): unknown {
  const extension = path.extname(filepath).slice(1);
  const fileFormat = acceptedFormats.find((format) => format === extension);
  if (fileFormat === undefined) {
    throw new Error(`UnsupportedFileFormat: ${filepath}`);
  }
  const contents = fs.readFileSync(filepath, "utf-8");
  return parse(contents, fileFormat);
}
