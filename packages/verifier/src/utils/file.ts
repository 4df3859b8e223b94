import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
const {load, FAILSAFE_SCHEMA, Type} = yaml;

export enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

const fileFormats = Object.values(FileFormat);

// Keep every scalar as a string: hex values such as 0x1234 must not be read as numbers
const yamlSchema = FAILSAFE_SCHEMA.extend({
  implicit: [
    new Type("tag:yaml.org,2002:str", {
      kind: "scalar",
      construct: function construct(data) {
        return data !== null ? data : "";
      },
    }),
  ],
});

function parse(contents: string, fileFormat: FileFormat): unknown {
  switch (fileFormat) {
    case FileFormat.json:
      return JSON.parse(contents);
    case FileFormat.yaml:
    case FileFormat.yml:
      return load(contents, {schema: yamlSchema});
  }
}

/**
 * Read an untyped object from a json or yaml file. Callers must validate its shape.
 */
export function readFile(filepath: string): unknown {
  const ext = path.extname(filepath).slice(1);
  const fileFormat = fileFormats.find((format) => format === ext);
  if (fileFormat === undefined) throw new Error(`UnsupportedFileFormat: ${filepath}`);
  const contents = fs.readFileSync(filepath, "utf-8");
  return parse(contents, fileFormat);
}
