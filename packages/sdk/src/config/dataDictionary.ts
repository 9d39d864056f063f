import fs from "node:fs/promises";
import yaml from "js-yaml";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import { ConfigError, errorMessage } from "../errors.js";
import { DEFAULT_FILTERED_SUFFIX, type NamingOptions } from "../naming/filename.js";

export const DATA_DICTIONARY_SCHEMA = "cytoevt/v1";

export type DataDictionary = {
  schema: typeof DATA_DICTIONARY_SCHEMA;
  instrument?: string;
  updated?: string;
  // Measurement channel names, in on-disk order after the framing columns.
  measurementColumns: string[];
  filteredSuffix: string;
};

type RawDataDictionary = {
  schema: typeof DATA_DICTIONARY_SCHEMA;
  instrument?: string;
  updated?: string;
  measurementColumns: Array<string | { name: string; description?: string }>;
  filteredSuffix?: string;
};

export const DEFAULT_MEASUREMENT_COLUMNS: readonly string[] = [
  "time",
  "pulse_width",
  "D1",
  "D2",
  "fsc_small",
  "fsc_perp",
  "fsc_big",
  "pe",
  "chl_small",
  "chl_big"
];

export function defaultDataDictionary(): DataDictionary {
  return {
    schema: DATA_DICTIONARY_SCHEMA,
    measurementColumns: [...DEFAULT_MEASUREMENT_COLUMNS],
    filteredSuffix: DEFAULT_FILTERED_SUFFIX
  };
}

export function namingOptionsFrom(dict: DataDictionary): NamingOptions {
  return { filteredSuffix: dict.filteredSuffix };
}

const SCHEMA_URL = new URL("../../schemas/data-dictionary.schema.json", import.meta.url);

let validator: ValidateFunction<RawDataDictionary> | undefined;

async function getValidator(): Promise<ValidateFunction<RawDataDictionary>> {
  if (validator) return validator;
  const schema: SchemaObject = JSON.parse(await fs.readFile(SCHEMA_URL, "utf8"));
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  validator = ajv.compile<RawDataDictionary>(schema);
  return validator;
}

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

/** Validate an already-parsed data dictionary document. */
export async function parseDataDictionary(doc: unknown, source = "<inline>"): Promise<DataDictionary> {
  const validate = await getValidator();
  if (!validate(doc)) {
    const problems = describeErrors(validate.errors);
    throw new ConfigError("INVALID_CONFIG", `invalid data dictionary ${source}: ${problems.join("; ")}`, {
      source,
      problems
    });
  }
  const measurementColumns = doc.measurementColumns.map((c) => (typeof c === "string" ? c : c.name));
  const dup = measurementColumns.find((c, i) => measurementColumns.indexOf(c) !== i);
  if (dup !== undefined) {
    throw new ConfigError("INVALID_CONFIG", `invalid data dictionary ${source}: duplicate column ${dup}`, {
      source,
      problems: [`duplicate column ${dup}`]
    });
  }
  return {
    schema: doc.schema,
    ...(doc.instrument !== undefined ? { instrument: doc.instrument } : {}),
    ...(doc.updated !== undefined ? { updated: doc.updated } : {}),
    measurementColumns,
    filteredSuffix: doc.filteredSuffix ?? DEFAULT_FILTERED_SUFFIX
  };
}

// YAML or JSON; js-yaml reads both. The core schema keeps dates such as `updated` as strings.
export async function loadDataDictionary(filePath: string): Promise<DataDictionary> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new ConfigError("READ_FAILED", `could not read data dictionary ${filePath}: ${errorMessage(e)}`, {
      source: filePath
    });
  }
  let doc: unknown;
  try {
    doc = yaml.load(text, { schema: yaml.CORE_SCHEMA });
  } catch (e) {
    throw new ConfigError("INVALID_CONFIG", `could not parse data dictionary ${filePath}: ${errorMessage(e)}`, {
      source: filePath,
      problems: [errorMessage(e)]
    });
  }
  return parseDataDictionary(doc, filePath);
}
