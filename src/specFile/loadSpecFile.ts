import fs from 'node:fs/promises';
import Ajv, { type ErrorObject, type SchemaObject } from 'ajv/dist/2020';

import { SpecDefinitionError } from '../errors';
import { ASSIGNERS, PARSERS, type AssignerName, type ParserName } from '../spec/builtins';
import type { OptionOverrides, SpecInput } from '../spec/types';
import specFileSchema from '../schema/spec-file-schema.json';

/** Option settings as written in JSON: functions are referenced by name. */
export type SpecFileSettings = {
  default?: unknown;
  parse?: ParserName;
  assign?: AssignerName;
  flag?: boolean;
  accumulate?: boolean;
  name?: string;
  doc?: string;
  [key: string]: unknown;
};

export type SpecFileOption = SpecFileSettings & { switches: string[] };

export type SpecFileTuple = Array<string | SpecFileSettings>;

export type SpecFile = {
  options: Array<SpecFileOption | SpecFileTuple>;
};

const schema: SchemaObject = specFileSchema;
const ajv = new Ajv({ allErrors: true, strict: false });
const validateSpecFile = ajv.compile<SpecFile>(schema);

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `  ${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
}

function toOverrides(settings: SpecFileSettings): OptionOverrides {
  const { parse, assign, ...rest } = settings;
  const out: OptionOverrides = { ...rest };
  if (parse !== undefined) out.parse = PARSERS[parse];
  if (assign !== undefined) out.assign = ASSIGNERS[assign];
  return out;
}

function toSpecInput(entry: SpecFileOption | SpecFileTuple): SpecInput {
  if (Array.isArray(entry)) {
    return entry.map((el) => (typeof el === 'string' ? el : toOverrides(el)));
  }
  const { switches, ...settings } = entry;
  return { ...toOverrides(settings), switches };
}

/**
 * Validate parsed JSON against the spec file schema and turn it into specs
 * `parseArgs` accepts. `source` only labels error messages.
 */
export function specsFromJson(json: unknown, source = '<inline>'): SpecInput[] {
  if (!validateSpecFile(json)) {
    throw new SpecDefinitionError(`Invalid spec file: ${source}\n${formatErrors(validateSpecFile.errors)}`);
  }
  return json.options.map(toSpecInput);
}

export async function loadSpecFile(filePath: string): Promise<SpecInput[]> {
  const text = await fs.readFile(filePath, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SpecDefinitionError(`Failed to parse spec file: ${filePath}\n${msg}`);
  }
  return specsFromJson(json, filePath);
}
