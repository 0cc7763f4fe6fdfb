import fs from 'node:fs/promises';
import Ajv from 'ajv/dist/2020';

import { Arg } from '../args/arg';
import { wordBoolean, wordString } from '../args/kinds';
import { ArgParser, type ArgParserOptions } from '../parser/argParser';
import argSchemaJson from './arg-schema-v1.json';

export type ArgSchemaKind = 'flag' | 'option' | 'word';

export type ArgSchemaEntry = {
  name: string;
  short?: string;
  help?: string;
  kind: ArgSchemaKind;
  /** Boolean for flags, string for options; a word's default decides whether it toggles or takes a value. */
  default: boolean | string;
  required?: boolean;
};

export type ArgSchemaDocument = {
  schema: 'arg-schema-v1';
  program: {
    name: string;
    author?: string;
    version?: string;
    copyright?: string;
    info?: string;
    usage?: string;
    requireArgs?: boolean;
  };
  args: ArgSchemaEntry[];
};

export class ArgSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgSchemaError';
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validate = ajv.compile<ArgSchemaDocument>(argSchemaJson);

export function validateArgSchema(value: unknown): ArgSchemaDocument {
  if (!validate(value)) {
    throw new ArgSchemaError(`Invalid argument schema: ${ajv.errorsText(validate.errors)}`);
  }
  return value;
}

function toArg(entry: ArgSchemaEntry): Arg {
  const arg = new Arg(entry.name);
  if (entry.short !== undefined) arg.short(entry.short);
  if (entry.help !== undefined) arg.help(entry.help);
  if (entry.required) arg.required();

  const d = entry.default;
  switch (entry.kind) {
    case 'flag':
      return arg.flag(d === true);
    case 'option':
      return arg.option(String(d));
    case 'word':
      return arg.word(typeof d === 'boolean' ? wordBoolean(d) : wordString(d));
  }
}

export function parserFromSchema(doc: ArgSchemaDocument, options: ArgParserOptions = {}): ArgParser {
  const { program } = doc;
  const parser = new ArgParser(program.name, options);
  if (program.author !== undefined) parser.author(program.author);
  if (program.version !== undefined) parser.version(program.version);
  if (program.copyright !== undefined) parser.copyright(program.copyright);
  if (program.info !== undefined) parser.info(program.info);
  if (program.usage !== undefined) parser.usage(program.usage);
  if (program.requireArgs !== undefined) parser.requireArgs(program.requireArgs);
  return parser.args(doc.args.map(toArg));
}

export async function loadArgSchemaFile(filePath: string): Promise<ArgSchemaDocument> {
  const raw = await fs.readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ArgSchemaError(`${filePath} is not valid JSON: ${reason}`);
  }
  return validateArgSchema(parsed);
}
