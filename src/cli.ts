#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { VERSION } from './index';
import { isTerminal, processIo, type ParserIo } from './parser/outcome';
import { loadArgSchemaFile, parserFromSchema } from './schema/loadArgSchema';
import { resolvedValues, serializeResolvedValues, writeResolvedValuesFile } from './output/resolvedValues';

export type CheckOptions = {
  schema: string;
  tokens: string[];
  out?: string;
  verbose: boolean;
};

type RawCheckOptions = {
  schema: string;
  out?: string;
  verbose?: boolean;
};

/**
 * Parse `tokens` against the declarations in a schema file and emit the resolved values.
 * Returns the exit code instead of exiting so tests can drive it.
 */
export async function runCheck(opts: CheckOptions, io: ParserIo = processIo): Promise<number> {
  const doc = await loadArgSchemaFile(opts.schema);
  const parser = parserFromSchema(doc, { io });

  const outcome = parser.parseTokens(opts.tokens);
  if (isTerminal(outcome)) return parser.report(outcome);

  const values = resolvedValues(parser);
  if (opts.out) {
    await writeResolvedValuesFile(opts.out, values);
  } else {
    io.stdout(serializeResolvedValues(values));
  }

  if (opts.verbose) {
    const seen = Object.values(values.values).filter((v) => v.set).length;
    // stdout may carry the JSON document, so progress goes to stderr.
    // eslint-disable-next-line no-console
    console.error(`Resolved ${Object.keys(values.values).length} argument(s), ${seen} seen in input.${opts.out ? ` Wrote: ${opts.out}` : ''}`);
  }
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name('flagbearer')
    .description('Parse command-line tokens against a JSON argument schema and print the resolved values')
    .version(VERSION)
    .exitOverride()
    .requiredOption('--schema <file>', 'Argument schema JSON (arg-schema-v1)')
    .option('--out <file>', 'Write resolved values to a file instead of stdout')
    .option('-v, --verbose', 'Verbose logging', false)
    .argument('[tokens...]', 'Tokens to parse; put them after -- so they are not read as options here')
    .action(async (tokens: string[], raw: RawCheckOptions) => {
      process.exitCode = await runCheck({
        schema: raw.schema,
        tokens,
        out: raw.out,
        verbose: Boolean(raw.verbose),
      });
    });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e: unknown) {
    if (e instanceof CommanderError) return e.exitCode;
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    });
}
