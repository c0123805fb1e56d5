#!/usr/bin/env node

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { Command } from 'commander';
import { VERSION } from './index';
import { safeParseArgs } from './parseArgs';
import { loadSpecFile } from './specFile/loadSpecFile';
import type { SpecInput } from './spec/types';
import { stableStringify } from './util/deterministicJson';

export const EXIT_OK = 0;
export const EXIT_SPEC_ERROR = 1;
export const EXIT_INVALID_ARGS = 2;
export const EXIT_WRITE_ERROR = 3;

export type ParseCommandOptions = {
  spec: string;
  args: string[];
  out?: string;
  banner: boolean;
  verbose: boolean;
};

type RawOptions = {
  spec: string;
  out?: string;
  banner?: boolean;
  verbose?: boolean;
};

async function writeOutput(out: string | undefined, text: string): Promise<void> {
  if (!out) {
    // eslint-disable-next-line no-console
    console.log(text.endsWith('\n') ? text.slice(0, -1) : text);
    return;
  }
  await fs.mkdir(dirname(out), { recursive: true });
  await fs.writeFile(out, text, 'utf8');
}

export async function runParse(opts: ParseCommandOptions): Promise<number> {
  let specs: SpecInput[];
  try {
    specs = await loadSpecFile(opts.spec);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return EXIT_SPEC_ERROR;
  }

  const outcome = safeParseArgs(opts.args, specs);
  if (!outcome.ok) {
    // eslint-disable-next-line no-console
    console.error(outcome.error.message);
    return outcome.error.kind === 'SpecDefinition' ? EXIT_SPEC_ERROR : EXIT_INVALID_ARGS;
  }

  const text = opts.banner
    ? outcome.banner
    : stableStringify({ options: outcome.options, leftovers: outcome.leftovers });
  try {
    await writeOutput(opts.out, text);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(`Failed to write output: ${opts.out ?? '<stdout>'}\n${e instanceof Error ? e.message : String(e)}`);
    return EXIT_WRITE_ERROR;
  }

  if (opts.verbose) {
    const summary = opts.banner
      ? `Rendered usage for ${specs.length} spec(s)`
      : `Parsed ${Object.keys(outcome.options).length} option(s), ${outcome.leftovers.length} leftover argument(s) using ${specs.length} spec(s)`;
    // eslint-disable-next-line no-console
    console.error(summary + (opts.out ? `. Wrote: ${opts.out}` : ''));
  }
  return EXIT_OK;
}

async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name('optspec')
    .description('Parse command-line arguments against a declarative JSON option spec')
    .version(VERSION)
    .requiredOption('-s, --spec <file>', 'JSON option spec file')
    .option('-o, --out <file>', 'Write the result to a file instead of stdout')
    .option('--banner', 'Print the usage banner for the spec instead of parsing', false)
    .option('-v, --verbose', 'Verbose logging', false)
    .argument('[args...]', 'Arguments to parse; put them after -- so they are not read as optspec options')
    .action(async (args: string[], raw: RawOptions) => {
      process.exitCode = await runParse({
        spec: raw.spec,
        args,
        out: raw.out && raw.out.trim() !== '' ? raw.out : undefined,
        banner: Boolean(raw.banner),
        verbose: Boolean(raw.verbose),
      });
    });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return EXIT_INVALID_ARGS;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 1;
    },
  );
}
