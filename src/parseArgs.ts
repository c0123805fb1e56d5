import { formatBanner } from './banner/banner';
import { isOptionsError, type OptionsError } from './errors';
import { applySpecs } from './parse/argumentLoop';
import { compileSpecs } from './spec/compileSpec';
import type { ParseResult, SpecInput } from './spec/types';

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: OptionsError };

/**
 * Parse `args` against `specs`, returning the option values, the positional
 * leftovers and the usage banner.
 *
 * Records are compiled from scratch on every call, so the function keeps no
 * state between invocations.
 *
 * @example
 * const { options, leftovers } = parseArgs(['-p', '8080', 'serve'], [
 *   ['-p', '--port', 'Port to listen on', { default: 3000, parse: toInteger }],
 *   ['--[no-]verbose', 'Chatty output'],
 * ]);
 * // options: { port: 8080, verbose: false }, leftovers: ['serve']
 *
 * @throws InvalidArgumentError for an undeclared switch
 * @throws MissingValueError when a value option ends the input
 * @throws ValueConversionError when a `parse` function throws
 * @throws SpecDefinitionError for a spec that cannot be compiled
 */
export function parseArgs(args: readonly string[], specs: readonly SpecInput[]): ParseResult {
  const records = compileSpecs(specs);
  const { options, leftovers } = applySpecs(records, args);
  return { options, leftovers, banner: formatBanner(records) };
}

/** Same as `parseArgs`, but parser failures come back as `{ ok: false }` instead of being thrown. */
export function safeParseArgs(args: readonly string[], specs: readonly SpecInput[]): ParseOutcome {
  try {
    return { ok: true, ...parseArgs(args, specs) };
  } catch (e) {
    if (isOptionsError(e)) return { ok: false, error: e };
    throw e;
  }
}
