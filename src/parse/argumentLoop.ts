import { InvalidArgumentError, MissingValueError, ValueConversionError } from '../errors';
import { flagValueFor, isEndOfOptions, isOptionToken } from '../spec/switches';
import type { OptionRecord, OptionValues } from '../spec/types';
import { defaultValuesFor } from './defaults';
import { matchNext } from './matcher';

export type AppliedArgs = {
  options: OptionValues;
  leftovers: string[];
};

function parseValue(record: OptionRecord, key: string, raw: string): unknown {
  try {
    return record.parse(raw);
  } catch (e) {
    throw new ValueConversionError(key, raw, record.name, e);
  }
}

/**
 * Consume `args` against the compiled records.
 *
 * Options may be interleaved with positionals; anything after a bare `--` is
 * kept verbatim. Throws on the first unknown switch, missing value or failed
 * conversion, so a partial mapping never escapes.
 */
export function applySpecs(records: readonly OptionRecord[], args: readonly string[]): AppliedArgs {
  let options = defaultValuesFor(records);
  const leftovers: string[] = [];
  let remaining: readonly string[] = args;

  while (remaining.length > 0) {
    const { key, tokens, record } = matchNext(remaining, records);

    if (isEndOfOptions(key)) {
      leftovers.push(...tokens.slice(1));
      break;
    }

    if (isOptionToken(key) && record === undefined) {
      throw new InvalidArgumentError(key);
    }

    if (isOptionToken(key) && record !== undefined) {
      if (record.isFlag) {
        options = record.assign(options, record.name, flagValueFor(key));
        remaining = tokens.slice(1);
        continue;
      }
      if (tokens.length < 2) throw new MissingValueError(key);
      options = record.assign(options, record.name, parseValue(record, key, tokens[1]));
      remaining = tokens.slice(2);
      continue;
    }

    leftovers.push(key);
    remaining = tokens.slice(1);
  }

  return { options, leftovers };
}
