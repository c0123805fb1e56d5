import type { OptionRecord } from '../spec/types';

const GNU_LONG_OPTION = /^--[^ ]+=/;

export type Match = {
  /** Token used for the lookup (the `--name` half of `--name=value`). */
  key: string;
  /** Remaining input with any `--name=value` head split in two. */
  tokens: readonly string[];
  record: OptionRecord | undefined;
};

export function isGnuLongOption(token: string): boolean {
  return GNU_LONG_OPTION.test(token);
}

/** Split at the first `=`; the value may itself contain `=`. */
export function splitGnuLongOption(token: string): [string, string] {
  const eq = token.indexOf('=');
  return [token.slice(0, eq), token.slice(eq + 1)];
}

export function findRecord(key: string, records: readonly OptionRecord[]): OptionRecord | undefined {
  return records.find((r) => r.switches.includes(key));
}

/**
 * Identify the record the head of `tokens` refers to. The first declared record
 * holding the switch wins when several declare it.
 */
export function matchNext(tokens: readonly string[], records: readonly OptionRecord[]): Match {
  const [head, ...rest] = tokens;
  if (isGnuLongOption(head)) {
    const [key, value] = splitGnuLongOption(head);
    return { key, tokens: [key, value, ...rest], record: findRecord(key, records) };
  }
  return { key: head, tokens, record: findRecord(head, records) };
}
