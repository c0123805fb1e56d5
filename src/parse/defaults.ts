import type { OptionRecord, OptionValues } from '../spec/types';

function seedFor(r: OptionRecord): unknown {
  return Array.isArray(r.defaultValue) ? [...r.defaultValue] : r.defaultValue;
}

/**
 * Initial mapping: every record with a default, inserted through its own `assign`
 * in declaration order. A missing key means the option was never set.
 *
 * Accumulating records (`append`, or `accumulate: true`) take their default as
 * the starting accumulator instead, copied so the declared array is never shared.
 */
export function defaultValuesFor(records: readonly OptionRecord[]): OptionValues {
  return records.reduce<OptionValues>((options, r) => {
    if (!r.hasDefault) return options;
    if (r.accumulates) return { ...options, [r.name]: seedFor(r) };
    return r.assign(options, r.name, r.defaultValue);
  }, {});
}
