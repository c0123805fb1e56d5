import type { AssignFn, ParseFn } from './types';

export const identity: ParseFn = (raw) => raw;

export const assignValue: AssignFn = (options, name, value) => ({ ...options, [name]: value });

/** Base-10 integer; rejects anything `Number` would round or accept loosely (`''`, `1e3`, `0x1f`). */
export const toInteger: ParseFn = (raw) => {
  const s = raw.trim();
  if (!/^[+-]?\d+$/.test(s)) throw new Error(`not an integer: '${raw}'`);
  const n = Number(s);
  if (!Number.isSafeInteger(n)) throw new Error(`integer out of range: '${raw}'`);
  return n;
};

export const toNumber: ParseFn = (raw) => {
  const s = raw.trim();
  const n = Number(s);
  if (s === '' || !Number.isFinite(n)) throw new Error(`not a number: '${raw}'`);
  return n;
};

export const toJson: ParseFn = (raw) => JSON.parse(raw);

/**
 * Accumulates repeated values, one element per occurrence. The list starts from
 * the option's declared default when it has one (see `defaultValuesFor`).
 */
export const appendValue: AssignFn = (options, name, value) => {
  const prev = options[name];
  const list = prev === undefined ? [] : Array.isArray(prev) ? prev : [prev];
  return { ...options, [name]: [...list, value] };
};

/** Assigners whose declared default is the starting accumulator rather than a first value. */
export const ACCUMULATORS: ReadonlySet<AssignFn> = new Set([appendValue]);

export const PARSERS = {
  string: identity,
  integer: toInteger,
  number: toNumber,
  json: toJson,
} satisfies Record<string, ParseFn>;

export const ASSIGNERS = {
  set: assignValue,
  append: appendValue,
} satisfies Record<string, AssignFn>;

export type ParserName = keyof typeof PARSERS;
export type AssignerName = keyof typeof ASSIGNERS;
