import { ACCUMULATORS, appendValue, ASSIGNERS, assignValue, PARSERS, toInteger, toJson, toNumber } from '../builtins';

describe('parsers', () => {
  test('toInteger accepts base-10 integers only', () => {
    expect(toInteger('8080')).toBe(8080);
    expect(toInteger(' 42 ')).toBe(42);
    expect(toInteger('-3')).toBe(-3);
    expect(() => toInteger('abc')).toThrow("not an integer: 'abc'");
    expect(() => toInteger('1.5')).toThrow("not an integer: '1.5'");
    expect(() => toInteger('')).toThrow("not an integer: ''");
    expect(() => toInteger('99999999999999999999')).toThrow("integer out of range: '99999999999999999999'");
  });

  test('toNumber', () => {
    expect(toNumber('1.5')).toBe(1.5);
    expect(toNumber('1e3')).toBe(1000);
    expect(() => toNumber('')).toThrow("not a number: ''");
    expect(() => toNumber('x')).toThrow("not a number: 'x'");
  });

  test('toJson', () => {
    expect(toJson('{"a":[1,2]}')).toEqual({ a: [1, 2] });
    expect(() => toJson('{')).toThrow();
  });

  test('registries resolve names', () => {
    expect(PARSERS.integer).toBe(toInteger);
    expect(PARSERS.string('x')).toBe('x');
    expect(ASSIGNERS.append).toBe(appendValue);
    expect(ASSIGNERS.set({ a: 1 }, 'a', 2)).toEqual({ a: 2 });
    expect(ACCUMULATORS.has(appendValue)).toBe(true);
    expect(ACCUMULATORS.has(assignValue)).toBe(false);
  });
});

describe('appendValue', () => {
  test('starts a list and appends to it', () => {
    const one = appendValue({}, 'inc', 'a');
    expect(one).toEqual({ inc: ['a'] });
    expect(appendValue(one, 'inc', 'b')).toEqual({ inc: ['a', 'b'] });
  });

  test('an array value is one element', () => {
    const first = appendValue({}, 'inc', [1, 2]);
    expect(first).toEqual({ inc: [[1, 2]] });
    expect(appendValue(first, 'inc', [3])).toEqual({ inc: [[1, 2], [3]] });
  });

  test('wraps a scalar already present', () => {
    expect(appendValue({ inc: 'a' }, 'inc', 'b')).toEqual({ inc: ['a', 'b'] });
  });

  test('does not mutate its input', () => {
    const seed = ['a'];
    const before = { inc: seed };
    appendValue(before, 'inc', 'b');
    expect(before).toEqual({ inc: ['a'] });
    expect(seed).toEqual(['a']);
  });
});
